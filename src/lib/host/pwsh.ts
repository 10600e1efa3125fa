/**
 * PowerShell host
 *
 * Runs each query in a fresh `pwsh` process. Module files registered with
 * `reload` are imported at the top of every script.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { HostError } from '../../errors.js';
import { DEFAULT_PWSH } from '../../constants.js';
import type { CommandHost } from './types.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 16 * 1024 * 1024;

/** Quote a value as a single-quoted PowerShell string literal */
export const quotePwsh = (value: string): string => `'${value.replace(/'/g, "''")}'`;

export interface PwshHostOptions {
  executable?: string;
  /** Module files to import before every call */
  modules?: string[];
}

export class PwshHost implements CommandHost {
  private readonly executable: string;
  private readonly modules = new Map<string, string>();

  constructor(options: PwshHostOptions = {}) {
    this.executable = options.executable ?? DEFAULT_PWSH;
    for (const path of options.modules ?? []) {
      this.modules.set(path, path);
    }
  }

  async hasCommand(name: string): Promise<boolean> {
    const stdout = await this.run(
      `if (Get-Command -Name ${quotePwsh(name)} -ErrorAction SilentlyContinue) { 'yes' } else { 'no' }`
    );
    return stdout.trim() === 'yes';
  }

  async hasModule(name: string): Promise<boolean> {
    const quoted = quotePwsh(name);
    const stdout = await this.run(
      `if ((Get-Module -Name ${quoted}) -or (Get-Module -ListAvailable -Name ${quoted})) { 'yes' } else { 'no' }`
    );
    return stdout.trim() === 'yes';
  }

  async listCommands(moduleName: string): Promise<string[]> {
    const stdout = await this.run(
      `Get-Command -Module ${quotePwsh(moduleName)} | Sort-Object -Property Name | ForEach-Object { $_.Name }`
    );
    return stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async exportHelp(command: string, destination: string, width: number): Promise<void> {
    await this.run(
      `Get-Help -Name ${quotePwsh(command)} -Full | Out-String -Width ${width} | ` +
        `Out-File -FilePath ${quotePwsh(destination)} -Encoding utf8`
    );
  }

  async reload(moduleName: string, modulePath: string): Promise<void> {
    await this.run(`Import-Module -Name ${quotePwsh(modulePath)} -Force -ErrorAction Stop`);
    this.modules.set(moduleName, modulePath);
  }

  /** Script run ahead of every query */
  preamble(): string {
    return Array.from(this.modules.values())
      .map((path) => `Import-Module -Name ${quotePwsh(path)} -Force -ErrorAction Stop;`)
      .join(' ');
  }

  private async run(script: string): Promise<string> {
    const command = `$ErrorActionPreference = 'Stop'; ${this.preamble()} ${script}`;
    try {
      const { stdout } = await execFileAsync(
        this.executable,
        ['-NoProfile', '-NonInteractive', '-Command', command],
        { maxBuffer: MAX_BUFFER, windowsHide: true }
      );
      return stdout;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new HostError(`${this.executable} was not found`);
      }
      const stderr = error instanceof Error && 'stderr' in error ? String(error.stderr).trim() : '';
      throw new HostError(
        error instanceof Error ? error.message.split('\n')[0] : String(error),
        stderr || undefined
      );
    }
  }
}
