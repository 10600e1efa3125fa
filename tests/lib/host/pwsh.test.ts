/**
 * PowerShell host unit tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { execFileMock } = vi.hoisted(() => ({ execFileMock: vi.fn() }));

vi.mock('child_process', () => ({
  execFile: execFileMock,
}));

// Import after mocks are set up
import { PwshHost, quotePwsh } from '../../../src/lib/host/pwsh.js';
import { importModules, moduleNameFromPath } from '../../../src/lib/host/factory.js';
import { HostError } from '../../../src/errors.js';

type ExecCallback = (error: Error | null, result?: { stdout: string; stderr: string }) => void;

const respond = (stdout: string) => {
  execFileMock.mockImplementation((_file: string, _args: string[], _options: object, callback: ExecCallback) => {
    callback(null, { stdout, stderr: '' });
  });
};

/** Script passed to `-Command` on the given call */
const scriptOf = (call: number): string => {
  const args: string[] = execFileMock.mock.calls[call][1];
  return args[args.length - 1];
};

describe('PwshHost', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it('should quote single quotes for PowerShell', () => {
    expect(quotePwsh("O'Brien")).toBe("'O''Brien'");
  });

  it('should run pwsh without a profile', async () => {
    respond('yes\n');
    const host = new PwshHost();

    await host.hasCommand('Get-Widget');

    const [file, args] = execFileMock.mock.calls[0];
    expect(file).toBe('pwsh');
    expect(args.slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-Command']);
  });

  it('should use the configured executable', async () => {
    respond('no\n');
    const host = new PwshHost({ executable: '/opt/powershell/pwsh' });

    await host.hasModule('Widgets');

    expect(execFileMock.mock.calls[0][0]).toBe('/opt/powershell/pwsh');
  });

  it('should answer hasCommand and hasModule from the script output', async () => {
    const host = new PwshHost();

    respond('yes\r\n');
    expect(await host.hasCommand('Get-Widget')).toBe(true);
    respond('no\n');
    expect(await host.hasModule('Gadgets')).toBe(false);

    expect(scriptOf(0)).toContain("Get-Command -Name 'Get-Widget'");
    expect(scriptOf(1)).toContain("Get-Module -ListAvailable -Name 'Gadgets'");
  });

  it('should list module commands one per line', async () => {
    respond('Add-Widget\r\nGet-Widget\r\n\r\n');
    const host = new PwshHost();

    expect(await host.listCommands('Widgets')).toEqual(['Add-Widget', 'Get-Widget']);
    expect(scriptOf(0)).toContain("Get-Command -Module 'Widgets' | Sort-Object -Property Name");
  });

  it('should export help at the requested width', async () => {
    respond('');
    const host = new PwshHost();

    await host.exportHelp('Get-Widget', '/tmp/cmdoc-help-x/Get-Widget.txt', 500);

    expect(scriptOf(0)).toContain(
      "Get-Help -Name 'Get-Widget' -Full | Out-String -Width 500 | " +
        "Out-File -FilePath '/tmp/cmdoc-help-x/Get-Widget.txt' -Encoding utf8"
    );
  });

  it('should import reloaded modules ahead of later scripts', async () => {
    respond('');
    const host = new PwshHost({ modules: ['/mods/Base.psm1'] });

    await host.reload('Widgets', '/out/Widgets.psm1');
    await host.listCommands('Widgets');

    expect(scriptOf(0)).toContain("Import-Module -Name '/out/Widgets.psm1' -Force -ErrorAction Stop");
    expect(host.preamble()).toBe(
      "Import-Module -Name '/mods/Base.psm1' -Force -ErrorAction Stop; " +
        "Import-Module -Name '/out/Widgets.psm1' -Force -ErrorAction Stop;"
    );
    expect(scriptOf(1)).toContain(host.preamble());
  });

  it('should raise HostError when pwsh is missing', async () => {
    execFileMock.mockImplementation((_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(Object.assign(new Error('spawn pwsh ENOENT'), { code: 'ENOENT' }));
    });
    const host = new PwshHost();

    await expect(host.hasCommand('Get-Widget')).rejects.toThrow('PowerShell host failed: pwsh was not found');
  });

  it('should raise HostError with stderr when the script fails', async () => {
    execFileMock.mockImplementation((_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(Object.assign(new Error('Command failed: pwsh\nmore'), { code: 1, stderr: 'Import-Module: boom\n' }));
    });
    const host = new PwshHost();

    const error = await host.reload('Widgets', '/out/Widgets.psm1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HostError);
    expect(error).toMatchObject({
      message: 'PowerShell host failed: Command failed: pwsh',
      suggestions: ['Import-Module: boom'],
    });
  });
});

describe('host factory', () => {
  it('should derive the module name from its file', () => {
    expect(moduleNameFromPath('/out/Widgets.psm1')).toBe('Widgets');
  });

  it('should reload each imported module', async () => {
    const reload = vi.fn().mockResolvedValue(undefined);
    const host = {
      hasCommand: vi.fn(),
      hasModule: vi.fn(),
      listCommands: vi.fn(),
      exportHelp: vi.fn(),
      reload,
    };

    await importModules(host, ['/a/One.psm1', '/b/Two.psd1']);

    expect(reload.mock.calls).toEqual([
      ['One', '/a/One.psm1'],
      ['Two', '/b/Two.psd1'],
    ]);
  });
});
