import { basename, extname } from 'path';
import type { CmdocConfigOutput } from '../../schemas/config.schema.js';
import { PwshHost } from './pwsh.js';
import type { CommandHost } from './types.js';

export const createHost = (config: CmdocConfigOutput['host']): CommandHost =>
  new PwshHost({ executable: config.executable, modules: config.modules });

/** Module name PowerShell derives from a module file, e.g. `Widgets.psm1` -> `Widgets` */
export const moduleNameFromPath = (modulePath: string): string => basename(modulePath, extname(modulePath));

/** Load extra module files into the host before documenting them */
export const importModules = async (host: CommandHost, paths: string[] = []): Promise<void> => {
  for (const path of paths) {
    await host.reload(moduleNameFromPath(path), path);
  }
};
