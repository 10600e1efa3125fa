import { homedir } from 'os';
import { join, isAbsolute, resolve } from 'path';
import { stat } from 'fs/promises';

export const expandPath = (path: string): string => {
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return isAbsolute(path) ? path : resolve(path);
};

export const isDirectory = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
};

export const isFile = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
};

/** Output file name for a command or module, e.g. `Get-Widget.html` */
export const outputFileName = (name: string, extension: string): string => `${name}.${extension}`;

export const getBundlePath = (outDir: string, moduleName: string, extension: string): string =>
  join(outDir, outputFileName(moduleName, extension));

export const getCommandPagePath = (outDir: string, command: string): string =>
  join(outDir, outputFileName(command, 'html'));
