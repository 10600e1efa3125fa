import { NotFoundError } from '../errors.js';
import type { CommandHost } from './host/types.js';

export interface ResolvedTargets {
  kind: 'command' | 'module';
  commands: string[];
}

/** Command names compare case-insensitively, as they do in PowerShell */
export const createNameSet = (names: Iterable<string> = []): ReadonlySet<string> =>
  new Set(Array.from(names, (name) => name.toLowerCase()));

export const hasName = (set: ReadonlySet<string>, name: string): boolean => set.has(name.toLowerCase());

export const resolveModuleCommands = async (
  host: CommandHost,
  moduleName: string,
  exclude: Iterable<string> = []
): Promise<string[]> => {
  if (!(await host.hasModule(moduleName))) {
    throw new NotFoundError('module', moduleName);
  }

  const excluded = createNameSet(exclude);
  const commands = await host.listCommands(moduleName);
  return commands.filter((command) => !hasName(excluded, command));
};

/**
 * A command name resolves to itself; a module name to its commands minus
 * the excluded ones.
 */
export const resolveTargets = async (
  host: CommandHost,
  target: string,
  exclude: Iterable<string> = []
): Promise<ResolvedTargets> => {
  if (await host.hasCommand(target)) {
    return { kind: 'command', commands: [target] };
  }
  if (await host.hasModule(target)) {
    return { kind: 'module', commands: await resolveModuleCommands(host, target, exclude) };
  }
  throw new NotFoundError('command', target);
};
