export type { CommandHost } from './types.js';
export { PwshHost, quotePwsh, type PwshHostOptions } from './pwsh.js';
export { createHost, importModules, moduleNameFromPath } from './factory.js';
