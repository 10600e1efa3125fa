/**
 * The PowerShell session cmdoc documents. Everything it knows about modules,
 * commands and help text comes through here.
 */
export interface CommandHost {
  hasCommand(name: string): Promise<boolean>;
  hasModule(name: string): Promise<boolean>;
  /** Command names exported by a module, sorted by name */
  listCommands(moduleName: string): Promise<string[]>;
  /** Write the full help text of `command`, rendered `width` columns wide, to `destination` */
  exportHelp(command: string, destination: string, width: number): Promise<void>;
  /** Make a freshly written module file the one later calls see */
  reload(moduleName: string, modulePath: string): Promise<void>;
}
