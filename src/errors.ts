import chalk from 'chalk';

export class CmdocError extends Error {
  constructor(
    message: string,
    public code: string,
    public suggestions?: string[]
  ) {
    super(message);
    this.name = 'CmdocError';
  }
}

export type NotFoundKind = 'directory' | 'command' | 'module' | 'template' | 'file';

export class NotFoundError extends CmdocError {
  constructor(
    public kind: NotFoundKind,
    public target: string
  ) {
    super(`${kind[0].toUpperCase()}${kind.slice(1)} not found: ${target}`, 'NOT_FOUND', suggestionsFor(kind));
    this.name = 'NotFoundError';
  }
}

const suggestionsFor = (kind: NotFoundKind): string[] => {
  switch (kind) {
    case 'directory':
      return ['Check that the path is correct', 'Relative paths resolve from the current directory'];
    case 'command':
    case 'module':
      return [
        'Check the spelling and casing of the name',
        'Use --import <path> to load the module before rendering',
      ];
    case 'template':
      return ['Check the --header/--footer paths or docs.headerTemplate/docs.footerTemplate in your config'];
    default:
      return ['Check that the path is correct'];
  }
};

export class MalformedInputError extends CmdocError {
  constructor(
    public command: string,
    reason: string
  ) {
    super(`Help text for ${command} could not be read: ${reason}`, 'MALFORMED_INPUT', [
      `Run \`Get-Help ${command} -Full\` to inspect the help text`,
    ]);
    this.name = 'MalformedInputError';
  }
}

export class ConfigError extends CmdocError {
  constructor(message: string, suggestions?: string[]) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', suggestions || [
      'Check your .cmdocrc.json against the documented options',
    ]);
    this.name = 'ConfigError';
  }
}

export class HostError extends CmdocError {
  constructor(message: string, detail?: string) {
    super(`PowerShell host failed: ${message}`, 'HOST_ERROR', detail ? [detail] : [
      'Check that pwsh is installed and on your PATH',
      'Set host.executable in your config to use a different PowerShell binary',
    ]);
    this.name = 'HostError';
  }
}

export const handleError = (error: unknown): never => {
  if (error instanceof CmdocError) {
    console.error(chalk.red('x'), error.message);
    if (error.suggestions && error.suggestions.length > 0) {
      console.error();
      console.error(chalk.dim('Suggestions:'));
      error.suggestions.forEach((s) => console.error(chalk.dim(`  → ${s}`)));
    }
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(chalk.red('x'), 'An unexpected error occurred:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    process.exit(1);
  }

  console.error(chalk.red('x'), 'An unknown error occurred');
  process.exit(1);
};
