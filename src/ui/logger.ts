import chalk from 'chalk';

export interface Logger {
  success: (msg: string) => void;
  debug: (msg: string) => void;
  step: (current: number, total: number, msg: string) => void;
  file: (action: 'write' | 'fail', path: string) => void;
  blank: () => void;
  dim: (msg: string) => void;
}

export const logger: Logger = {
  success: (msg: string) => {
    console.log(chalk.green('✓'), msg);
  },

  debug: (msg: string) => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  step: (current: number, total: number, msg: string) => {
    console.log(chalk.dim(`[${current}/${total}]`), msg);
  },

  file: (action: 'write' | 'fail', path: string) => {
    const icons = {
      write: chalk.green('+'),
      fail: chalk.red('x'),
    };
    console.log(`  ${icons[action]} ${path}`);
  },

  blank: () => {
    console.log();
  },

  dim: (msg: string) => {
    console.log(chalk.dim(msg));
  },
};

export const formatPath = (path: string): string => {
  return chalk.cyan(path);
};

export const formatCount = (count: number, singular: string, plural?: string): string => {
  const word = count === 1 ? singular : (plural || `${singular}s`);
  return `${chalk.bold(count.toString())} ${word}`;
};
