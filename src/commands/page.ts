import { Command } from 'commander';
import { join } from 'path';
import { loadConfig } from '../lib/config.js';
import { createHost, importModules } from '../lib/host/index.js';
import { loadTemplates } from '../lib/templates.js';
import { writeCommandPages } from '../lib/render/index.js';
import { expandPath } from '../lib/paths.js';
import { TEMPLATES_DIR } from '../constants.js';
import { logger, formatCount } from '../ui/index.js';
import type { PageOptions } from '../types.js';
import { reportFailures } from './shared.js';

const runPage = async (name: string, options: PageOptions): Promise<void> => {
  const { config } = await loadConfig({ configPath: options.config });
  const { docs } = config;

  const templates = await loadTemplates({
    header: options.header ? expandPath(options.header) : (docs.headerTemplate ?? join(TEMPLATES_DIR, 'header.html')),
    footer: options.footer ? expandPath(options.footer) : (docs.footerTemplate ?? join(TEMPLATES_DIR, 'footer.html')),
  });

  const host = createHost(config.host);
  await importModules(host, options.import?.map(expandPath));

  const outDir = options.out ? expandPath(options.out) : join(docs.outDir, docs.cmdletsDir);

  const result = await writeCommandPages({
    host,
    target: name,
    outDir,
    templates,
    exclude: [...docs.exclude, ...(options.exclude ?? [])],
    width: docs.helpWidth,
    continueOnError: options.failFast ? false : docs.continueOnError,
    onProgress: (current, total, command) => logger.step(current, total, command),
  });

  for (const path of result.written) {
    logger.file('write', path);
  }

  reportFailures(result.failed, result.written.length + result.failed.length);
  logger.success(`Wrote ${formatCount(result.written.length, 'page')} to ${outDir}`);
};

export const pageCommand = new Command('page')
  .description('Write an HTML page for a command, or for every command of a module')
  .argument('<name>', 'Command or module name')
  .option('-o, --out <dir>', 'Folder to write the pages to')
  .option('--header <file>', 'HTML placed before every page body')
  .option('--footer <file>', 'HTML placed after every page body')
  .option('-x, --exclude <names...>', 'Commands of the module to skip')
  .option('--fail-fast', 'Stop at the first command whose help cannot be read')
  .option('-i, --import <paths...>', 'Module files to load first')
  .option('-c, --config <file>', 'Use this config file instead of searching for one')
  .action(async (name: string, options: PageOptions) => {
    await runPage(name, options);
  });
