import { Command, Option } from 'commander';
import { join } from 'path';
import { loadConfig } from '../lib/config.js';
import { createHost, importModules } from '../lib/host/index.js';
import { loadTemplates, EMPTY_TEMPLATES } from '../lib/templates.js';
import { writeModuleSummary } from '../lib/render/index.js';
import { expandPath } from '../lib/paths.js';
import { TEMPLATES_DIR } from '../constants.js';
import { logger, formatCount, formatPath } from '../ui/index.js';
import type { SummaryFormat, SummaryOptions } from '../types.js';
import { reportFailures } from './shared.js';

const FORMATS: SummaryFormat[] = ['html', 'markdown'];

const isSummaryFormat = (value: string | undefined): value is SummaryFormat =>
  FORMATS.some((format) => format === value);

const runSummary = async (moduleName: string, options: SummaryOptions): Promise<void> => {
  const { config } = await loadConfig({ configPath: options.config });
  const { docs } = config;
  const format: SummaryFormat = isSummaryFormat(options.format) ? options.format : 'html';

  const templates =
    format === 'html'
      ? await loadTemplates({
          header: options.header ? expandPath(options.header) : (docs.headerTemplate ?? join(TEMPLATES_DIR, 'header.html')),
          footer: options.footer ? expandPath(options.footer) : (docs.footerTemplate ?? join(TEMPLATES_DIR, 'footer.html')),
        })
      : EMPTY_TEMPLATES;

  const host = createHost(config.host);
  await importModules(host, options.import?.map(expandPath));

  const result = await writeModuleSummary({
    host,
    moduleName,
    format,
    outDir: options.out ? expandPath(options.out) : docs.outDir,
    fileName: options.file,
    exclude: [...docs.exclude, ...(options.exclude ?? [])],
    inProgress: [...docs.inProgress, ...(options.inProgress ?? [])],
    baseUrl: options.baseUrl ?? docs.baseUrl,
    cmdletsDir: docs.cmdletsDir,
    templates,
    width: docs.helpWidth,
    continueOnError: options.failFast ? false : docs.continueOnError,
    onProgress: (current, total, command) => logger.step(current, total, command),
  });

  logger.file('write', result.outputPath);
  reportFailures(result.failed, result.entries.length);
  logger.success(`Listed ${formatCount(result.entries.length, 'command')} in ${formatPath(result.outputPath)}`);
};

export const summaryCommand = new Command('summary')
  .description('Write a summary page listing every command of a module')
  .argument('<module>', 'Module name')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(FORMATS).default('html'))
  .option('-o, --out <dir>', 'Folder to write the summary to')
  .option('--file <name>', 'File name to use instead of <Module>.html or README.md')
  .option('--base-url <url>', 'Absolute URL the command pages are published under (Markdown)')
  .option('-x, --exclude <names...>', 'Commands to leave out')
  .option('-p, --in-progress <names...>', 'Commands to flag as in progress')
  .option('--header <file>', 'HTML placed before the summary (HTML format)')
  .option('--footer <file>', 'HTML placed after the summary (HTML format)')
  .option('--fail-fast', 'Stop at the first command whose help cannot be read')
  .option('-i, --import <paths...>', 'Module files to load first')
  .option('-c, --config <file>', 'Use this config file instead of searching for one')
  .action(async (moduleName: string, options: SummaryOptions) => {
    await runSummary(moduleName, options);
  });
