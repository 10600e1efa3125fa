import { Command } from 'commander';
import { loadConfig } from '../lib/config.js';
import { bundleModule } from '../lib/bundler.js';
import { createHost } from '../lib/host/index.js';
import { expandPath } from '../lib/paths.js';
import { logger, withSpinner, formatCount, formatPath } from '../ui/index.js';
import type { BundleOptions } from '../types.js';

const runBundle = async (moduleName: string, options: BundleOptions): Promise<void> => {
  const { config } = await loadConfig({ configPath: options.config });

  const sourceDir = options.source ? expandPath(options.source) : config.bundle.sourceDir;
  const outDir = options.out ? expandPath(options.out) : config.bundle.outDir;

  const result = await withSpinner(
    `Bundling ${moduleName}`,
    () =>
      bundleModule({
        moduleName,
        sourceDir,
        outDir,
        exclude: options.exclude ?? config.bundle.exclude,
        scriptExtension: config.bundle.scriptExtension,
        bundleExtension: config.bundle.bundleExtension,
      }),
    {
      successText: (bundle) => `Bundled ${bundle.files.length} file(s) into ${bundle.outputPath}`,
    }
  );

  for (const file of result.files) {
    logger.debug(`${result.hashes[file]}  ${file}`);
  }

  if (options.reload === false) {
    logger.dim('Skipped reloading the module');
    return;
  }

  const host = createHost(config.host);
  await host.reload(moduleName, result.outputPath);
  logger.success(`Reloaded ${moduleName} from ${formatPath(result.outputPath)} (${formatCount(result.files.length, 'script')})`);
};

export const bundleCommand = new Command('bundle')
  .description('Concatenate the script files of a folder into one module file')
  .argument('<module>', 'Name of the module to write')
  .option('-s, --source <dir>', 'Folder holding the script files')
  .option('-o, --out <dir>', 'Folder to write the module file to')
  .option('-x, --exclude <glob>', 'Leave out script files whose name matches')
  .option('--no-reload', 'Do not import the written module afterwards')
  .option('-c, --config <file>', 'Use this config file instead of searching for one')
  .action(async (moduleName: string, options: BundleOptions) => {
    await runBundle(moduleName, options);
  });
