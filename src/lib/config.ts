import { dirname, isAbsolute, resolve } from 'path';
import { cosmiconfig } from 'cosmiconfig';
import { cmdocConfigSchema, defaultConfig, type CmdocConfigOutput } from '../schemas/config.schema.js';
import { ConfigError } from '../errors.js';
import { APP_NAME } from '../constants.js';

export interface LoadedConfig {
  config: CmdocConfigOutput;
  /** Path of the config file, null when running on defaults */
  filepath: string | null;
}

export const CONFIG_SEARCH_PLACES = [
  '.cmdocrc',
  '.cmdocrc.json',
  '.cmdocrc.yaml',
  '.cmdocrc.yml',
  'cmdoc.config.js',
  'cmdoc.config.cjs',
];

const explorer = () => cosmiconfig(APP_NAME, { searchPlaces: CONFIG_SEARCH_PLACES });

/**
 * Load the cmdoc configuration, either from an explicit file or by searching
 * from `searchFrom` upwards. Paths inside the file are made absolute relative
 * to the file's directory.
 */
export const loadConfig = async (options: { configPath?: string; searchFrom?: string } = {}): Promise<LoadedConfig> => {
  let result: { config: unknown; filepath: string } | null;

  try {
    result = options.configPath
      ? await explorer().load(options.configPath)
      : await explorer().search(options.searchFrom);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${options.configPath}`);
    }
    throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!result) {
    return { config: defaultConfig, filepath: null };
  }

  const parsed = cmdocConfigSchema.safeParse(result.config ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${result.filepath}: ${parsed.error.message}`);
  }

  return {
    config: resolveConfigPaths(parsed.data, dirname(result.filepath)),
    filepath: result.filepath,
  };
};

const resolveFrom = (base: string, path: string): string => (isAbsolute(path) ? path : resolve(base, path));

const resolveOptional = (base: string, path: string | undefined): string | undefined =>
  path === undefined ? undefined : resolveFrom(base, path);

export const resolveConfigPaths = (config: CmdocConfigOutput, baseDir: string): CmdocConfigOutput => ({
  ...config,
  bundle: {
    ...config.bundle,
    sourceDir: resolveFrom(baseDir, config.bundle.sourceDir),
    outDir: resolveFrom(baseDir, config.bundle.outDir),
  },
  docs: {
    ...config.docs,
    outDir: resolveFrom(baseDir, config.docs.outDir),
    headerTemplate: resolveOptional(baseDir, config.docs.headerTemplate),
    footerTemplate: resolveOptional(baseDir, config.docs.footerTemplate),
  },
  host: {
    ...config.host,
    modules: config.host.modules.map((path) => resolveFrom(baseDir, path)),
  },
});
