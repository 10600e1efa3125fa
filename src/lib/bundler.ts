import { createHash } from 'crypto';
import { readFile, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import fg from 'fast-glob';
import { NotFoundError } from '../errors.js';
import { DEFAULT_BUNDLE_EXTENSION, DEFAULT_SCRIPT_EXTENSION } from '../constants.js';
import { getBundlePath, isDirectory } from './paths.js';

export interface BundleModuleOptions {
  moduleName: string;
  sourceDir: string;
  outDir: string;
  /** Glob matched against file names; matching files are left out */
  exclude?: string;
  scriptExtension?: string;
  bundleExtension?: string;
}

export interface BundleResult {
  outputPath: string;
  /** Absolute paths of the bundled files, in bundle order */
  files: string[];
  /** Bytes written to `outputPath` */
  content: Buffer;
  /** SHA-256 of each bundled file's bytes, keyed by its absolute path */
  hashes: Record<string, string>;
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const SEPARATOR = Buffer.from('\n');

/** Script bytes go through untouched apart from a leading UTF-8 BOM */
const stripBom = (bytes: Buffer): Buffer =>
  bytes.subarray(0, UTF8_BOM.length).equals(UTF8_BOM) ? bytes.subarray(UTF8_BOM.length) : bytes;

export const hashContent = (content: Buffer | string): string => {
  return createHash('sha256').update(content).digest('hex');
};

/**
 * List the script files directly inside `sourceDir`, minus the excluded
 * names, sorted by file name.
 */
export const listScriptFiles = async (
  sourceDir: string,
  scriptExtension: string = DEFAULT_SCRIPT_EXTENSION,
  exclude?: string
): Promise<string[]> => {
  const names = await fg(`*.${scriptExtension}`, {
    cwd: sourceDir,
    onlyFiles: true,
    deep: 1,
    dot: true,
    caseSensitiveMatch: false,
    ignore: exclude ? [exclude] : [],
  });

  return names
    .sort((a, b) => a.localeCompare(b, 'en', { sensitivity: 'base' }))
    .map((name) => join(sourceDir, name));
};

/**
 * Concatenate every script file of `sourceDir` into
 * `<outDir>/<moduleName>.<bundleExtension>`, replacing any existing file.
 * Bytes are copied as they are, so ANSI scripts stay ANSI; only each file's
 * UTF-8 BOM is dropped. Hashes cover the files as read, BOM included.
 * Loading the written module is left to the caller.
 */
export const bundleModule = async (options: BundleModuleOptions): Promise<BundleResult> => {
  const sourceDir = resolve(options.sourceDir);
  const outDir = resolve(options.outDir);

  if (!(await isDirectory(sourceDir))) {
    throw new NotFoundError('directory', sourceDir);
  }
  if (!(await isDirectory(outDir))) {
    throw new NotFoundError('directory', outDir);
  }

  const files = await listScriptFiles(sourceDir, options.scriptExtension, options.exclude);
  const parts: Buffer[] = [];
  const hashes: Record<string, string> = {};

  for (const file of files) {
    const bytes = await readFile(file);
    hashes[file] = hashContent(bytes);
    if (parts.length > 0) {
      parts.push(SEPARATOR);
    }
    parts.push(stripBom(bytes));
  }

  const content = Buffer.concat(parts);
  const outputPath = getBundlePath(outDir, options.moduleName, options.bundleExtension ?? DEFAULT_BUNDLE_EXTENSION);
  await writeFile(outputPath, content);

  return { outputPath, files, content, hashes };
};
