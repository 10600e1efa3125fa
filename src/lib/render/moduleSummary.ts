import { writeFile } from 'fs/promises';
import { join } from 'path';
import { ensureDir } from 'fs-extra';
import type { CommandFailure, ModuleEntry, ProgressCallback, SummaryFormat } from '../../types.js';
import { ConfigError } from '../../errors.js';
import { DEFAULT_CMDLETS_DIR, HELP_WIDTH, IN_PROGRESS_MARKER, MARKDOWN_SUMMARY_FILE } from '../../constants.js';
import { defaultHelpParser, type HelpParser } from '../help/parser.js';
import { readHelpDocument } from '../help/document.js';
import type { CommandHost } from '../host/types.js';
import { createNameSet, hasName, resolveModuleCommands } from '../targets.js';
import { runBatch } from '../batch.js';
import { outputFileName } from '../paths.js';
import { EMPTY_TEMPLATES, type PageTemplates } from '../templates.js';
import { wrapPage } from './html.js';

const countCommands = (count: number): string => `${count} ${count === 1 ? 'command' : 'commands'}`;

const introSentence = (moduleName: string, count: number): string =>
  `The ${moduleName} module contains ${countCommands(count)}.`;

const withSynopsis = (link: string, synopsis: string): string => (synopsis ? `${link} - ${synopsis}` : link);

export const renderHtmlSummary = (
  moduleName: string,
  entries: ModuleEntry[],
  inProgress: Iterable<string> = [],
  cmdletsDir: string = DEFAULT_CMDLETS_DIR
): string => {
  const flagged = createNameSet(inProgress);
  const items = entries.map((entry) => {
    const marker = hasName(flagged, entry.name) ? `<strong>${IN_PROGRESS_MARKER}</strong> ` : '';
    const link = `<a href="${cmdletsDir}/${entry.name}.html">${entry.name}</a>`;
    return `<li>${marker}${withSynopsis(link, entry.synopsis)}</li>`;
  });

  return [`<p>${introSentence(moduleName, entries.length)}</p>`, '<ul>', ...items, '</ul>'].join('\n') + '\n';
};

export const renderMarkdownSummary = (
  moduleName: string,
  entries: ModuleEntry[],
  inProgress: Iterable<string>,
  baseUrl: string
): string => {
  const flagged = createNameSet(inProgress);
  const root = baseUrl.replace(/\/+$/, '');
  const items = entries.map((entry) => {
    const marker = hasName(flagged, entry.name) ? `**${IN_PROGRESS_MARKER}** ` : '';
    const link = `[${entry.name}](${root}/${entry.name}.html)`;
    return `- ${marker}${withSynopsis(link, entry.synopsis)}`;
  });

  return [`# ${moduleName}`, '', introSentence(moduleName, entries.length), '', ...items].join('\n') + '\n';
};

export interface CollectEntriesOptions {
  host: CommandHost;
  moduleName: string;
  exclude?: Iterable<string>;
  parser?: HelpParser;
  width?: number;
  continueOnError?: boolean;
  onProgress?: ProgressCallback;
}

/**
 * Synopsis of every command in a module. When a command's help cannot be
 * read and the batch continues, its entry keeps an empty synopsis.
 */
export const collectModuleEntries = async (
  options: CollectEntriesOptions
): Promise<{ entries: ModuleEntry[]; failed: CommandFailure[] }> => {
  const parser = options.parser ?? defaultHelpParser;
  const commands = await resolveModuleCommands(options.host, options.moduleName, options.exclude);

  const { results, failed } = await runBatch(
    commands,
    async (command) => parser.parseSynopsis(await readHelpDocument(options.host, command, options.width ?? HELP_WIDTH)),
    { continueOnError: options.continueOnError, onProgress: options.onProgress }
  );

  const synopses = new Map(results.map((result) => [result.command, result.value]));
  const entries = commands.map((name) => ({ name, synopsis: synopses.get(name) ?? '' }));
  return { entries, failed };
};

export interface WriteModuleSummaryOptions extends CollectEntriesOptions {
  format: SummaryFormat;
  outDir: string;
  /** Overrides `<Module>.html` / `README.md` */
  fileName?: string;
  inProgress?: Iterable<string>;
  /** Required for Markdown */
  baseUrl?: string;
  cmdletsDir?: string;
  /** Wrapped around the HTML summary */
  templates?: PageTemplates;
}

export interface ModuleSummaryResult {
  outputPath: string;
  entries: ModuleEntry[];
  failed: CommandFailure[];
}

export const defaultSummaryFileName = (moduleName: string, format: SummaryFormat): string =>
  format === 'markdown' ? MARKDOWN_SUMMARY_FILE : outputFileName(moduleName, 'html');

export const writeModuleSummary = async (options: WriteModuleSummaryOptions): Promise<ModuleSummaryResult> => {
  const { format, moduleName, baseUrl } = options;
  if (format === 'markdown' && !baseUrl) {
    throw new ConfigError('the Markdown summary needs a documentation base URL', [
      'Pass --base-url <url>',
      'Set docs.baseUrl in your config',
    ]);
  }

  const { entries, failed } = await collectModuleEntries(options);

  let content: string;
  if (format === 'markdown' && baseUrl) {
    content = renderMarkdownSummary(moduleName, entries, options.inProgress ?? [], baseUrl);
  } else {
    const { header, footer } = options.templates ?? EMPTY_TEMPLATES;
    content = wrapPage(header, renderHtmlSummary(moduleName, entries, options.inProgress, options.cmdletsDir), footer);
  }

  await ensureDir(options.outDir);
  const outputPath = join(options.outDir, options.fileName ?? defaultSummaryFileName(moduleName, format));
  await writeFile(outputPath, content, 'utf-8');

  return { outputPath, entries, failed };
};
