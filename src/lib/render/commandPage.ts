import { writeFile } from 'fs/promises';
import { ensureDir } from 'fs-extra';
import type { CommandFailure, ExtractedFields, ParameterRecord, ProgressCallback } from '../../types.js';
import { HELP_WIDTH } from '../../constants.js';
import { DEFAULT_HELP_LAYOUT } from '../help/layout.js';
import { defaultHelpParser, type HelpParser } from '../help/parser.js';
import { readHelpDocument } from '../help/document.js';
import type { CommandHost } from '../host/types.js';
import { resolveTargets } from '../targets.js';
import { runBatch } from '../batch.js';
import { getCommandPagePath } from '../paths.js';
import { EMPTY_TEMPLATES, type PageTemplates } from '../templates.js';
import { escapeHtml, wrapPage } from './html.js';

const labels = DEFAULT_HELP_LAYOUT.parameterFields;

const renderParameter = (parameter: ParameterRecord): string[] => {
  const rows: [string, string][] = [
    ['Description', parameter.description],
    [labels.required, parameter.required],
    [labels.position, parameter.position],
    [labels.defaultValue, parameter.defaultValue],
    [labels.pipelineInput, parameter.pipelineInput],
    [labels.wildcards, parameter.wildcards],
  ];

  return [
    `<h3>-${escapeHtml(parameter.name)}</h3>`,
    '<table>',
    ...rows.map(([label, value]) => `<tr><th>${label}</th><td>${value}</td></tr>`),
    '</table>',
  ];
};

/** HTML body of one command page, without header and footer */
export const renderCommandPage = (fields: ExtractedFields): string => {
  const lines = [
    `<h1>${fields.name}</h1>`,
    `<p>${fields.synopsis}</p>`,
    '<h2>Syntax</h2>',
    `<pre>${escapeHtml(fields.syntax)}</pre>`,
    '<h2>Description</h2>',
    `<p>${fields.description}</p>`,
  ];

  if (fields.parameters.length > 0) {
    lines.push('<h2>Parameters</h2>');
    for (const parameter of fields.parameters) {
      lines.push(...renderParameter(parameter));
    }
  }

  for (const example of fields.examples) {
    lines.push(`<h2>Example ${example.number}</h2>`, `<pre>${example.body}</pre>`);
  }

  return lines.join('\n') + '\n';
};

export interface WriteCommandPagesOptions {
  host: CommandHost;
  /** A command name, or a module name to render every command of */
  target: string;
  outDir: string;
  templates?: PageTemplates;
  /** Commands of a module to skip */
  exclude?: Iterable<string>;
  parser?: HelpParser;
  width?: number;
  continueOnError?: boolean;
  onProgress?: ProgressCallback;
}

export interface CommandPageResult {
  kind: 'command' | 'module';
  written: string[];
  failed: CommandFailure[];
}

export const writeCommandPage = async (
  command: string,
  options: Pick<WriteCommandPagesOptions, 'host' | 'outDir' | 'templates' | 'parser' | 'width'>
): Promise<string> => {
  const parser = options.parser ?? defaultHelpParser;
  const { header, footer } = options.templates ?? EMPTY_TEMPLATES;

  const text = await readHelpDocument(options.host, command, options.width ?? HELP_WIDTH);
  const page = wrapPage(header, renderCommandPage(parser.parse(text)), footer);

  const outputPath = getCommandPagePath(options.outDir, command);
  await writeFile(outputPath, page, 'utf-8');
  return outputPath;
};

/**
 * Render `<outDir>/<Command>.html` for a command, or for every command of a
 * module. Unknown names fail before anything is written.
 */
export const writeCommandPages = async (options: WriteCommandPagesOptions): Promise<CommandPageResult> => {
  const { kind, commands } = await resolveTargets(options.host, options.target, options.exclude);

  await ensureDir(options.outDir);

  const { results, failed } = await runBatch(commands, (command) => writeCommandPage(command, options), {
    continueOnError: options.continueOnError,
    onProgress: options.onProgress,
  });

  return { kind, written: results.map((result) => result.value), failed };
};
