import type { ExampleRecord, ExtractedFields, ParameterRecord } from '../../types.js';
import { DEFAULT_HELP_LAYOUT, type HelpLayout } from './layout.js';

export interface HelpParser {
  parse(text: string): ExtractedFields;
  parseSynopsis(text: string): string;
}

type ScalarField = 'name' | 'synopsis' | 'syntax' | 'description';
type ParameterField = keyof HelpLayout['parameterFields'];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const normalizeNewlines = (text: string): string => text.replace(/\r\n?/g, '\n');

// Matches the end of input inside a lookahead
const END = '(?![\\s\\S])';

/**
 * Scrapes the fixed-width text layout produced by `Get-Help -Full`.
 * Missing sections come back as empty strings or empty lists.
 */
export class TextHelpParser implements HelpParser {
  private readonly scalarPatterns: Record<ScalarField, RegExp>;
  private readonly parametersSection: RegExp;
  private readonly parameterAnchor: RegExp;
  private readonly fieldPatterns: Record<ParameterField, RegExp>;
  private readonly fieldLabels: string[];
  private readonly exampleBlock: RegExp;
  private readonly tabIndent: string;

  constructor(layout: HelpLayout = DEFAULT_HELP_LAYOUT) {
    const { headers, parameterFields, anchorIndent, tabWidth, exampleLabel, exampleGap } = layout;
    this.tabIndent = ' '.repeat(tabWidth);

    const scalar = (token: string): RegExp =>
      new RegExp(`^${escapeRegExp(token)}[ \\t]*\\n(?:[ \\t]*\\n)*[ \\t]+(\\S[^\\n]*?)[ \\t]*$`, 'm');

    this.scalarPatterns = {
      name: scalar(headers.name),
      synopsis: scalar(headers.synopsis),
      syntax: scalar(headers.syntax),
      description: scalar(headers.description),
    };

    this.parametersSection = new RegExp(
      `^${escapeRegExp(headers.parameters)}[ \\t]*\\n([\\s\\S]*?)(?=^\\S|${END})`,
      'm'
    );

    // An anchor owns the blank and more deeply indented lines after it, so a
    // block stops at the next anchor or at <CommonParameters>.
    this.parameterAnchor = new RegExp(
      `^[ \\t]{0,${anchorIndent}}-(?!-)(\\S[^\\n]*?)[ \\t]*(?:\\n|${END})` +
        `((?:[ \\t]*\\n|[ \\t]{${anchorIndent + 1},}\\S[^\\n]*(?:\\n|${END}))*)`,
      'gm'
    );

    const field = (label: string): RegExp =>
      new RegExp(`^[ \\t]*${escapeRegExp(label)}[ \\t]*([^\\n]*?)[ \\t]*$`, 'm');

    this.fieldPatterns = {
      required: field(parameterFields.required),
      position: field(parameterFields.position),
      defaultValue: field(parameterFields.defaultValue),
      pipelineInput: field(parameterFields.pipelineInput),
      wildcards: field(parameterFields.wildcards),
    };
    this.fieldLabels = Object.values(parameterFields);

    const label = escapeRegExp(exampleLabel);
    this.exampleBlock = new RegExp(
      `^[ \\t]*-+[ \\t]*${label}[ \\t]+(\\d+)\\b[^\\n]*\\n([\\s\\S]*?)` +
        `(?=\\n(?:[ \\t]*\\n){${exampleGap}}|\\n[ \\t]*-+[ \\t]*${label}[ \\t]+\\d|\\n\\S|${END})`,
      'gm'
    );
  }

  parse(text: string): ExtractedFields {
    const source = this.normalize(text);

    return {
      name: this.scalar(source, 'name'),
      synopsis: this.scalar(source, 'synopsis'),
      syntax: this.scalar(source, 'syntax'),
      description: this.scalar(source, 'description'),
      parameters: this.parseParameters(source),
      examples: this.parseExamples(source),
    };
  }

  parseSynopsis(text: string): string {
    return this.scalar(this.normalize(text), 'synopsis');
  }

  /** Unix newlines, and indentation measured in spaces */
  private normalize(text: string): string {
    return normalizeNewlines(text).replace(/^[ \t]+/gm, (indent) => indent.replace(/\t/g, this.tabIndent));
  }

  private scalar(source: string, key: ScalarField): string {
    return this.scalarPatterns[key].exec(source)?.[1] ?? '';
  }

  private parseParameters(source: string): ParameterRecord[] {
    const section = this.parametersSection.exec(source)?.[1];
    if (!section) {
      return [];
    }

    const records: ParameterRecord[] = [];
    for (const match of section.matchAll(this.parameterAnchor)) {
      const body = match[2] ?? '';
      records.push({
        name: match[1],
        description: this.parameterDescription(body),
        required: this.field(body, 'required'),
        position: this.field(body, 'position'),
        defaultValue: this.field(body, 'defaultValue'),
        pipelineInput: this.field(body, 'pipelineInput'),
        wildcards: this.field(body, 'wildcards'),
      });
    }
    return records;
  }

  /** Non-blank lines ahead of the first attribute line, joined into one */
  private parameterDescription(body: string): string {
    const lines: string[] = [];
    for (const raw of body.split('\n')) {
      const line = raw.trim();
      if (this.fieldLabels.some((label) => line.startsWith(label))) {
        break;
      }
      if (line) {
        lines.push(line);
      }
    }
    return lines.join(' ');
  }

  private field(body: string, key: ParameterField): string {
    return this.fieldPatterns[key].exec(body)?.[1] ?? '';
  }

  private parseExamples(source: string): ExampleRecord[] {
    return Array.from(source.matchAll(this.exampleBlock), (match) => ({
      number: Number.parseInt(match[1], 10),
      body: match[2].trim(),
    }));
  }
}

export const defaultHelpParser: HelpParser = new TextHelpParser();
