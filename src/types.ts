export interface ParameterRecord {
  /** Text after the leading dash, e.g. `Name <String>` */
  name: string;
  description: string;
  required: string;
  position: string;
  /** Empty when the help text leaves the value blank */
  defaultValue: string;
  pipelineInput: string;
  wildcards: string;
}

export interface ExampleRecord {
  /** Number as written in the help text; gaps are kept */
  number: number;
  body: string;
}

export interface ExtractedFields {
  name: string;
  synopsis: string;
  syntax: string;
  description: string;
  parameters: ParameterRecord[];
  examples: ExampleRecord[];
}

export interface ModuleEntry {
  name: string;
  synopsis: string;
}

export type SummaryFormat = 'html' | 'markdown';

export type ProgressCallback = (current: number, total: number, command: string) => void;

export interface CommandFailure {
  command: string;
  error: Error;
}

// Command option types

export interface BundleOptions {
  source?: string;
  out?: string;
  exclude?: string;
  reload?: boolean;
  config?: string;
}

export interface PageOptions {
  out?: string;
  header?: string;
  footer?: string;
  exclude?: string[];
  failFast?: boolean;
  import?: string[];
  config?: string;
}

export interface SummaryOptions {
  format?: string;
  out?: string;
  file?: string;
  baseUrl?: string;
  exclude?: string[];
  inProgress?: string[];
  header?: string;
  footer?: string;
  failFast?: boolean;
  import?: string[];
  config?: string;
}
