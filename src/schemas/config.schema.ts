import { z } from 'zod';
import {
  DEFAULT_BUNDLE_EXTENSION,
  DEFAULT_CMDLETS_DIR,
  DEFAULT_DOCS_DIR,
  DEFAULT_PWSH,
  DEFAULT_SCRIPT_EXTENSION,
  HELP_WIDTH,
} from '../constants.js';

/** File extension without the leading dot */
const extensionSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9]+$/, 'Extension must be alphanumeric without a leading dot');

// ============================================================================
// Bundling
// ============================================================================

export const bundleConfigSchema = z
  .object({
    /** Directory holding the loose script files */
    sourceDir: z.string().default('.'),
    /** Directory the bundled module is written to */
    outDir: z.string().default('.'),
    scriptExtension: extensionSchema.default(DEFAULT_SCRIPT_EXTENSION),
    bundleExtension: extensionSchema.default(DEFAULT_BUNDLE_EXTENSION),
    /** Glob matched against file names, e.g. "*.Tests.ps1" */
    exclude: z.string().optional(),
  })
  .default({});

// ============================================================================
// Documentation
// ============================================================================

export const docsConfigSchema = z
  .object({
    outDir: z.string().default(DEFAULT_DOCS_DIR),
    /** Folder the HTML summary links command pages under */
    cmdletsDir: z.string().default(DEFAULT_CMDLETS_DIR),
    headerTemplate: z.string().optional(),
    footerTemplate: z.string().optional(),
    /** Commands never rendered or listed */
    exclude: z.array(z.string()).default([]),
    /** Commands flagged as unfinished in summaries */
    inProgress: z.array(z.string()).default([]),
    /** Absolute URL command pages are published under, used by the Markdown summary */
    baseUrl: z.string().url().optional(),
    helpWidth: z.number().int().min(80).default(HELP_WIDTH),
    /** Keep going when one command of a batch fails */
    continueOnError: z.boolean().default(true),
  })
  .default({});

// ============================================================================
// Host
// ============================================================================

export const hostConfigSchema = z
  .object({
    executable: z.string().default(DEFAULT_PWSH),
    /** Module files imported before every host call */
    modules: z.array(z.string()).default([]),
  })
  .default({});

export const cmdocConfigSchema = z.object({
  bundle: bundleConfigSchema,
  docs: docsConfigSchema,
  host: hostConfigSchema,
});

export type CmdocConfigOutput = z.output<typeof cmdocConfigSchema>;

export const defaultConfig: CmdocConfigOutput = cmdocConfigSchema.parse({});
