import { join, dirname } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJsonPath = join(__dirname, '..', 'package.json');
let VERSION_VALUE = '0.0.0'; // fallback
try {
  const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    VERSION_VALUE = pkg.version;
  }
} catch {
  // package.json is not shipped next to the build
}
export const VERSION = VERSION_VALUE;
export const DESCRIPTION = 'Bundle PowerShell script modules and generate command reference pages';
export const APP_NAME = 'cmdoc';

/** Directory holding the default header/footer templates */
export const TEMPLATES_DIR = join(__dirname, '..', 'templates');

export const DEFAULT_SCRIPT_EXTENSION = 'ps1';
export const DEFAULT_BUNDLE_EXTENSION = 'psm1';
export const DEFAULT_DOCS_DIR = 'docs';
export const DEFAULT_CMDLETS_DIR = 'cmdlets';
export const MARKDOWN_SUMMARY_FILE = 'README.md';

/**
 * Column width the help text is rendered at. The extractor relies on every
 * paragraph fitting on one line, so keep this wide.
 */
export const HELP_WIDTH = 500;

export const IN_PROGRESS_MARKER = 'IN PROGRESS';

export const DEFAULT_PWSH = 'pwsh';
