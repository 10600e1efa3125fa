export { TextHelpParser, defaultHelpParser, type HelpParser } from './parser.js';
export { DEFAULT_HELP_LAYOUT, type HelpLayout } from './layout.js';
export { decodeHelpText, readHelpDocument } from './document.js';
