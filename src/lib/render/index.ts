export { escapeHtml, wrapPage } from './html.js';
export {
  renderCommandPage,
  writeCommandPage,
  writeCommandPages,
  type WriteCommandPagesOptions,
  type CommandPageResult,
} from './commandPage.js';
export {
  renderHtmlSummary,
  renderMarkdownSummary,
  collectModuleEntries,
  writeModuleSummary,
  defaultSummaryFileName,
  type WriteModuleSummaryOptions,
  type ModuleSummaryResult,
} from './moduleSummary.js';
