export { bundleCommand } from './bundle.js';
export { pageCommand } from './page.js';
export { summaryCommand } from './summary.js';
