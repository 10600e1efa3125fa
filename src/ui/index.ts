/**
 * UI module exports for the cmdoc CLI
 */

export * from './logger.js';
export * from './spinner.js';
