/**
 * Quote Snap - full-page screenshots of financial quote pages
 *
 * Opens a quotes page in headless Chromium, waits for it to settle and
 * saves a timestamped PNG.
 */

export * from './lib/errors/index.js';

export * from './lib/browser/index.js';

export * from './lib/screenshot/index.js';

export * from './lib/config/index.js';

// Version
export const VERSION = '0.1.0';
