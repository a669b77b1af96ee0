/**
 * Runtime Layer
 *
 * Process environment and host conveniences.
 */

export { Environment, type RunMode } from './environment.ts';
export { browserCommand, openInBrowser, type BrowserCommand } from './browser.ts';
