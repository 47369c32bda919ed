/**
 * Browser Module
 *
 * Provides:
 * - BrowserLauncher / BrowserSession / SessionPage capability interfaces
 * - withBrowserSession() scoped acquire/release
 * - Playwright-backed launcher (headless Chromium)
 */

export {
  withBrowserSession,
  type BrowserLauncher,
  type BrowserSession,
  type SessionPage,
  type NavigationOptions,
  type NavigationResult,
  type ReadinessSignal,
  type ViewportSize,
} from './session.js';

export { PlaywrightLauncher, type PlaywrightLauncherOptions } from './playwright.js';
