/**
 * Browser Session
 *
 * The capture routine only ever talks to these interfaces. A session is an
 * exclusively-owned browser instance: acquire it with a launcher, release it
 * with close(). withBrowserSession() guarantees the release.
 */

import { EngineError, describeError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export type ReadinessSignal = 'load' | 'domcontentloaded' | 'networkidle';

export interface ViewportSize {
  width: number;
  height: number;
}

export interface NavigationOptions {
  /** Max time to wait for the readiness signal */
  timeoutMs: number;
  waitUntil: ReadinessSignal;
}

export interface NavigationResult {
  /** HTTP status of the main document, null when there was no response */
  status: number | null;
}

export interface SessionPage {
  goto(url: string, options: NavigationOptions): Promise<NavigationResult>;
  /** Wait a fixed time after the readiness signal */
  settle(ms: number): Promise<void>;
  title(): Promise<string>;
  /** PNG bytes of the rendered page */
  screenshot(options: { fullPage: boolean }): Promise<Buffer>;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(options: { viewport: ViewportSize }): Promise<SessionPage>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<BrowserSession>;
}

// ============================================================================
// Scoped session
// ============================================================================

/**
 * Run `fn` against a fresh session and close it on every exit path.
 *
 * When `fn` throws, a failing close is logged and the original error wins.
 * A failing close after success is an EngineError.
 */
export async function withBrowserSession<T>(
  launcher: BrowserLauncher,
  fn: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await launcher.launch();

  let result: T;
  try {
    result = await fn(session);
  } catch (error) {
    try {
      await session.close();
    } catch (closeError) {
      console.error('[Browser] Failed to close browser after error:', describeError(closeError));
    }
    throw error;
  }

  try {
    await session.close();
  } catch (closeError) {
    throw new EngineError(`Failed to close browser: ${describeError(closeError)}`, {
      cause: closeError,
    });
  }
  return result;
}
