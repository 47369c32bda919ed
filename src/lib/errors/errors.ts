/**
 * Capture Errors
 *
 * Every failure of a capture run is a CaptureError. The subclasses mark the
 * stage that failed so callers can report it without string matching.
 */

// ============================================================================
// Types
// ============================================================================

export type CaptureStage = 'config' | 'engine' | 'navigation' | 'capture' | 'filesystem';

// ============================================================================
// Errors
// ============================================================================

export class CaptureError extends Error {
  readonly stage: CaptureStage;

  constructor(message: string, options: { stage?: CaptureStage; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CaptureError';
    this.stage = options.stage ?? 'capture';
  }
}

/**
 * Browser binary missing or failed to start.
 */
export class EngineError extends CaptureError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { stage: 'engine', cause: options.cause });
    this.name = 'EngineError';
  }
}

/**
 * Target unreachable, or the readiness signal never arrived.
 */
export class NavigationError extends CaptureError {
  readonly url: string;

  constructor(url: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { stage: 'navigation', cause: options.cause });
    this.name = 'NavigationError';
    this.url = url;
  }
}

export class FilesystemError extends CaptureError {
  readonly path: string;

  constructor(path: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { stage: 'filesystem', cause: options.cause });
    this.name = 'FilesystemError';
    this.path = path;
  }
}

export class ConfigError extends CaptureError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: { cause?: unknown } = {}) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, {
      stage: 'config',
      cause: options.cause,
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
