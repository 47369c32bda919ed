/**
 * Environment Settings
 *
 * Caller-side defaults for a capture run. The CLI loads `.env` and hands
 * process.env to loadEnvSettings(); resolveCaptureConfig() turns the
 * settings into the CaptureConfig the capturer takes.
 */

import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { PlaywrightLauncherOptions } from '../browser/index.js';
import type { CaptureConfig } from '../screenshot/index.js';

// ============================================================================
// Schemas
// ============================================================================

/** Blank variables count as unset */
function blankAsUnset(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function symbolList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
}

export const EnvSettingsSchema = z.object({
  CAPTURE_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  STOCK_SYMBOL: z.preprocess(
    blankAsUnset,
    z
      .string()
      .default('SPY')
      .transform((s) => s.trim().toUpperCase())
  ),
  INDEX_SYMBOLS: z.preprocess(blankAsUnset, z.string().default('').transform(symbolList)),
  OUTPUT_DIR: z.preprocess(blankAsUnset, z.string().default('screenshots')),
  FILENAME: z.preprocess(blankAsUnset, z.string().optional()),
  FILENAME_PREFIX: z.preprocess(blankAsUnset, z.string().default('barchart')),
  TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(30000)),
  SETTLE_MS: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(500)),
  WAIT_UNTIL: z.preprocess(
    blankAsUnset,
    z.enum(['load', 'domcontentloaded', 'networkidle']).default('networkidle')
  ),
  VIEWPORT_WIDTH: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(1440)),
  VIEWPORT_HEIGHT: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(900)),
  BLANK_THRESHOLD: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(255).default(240)),
  BROWSER_EXECUTABLE_PATH: z.preprocess(blankAsUnset, z.string().optional()),
});

// ============================================================================
// Types
// ============================================================================

export type EnvSettings = z.infer<typeof EnvSettingsSchema>;

export type Env = Record<string, string | undefined>;

// ============================================================================
// Constants
// ============================================================================

export const QUOTES_BASE_URL = 'https://www.barchart.com/stocks/quotes';

/** Documented for `--help`: variable, description, default */
export const ENV_VARIABLES: ReadonlyArray<readonly [string, string, string]> = [
  ['CAPTURE_URL', 'Explicit page to capture (skips the symbol URL)', '-'],
  ['STOCK_SYMBOL', 'Symbol whose put/call ratio page is captured', 'SPY'],
  ['INDEX_SYMBOLS', 'Comma-separated symbols quoted with a $ prefix', '-'],
  ['OUTPUT_DIR', 'Base output directory', 'screenshots'],
  ['FILENAME', 'Exact file name, overrides the timestamped one', '-'],
  ['FILENAME_PREFIX', 'Prefix of timestamped file names', 'barchart'],
  ['TIMEOUT_MS', 'Max wait for the page to become ready', '30000'],
  ['SETTLE_MS', 'Extra wait after the page is ready', '500'],
  ['WAIT_UNTIL', 'Readiness signal: load, domcontentloaded, networkidle', 'networkidle'],
  ['VIEWPORT_WIDTH', 'Viewport width in px', '1440'],
  ['VIEWPORT_HEIGHT', 'Viewport height in px', '900'],
  ['BLANK_THRESHOLD', 'Mean RGB level (0-255) above which a capture is flagged blank', '240'],
  ['BROWSER_EXECUTABLE_PATH', 'Chromium binary to use', '-'],
];

// ============================================================================
// Functions
// ============================================================================

export function loadEnvSettings(env: Env): EnvSettings {
  const parsed = EnvSettingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Put/call ratio page of a symbol. Index symbols are quoted as `$SYM`,
 * URL-encoded.
 */
export function buildQuoteUrl(symbol: string, indexSymbols: string[] = []): string {
  const upper = symbol.trim().toUpperCase();
  const urlSymbol = indexSymbols.includes(upper) ? encodeURIComponent(`$${upper}`) : upper;
  return `${QUOTES_BASE_URL}/${urlSymbol}/put-call-ratios`;
}

export function resolveCaptureConfig(settings: EnvSettings): CaptureConfig {
  const shared = {
    filename: settings.FILENAME,
    timeoutMs: settings.TIMEOUT_MS,
    settleMs: settings.SETTLE_MS,
    waitUntil: settings.WAIT_UNTIL,
    viewport: { width: settings.VIEWPORT_WIDTH, height: settings.VIEWPORT_HEIGHT },
    blankThreshold: settings.BLANK_THRESHOLD,
  };

  if (settings.CAPTURE_URL) {
    return {
      ...shared,
      url: settings.CAPTURE_URL,
      outputDir: settings.OUTPUT_DIR,
      filenamePrefix: settings.FILENAME_PREFIX,
    };
  }

  const symbol = settings.STOCK_SYMBOL;
  return {
    ...shared,
    url: buildQuoteUrl(symbol, settings.INDEX_SYMBOLS),
    outputDir: join(settings.OUTPUT_DIR, symbol),
    filenamePrefix: `${settings.FILENAME_PREFIX}_${symbol}`,
  };
}

export function resolveLauncherOptions(settings: EnvSettings): PlaywrightLauncherOptions {
  return { executablePath: settings.BROWSER_EXECUTABLE_PATH };
}
