/**
 * Screenshot Capture Module
 *
 * Opens one page in a headless browser, waits for it to settle, and writes
 * a full-page PNG to the output directory. One browser per capture; the
 * browser is closed whether the capture succeeds or not.
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { z } from 'zod';
import {
  PlaywrightLauncher,
  withBrowserSession,
  type BrowserLauncher,
  type SessionPage,
} from '../browser/index.js';
import {
  CaptureError,
  ConfigError,
  EngineError,
  FilesystemError,
  NavigationError,
  describeError,
} from '../errors/index.js';
import { isBlankImage } from './blank.js';
import { buildTimestampedFilename, isPng } from './filename.js';

// ============================================================================
// Schemas
// ============================================================================

const BasenameSchema = z
  .string()
  .min(1)
  .refine(
    (value) => !/[\\/]/.test(value) && value !== '.' && value !== '..',
    'must be a plain file name without path separators'
  );

const ViewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const CaptureConfigSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'URL must start with http:// or https://'),
  outputDir: z.string().min(1),
  filename: BasenameSchema.optional(),
  filenamePrefix: BasenameSchema.default('screenshot'),
  timeoutMs: z.number().int().positive().default(30000),
  waitUntil: z.enum(['load', 'domcontentloaded', 'networkidle']).default('networkidle'),
  settleMs: z.number().int().min(0).default(500),
  viewport: ViewportSchema.default({ width: 1440, height: 900 }),
  /** Mean RGB level above which a capture counts as blank */
  blankThreshold: z.number().min(0).max(255).default(240),
});

// ============================================================================
// Types
// ============================================================================

/** What callers pass; everything but url and outputDir has a default */
export type CaptureConfig = z.input<typeof CaptureConfigSchema>;
export type ResolvedCaptureConfig = z.infer<typeof CaptureConfigSchema>;

export interface CaptureResult {
  url: string;
  title: string;
  /** HTTP status of the main document */
  status: number | null;
  filename: string;
  /** Path of the written PNG */
  path: string;
  bytes: number;
  /** Mostly white capture, saved anyway */
  blank: boolean;
  capturedAt: string;
  /** Navigation + readiness wait, in ms */
  loadTime: number;
}

export interface CapturerOptions {
  launcher?: BrowserLauncher;
  /** Clock used for derived filenames */
  now?: () => Date;
}

// ============================================================================
// Screenshot Capturer
// ============================================================================

export class ScreenshotCapturer {
  private launcher: BrowserLauncher;
  private now: () => Date;

  constructor(options: CapturerOptions = {}) {
    this.launcher = options.launcher ?? new PlaywrightLauncher();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate a capture config and fill in defaults
   */
  resolve(config: CaptureConfig): ResolvedCaptureConfig {
    const parsed = CaptureConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigError(
        'Invalid capture config',
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  /**
   * Capture one full-page screenshot
   */
  async capture(config: CaptureConfig): Promise<CaptureResult> {
    const opts = this.resolve(config);

    console.log(`[Screenshot] Capturing ${opts.url}...`);

    return withBrowserSession(this.launcher, async (session) => {
      let page: SessionPage;
      try {
        page = await session.newPage({ viewport: opts.viewport });
      } catch (error) {
        throw new EngineError(`Failed to open a page: ${describeError(error)}`, { cause: error });
      }

      let result: CaptureResult;
      try {
        result = await this.captureOnPage(page, opts);
      } catch (error) {
        try {
          await page.close();
        } catch (closeError) {
          console.error('[Screenshot] Failed to close page after error:', describeError(closeError));
        }
        throw error;
      }

      // Already saved; the session close releases the page.
      try {
        await page.close();
      } catch (closeError) {
        console.log(`[Screenshot] ⚠️ Failed to close page: ${describeError(closeError)}`);
      }
      return result;
    });
  }

  // --------------------------------------------------------------------------
  // Steps
  // --------------------------------------------------------------------------

  private async captureOnPage(
    page: SessionPage,
    opts: ResolvedCaptureConfig
  ): Promise<CaptureResult> {
    const startTime = Date.now();
    const status = await this.navigate(page, opts);
    const loadTime = Date.now() - startTime;

    const { title, image } = await this.render(page);
    const blank = await this.checkBlank(image, opts.blankThreshold);

    const capturedAt = this.now();
    const filename = opts.filename ?? buildTimestampedFilename(opts.filenamePrefix, capturedAt);
    const path = join(opts.outputDir, filename);

    await this.write(opts.outputDir, path, image);

    console.log(`[Screenshot] ✓ Saved ${path} (${image.length} bytes, loaded in ${loadTime}ms)`);

    return {
      url: opts.url,
      title,
      status,
      filename,
      path,
      bytes: image.length,
      blank,
      capturedAt: capturedAt.toISOString(),
      loadTime,
    };
  }

  private async navigate(page: SessionPage, opts: ResolvedCaptureConfig): Promise<number | null> {
    try {
      const { status } = await page.goto(opts.url, {
        timeoutMs: opts.timeoutMs,
        waitUntil: opts.waitUntil,
      });

      if (status !== null && status >= 400) {
        console.log(`[Screenshot] ⚠️ ${opts.url} answered HTTP ${status}, capturing anyway`);
      }

      await page.settle(opts.settleMs);
      return status;
    } catch (error) {
      throw new NavigationError(
        opts.url,
        `Failed to load ${opts.url}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private async render(page: SessionPage): Promise<{ title: string; image: Buffer }> {
    let title: string;
    let image: Buffer;
    try {
      title = await page.title();
      image = await page.screenshot({ fullPage: true });
    } catch (error) {
      throw new CaptureError(`Screenshot failed: ${describeError(error)}`, { cause: error });
    }

    if (!isPng(image)) {
      throw new CaptureError(`Screenshot is not a PNG image (${image.length} bytes)`);
    }

    return { title, image };
  }

  /**
   * Warn about a mostly white capture; it is saved anyway.
   */
  private async checkBlank(image: Buffer, threshold: number): Promise<boolean> {
    let blank: boolean;
    try {
      blank = await isBlankImage(image, threshold);
    } catch (error) {
      console.log(`[Screenshot] ⚠️ Could not analyse image: ${describeError(error)}`);
      return false;
    }

    if (blank) {
      console.log(`[Screenshot] ⚠️ Blank page detected (RGB mean above ${threshold}), saving anyway`);
    }
    return blank;
  }

  /**
   * Write via a temp file in the same directory. A failed write leaves
   * nothing at `path`.
   */
  private async write(outputDir: string, path: string, image: Buffer): Promise<void> {
    try {
      await mkdir(outputDir, { recursive: true });
    } catch (error) {
      throw new FilesystemError(
        outputDir,
        `Cannot create output directory ${outputDir}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const tempPath = join(outputDir, `.${basename(path)}.${process.pid}.tmp`);
    try {
      await writeFile(tempPath, image);
      await rename(tempPath, path);
    } catch (error) {
      try {
        await rm(tempPath, { force: true });
      } catch (cleanupError) {
        console.error(`[Screenshot] Failed to remove ${tempPath}:`, describeError(cleanupError));
      }
      throw new FilesystemError(path, `Cannot write ${path}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScreenshotCapturer(options?: CapturerOptions): ScreenshotCapturer {
  return new ScreenshotCapturer(options);
}

/**
 * Quick capture function
 */
export async function captureScreenshot(
  config: CaptureConfig,
  options?: CapturerOptions
): Promise<CaptureResult> {
  return new ScreenshotCapturer(options).capture(config);
}
