/**
 * Screenshot Module
 *
 * Provides:
 * - Full-page PNG capture of a single URL
 * - Zod-validated capture config with defaults
 * - Timestamped file naming (`<prefix>_<YYYYMMDD_HHMMSS>.png`)
 */

export {
  ScreenshotCapturer,
  createScreenshotCapturer,
  captureScreenshot,
  CaptureConfigSchema,
  type CaptureConfig,
  type ResolvedCaptureConfig,
  type CaptureResult,
  type CapturerOptions,
} from './capture.js';

export {
  PNG_SIGNATURE,
  formatTimestamp,
  buildTimestampedFilename,
  isPng,
} from './filename.js';

export { isBlankImage, meanRgb, DEFAULT_BLANK_THRESHOLD } from './blank.js';
