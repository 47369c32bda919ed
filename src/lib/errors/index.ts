/**
 * Errors Module
 *
 * Provides:
 * - CaptureError base class tagged with the failing stage
 * - EngineError, NavigationError, FilesystemError, ConfigError
 */

export {
  CaptureError,
  EngineError,
  NavigationError,
  FilesystemError,
  ConfigError,
  describeError,
  type CaptureStage,
} from './errors.js';
