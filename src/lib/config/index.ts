/**
 * Config Module
 *
 * Provides:
 * - Zod-validated environment settings (blank values count as unset)
 * - Quote page URL building for stock and index symbols
 * - Mapping from settings to a CaptureConfig
 */

export {
  EnvSettingsSchema,
  ENV_VARIABLES,
  QUOTES_BASE_URL,
  loadEnvSettings,
  buildQuoteUrl,
  resolveCaptureConfig,
  resolveLauncherOptions,
  type EnvSettings,
  type Env,
} from './env.js';
