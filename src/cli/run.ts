/**
 * Capture command: resolves settings, captures once, reports.
 *
 * Returns the process exit code instead of exiting so the entry point
 * stays a one-liner.
 */

import {
  ENV_VARIABLES,
  loadEnvSettings,
  resolveCaptureConfig,
  resolveLauncherOptions,
  type Env,
} from '../lib/config/index.js';
import {
  PlaywrightLauncher,
  type BrowserLauncher,
  type PlaywrightLauncherOptions,
} from '../lib/browser/index.js';
import { createScreenshotCapturer } from '../lib/screenshot/index.js';

export interface RunOptions {
  createLauncher?: (options: PlaywrightLauncherOptions) => BrowserLauncher;
  now?: () => Date;
}

function printHelp(): void {
  const width = Math.max(...ENV_VARIABLES.map(([name]) => name.length));
  const rows = ENV_VARIABLES.map(
    ([name, description, fallback]) =>
      `  ${name.padEnd(width)}  ${description} (default: ${fallback})`
  );

  console.log(`
Quote Snap - Page Capture

Usage:
  npx tsx src/cli/screenshot.ts

Captures one full-page PNG of a quotes page. There are no flags: set the
variables below in the environment or in a .env file.

Environment:
${rows.join('\n')}

Before the first run:
  npx playwright install chromium
`);
}

export async function run(args: string[], env: Env, options: RunOptions = {}): Promise<number> {
  if (args[0] === '--help' || args[0] === '-h') {
    printHelp();
    return 0;
  }

  const createLauncher =
    options.createLauncher ?? ((launcherOptions) => new PlaywrightLauncher(launcherOptions));

  try {
    const settings = loadEnvSettings(env);
    const config = resolveCaptureConfig(settings);

    console.log('📸 Quote Snap - Page Capture\n');
    console.log(`URL: ${config.url}`);
    console.log(`Output: ${config.outputDir}`);
    console.log('');

    const capturer = createScreenshotCapturer({
      launcher: createLauncher(resolveLauncherOptions(settings)),
      now: options.now,
    });

    const startTime = Date.now();
    const result = await capturer.capture(config);
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

    console.log(`\n✅ Captured "${result.title}" in ${elapsed}s`);
    console.log(`  ✓ ${result.path} (${result.bytes} bytes)`);
    if (result.blank) {
      console.log('  ⚠️ The page looks blank');
    }
    return 0;
  } catch (error) {
    console.error('❌ Capture failed:', error);
    return 1;
  }
}
