/**
 * Capture Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, afterAll, type Mock } from 'vitest';
import { run } from '../src/cli/run.js';
import type { BrowserLauncher, PlaywrightLauncherOptions } from '../src/lib/browser/index.js';
import { ConfigError, NavigationError } from '../src/lib/errors/index.js';
import { FakeLauncher } from './helpers/fakeBrowser.js';
import { access, rm } from 'fs/promises';
import { join } from 'path';

const TEST_OUTPUT_DIR = './test-cli-output';
const FIXED_NOW = new Date(2024, 0, 5, 9, 3, 7);

describe('run', () => {
  let launcher: FakeLauncher;
  let createLauncher: Mock<(options: PlaywrightLauncherOptions) => BrowserLauncher>;

  beforeEach(async () => {
    try {
      await rm(TEST_OUTPUT_DIR, { recursive: true, force: true });
    } catch {}

    launcher = new FakeLauncher();
    createLauncher = vi.fn<(options: PlaywrightLauncherOptions) => BrowserLauncher>(() => launcher);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(async () => {
    try {
      await rm(TEST_OUTPUT_DIR, { recursive: true, force: true });
    } catch {}
  });

  it('should print help and exit zero', async () => {
    const code = await run(['--help'], {}, { createLauncher });

    expect(code).toBe(0);
    expect(createLauncher).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('BLANK_THRESHOLD'));
  });

  it('should capture the symbol page and exit zero', async () => {
    const code = await run(
      [],
      { OUTPUT_DIR: TEST_OUTPUT_DIR, STOCK_SYMBOL: 'aapl' },
      { createLauncher, now: () => FIXED_NOW }
    );

    expect(code).toBe(0);
    expect(createLauncher).toHaveBeenCalledWith({ executablePath: undefined });
    expect(launcher.gotoCalls[0].url).toBe(
      'https://www.barchart.com/stocks/quotes/AAPL/put-call-ratios'
    );
    await expect(
      access(join(TEST_OUTPUT_DIR, 'AAPL', 'barchart_AAPL_20240105_090307.png'))
    ).resolves.toBeUndefined();
  });

  it('should report a failed capture with its stack and exit non-zero', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    launcher.behavior.gotoError = new Error('net::ERR_NAME_NOT_RESOLVED');

    const code = await run([], { OUTPUT_DIR: TEST_OUTPUT_DIR }, { createLauncher });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('❌ Capture failed:', expect.any(NavigationError));
    const [, reported] = errorSpy.mock.calls[0];
    expect(reported).toHaveProperty(
      'stack',
      expect.stringContaining(
        'Failed to load https://www.barchart.com/stocks/quotes/SPY/put-call-ratios'
      )
    );
    await expect(access(TEST_OUTPUT_DIR)).rejects.toThrow();
  });

  it('should exit non-zero on invalid settings without launching a browser', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await run([], { TIMEOUT_MS: 'soon' }, { createLauncher });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('❌ Capture failed:', expect.any(ConfigError));
    expect(createLauncher).not.toHaveBeenCalled();
  });
});
