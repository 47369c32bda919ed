/**
 * Playwright Launcher Tests
 *
 * Playwright itself is mocked: these check how the launcher drives it.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PlaywrightLauncher } from '../src/lib/browser/index.js';
import { EngineError } from '../src/lib/errors/index.js';
import { PNG_BYTES } from './helpers/fakeBrowser.js';

const { launchMock } = vi.hoisted(() => ({ launchMock: vi.fn() }));

vi.mock('playwright', () => ({
  chromium: { launch: launchMock },
}));

function createFakeBrowser(status: number | null = 200) {
  const page = {
    goto: vi.fn(async () => (status === null ? null : { status: () => status })),
    waitForTimeout: vi.fn(async () => {}),
    title: vi.fn(async () => 'SPY Put/Call Ratios'),
    screenshot: vi.fn(async () => PNG_BYTES),
  };
  const context = {
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => {}),
  };
  const browser = {
    newContext: vi.fn(async () => context),
    close: vi.fn(async () => {}),
  };
  return { page, context, browser };
}

describe('PlaywrightLauncher', () => {
  beforeEach(() => {
    launchMock.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('should launch headless Chromium', async () => {
    const { browser } = createFakeBrowser();
    launchMock.mockResolvedValueOnce(browser);

    await new PlaywrightLauncher({ executablePath: '/opt/chromium/chrome' }).launch();

    expect(launchMock).toHaveBeenCalledWith({
      headless: true,
      executablePath: '/opt/chromium/chrome',
    });
  });

  it('should wrap launch failures in EngineError', async () => {
    launchMock.mockRejectedValueOnce(new Error("Executable doesn't exist"));

    const error = await new PlaywrightLauncher().launch().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({
      stage: 'engine',
      message:
        "Failed to launch Chromium: Executable doesn't exist. " +
        'Run "npx playwright install chromium" or set BROWSER_EXECUTABLE_PATH.',
    });
  });

  it('should drive a page through its own context', async () => {
    const { page, context, browser } = createFakeBrowser(200);
    launchMock.mockResolvedValueOnce(browser);

    const session = await new PlaywrightLauncher().launch();
    const sessionPage = await session.newPage({ viewport: { width: 800, height: 600 } });

    const navigation = await sessionPage.goto('https://quotes.example.com', {
      timeoutMs: 1000,
      waitUntil: 'load',
    });
    await sessionPage.settle(250);
    const title = await sessionPage.title();
    const image = await sessionPage.screenshot({ fullPage: true });

    expect(browser.newContext).toHaveBeenCalledWith({ viewport: { width: 800, height: 600 } });
    expect(page.goto).toHaveBeenCalledWith('https://quotes.example.com', {
      timeout: 1000,
      waitUntil: 'load',
    });
    expect(navigation).toEqual({ status: 200 });
    expect(page.waitForTimeout).toHaveBeenCalledWith(250);
    expect(title).toBe('SPY Put/Call Ratios');
    expect(page.screenshot).toHaveBeenCalledWith({ fullPage: true, type: 'png' });
    expect(image).toBe(PNG_BYTES);

    await sessionPage.close();
    expect(context.close).toHaveBeenCalledTimes(1);

    await session.close();
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('should report a null status when there is no response', async () => {
    const { browser } = createFakeBrowser(null);
    launchMock.mockResolvedValueOnce(browser);

    const session = await new PlaywrightLauncher().launch();
    const sessionPage = await session.newPage({ viewport: { width: 800, height: 600 } });

    await expect(
      sessionPage.goto('about:blank', { timeoutMs: 1000, waitUntil: 'load' })
    ).resolves.toEqual({ status: null });
  });

  it('should skip the settle wait when it is zero', async () => {
    const { page, browser } = createFakeBrowser();
    launchMock.mockResolvedValueOnce(browser);

    const session = await new PlaywrightLauncher().launch();
    const sessionPage = await session.newPage({ viewport: { width: 800, height: 600 } });
    await sessionPage.settle(0);

    expect(page.waitForTimeout).not.toHaveBeenCalled();
  });

  it('should close the context when the page cannot be opened', async () => {
    const { context, browser } = createFakeBrowser();
    context.newPage.mockRejectedValueOnce(new Error('context crashed'));
    launchMock.mockResolvedValueOnce(browser);

    const session = await new PlaywrightLauncher().launch();

    await expect(
      session.newPage({ viewport: { width: 800, height: 600 } })
    ).rejects.toThrow('context crashed');
    expect(context.close).toHaveBeenCalledTimes(1);
  });

  it('should keep the page error when closing the context also fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { context, browser } = createFakeBrowser();
    context.newPage.mockRejectedValueOnce(new Error('context crashed'));
    context.close.mockRejectedValueOnce(new Error('context already closed'));
    launchMock.mockResolvedValueOnce(browser);

    const session = await new PlaywrightLauncher().launch();

    await expect(
      session.newPage({ viewport: { width: 800, height: 600 } })
    ).rejects.toThrow('context crashed');
    expect(errorSpy).toHaveBeenCalledWith(
      '[Browser] Failed to close context after error:',
      'context already closed'
    );
  });
});
