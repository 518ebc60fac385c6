/**
 * Playwright Driver Tests
 *
 * playwright-core is mocked; no browser is started.
 */

import { tmpdir } from 'node:os';
import path from 'node:path';

import { DriverError, createSilentLogger } from '@shiftclock/core';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { PlaywrightDriver } from '../playwright-driver.js';

interface FakeElement {
  text: string;
  visible?: boolean;
  enabled?: boolean;
}

// Use vi.hoisted() so mock objects are available in the vi.mock() factory
const { mockChromium, mockBrowser, mockContext, mockPage } = vi.hoisted(() => {
  const mockPage = {
    setDefaultTimeout: vi.fn(),
    goto: vi.fn(),
    locator: vi.fn(),
    screenshot: vi.fn(),
  };
  const mockContext = {
    newPage: vi.fn(async () => mockPage),
    close: vi.fn(),
  };
  const mockBrowser = {
    newContext: vi.fn(async () => mockContext),
    close: vi.fn(),
  };
  const mockChromium = {
    connectOverCDP: vi.fn(async () => mockBrowser),
    launch: vi.fn(async () => mockBrowser),
  };
  return { mockChromium, mockBrowser, mockContext, mockPage };
});

vi.mock('playwright-core', () => ({ chromium: mockChromium }));

function elementLocator(element: FakeElement | undefined) {
  return {
    isVisible: vi.fn(async () => element?.visible !== false && element !== undefined),
    isEnabled: vi.fn(async () => element?.enabled !== false),
    textContent: vi.fn(async () => element?.text ?? null),
    innerText: vi.fn(async () => element?.text ?? ''),
    waitFor: vi.fn(),
    click: vi.fn(),
    fill: vi.fn(),
  };
}

function page(elements: Record<string, FakeElement[]>): void {
  mockPage.locator.mockImplementation((selector: string) => {
    const matches = elements[selector] ?? [];
    return {
      count: async () => matches.length,
      first: () => elementLocator(matches[0]),
      all: async () => matches.map(elementLocator),
    };
  });
}

function createDriver(overrides: Partial<ConstructorParameters<typeof PlaywrightDriver>[0]> = {}) {
  return new PlaywrightDriver({
    cdpEndpoint: 'http://127.0.0.1:9222',
    headless: true,
    screenshotDir: path.join(tmpdir(), 'shiftclock-driver-test'),
    logger: createSilentLogger(),
    now: () => new Date('2026-03-02T08:30:00.000Z'),
    ...overrides,
  });
}

describe('PlaywrightDriver', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    page({});
  });

  describe('open', () => {
    it('attaches over CDP with a geolocation grant', async () => {
      const driver = createDriver({ geolocation: { latitude: 25.03, longitude: 121.56 } });

      await driver.open();
      await driver.open();

      expect(mockChromium.connectOverCDP).toHaveBeenCalledTimes(1);
      expect(mockChromium.connectOverCDP).toHaveBeenCalledWith('http://127.0.0.1:9222');
      expect(mockBrowser.newContext).toHaveBeenCalledWith({
        geolocation: { latitude: 25.03, longitude: 121.56 },
        permissions: ['geolocation'],
      });
      expect(mockPage.setDefaultTimeout).toHaveBeenCalledWith(15_000);
    });

    it('launches a local browser without an endpoint', async () => {
      const driver = createDriver({
        cdpEndpoint: undefined,
        executablePath: '/usr/bin/chromium',
        headless: false,
      });

      await driver.open();

      expect(mockChromium.launch).toHaveBeenCalledWith({
        headless: false,
        executablePath: '/usr/bin/chromium',
      });
      expect(mockBrowser.newContext).toHaveBeenCalledWith({});
    });

    it('closes the browser when the page cannot be created', async () => {
      mockContext.newPage.mockRejectedValueOnce(new Error('Target closed'));
      const driver = createDriver();

      await expect(driver.open()).rejects.toThrow('open: Target closed');
      expect(mockBrowser.close).toHaveBeenCalledTimes(1);
    });
  });

  it('refuses page operations before open', async () => {
    const error = await createDriver()
      .click('#clock-in')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DriverError);
    expect(error).toHaveProperty('message', 'click: session is not open');
  });

  it('wraps Playwright failures with the operation name', async () => {
    mockPage.goto.mockRejectedValueOnce(new Error('net::ERR_NAME_NOT_RESOLVED'));
    const driver = createDriver();
    await driver.open();

    const error = await driver.navigateTo('https://portal.example.com').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DriverError);
    expect(error).toHaveProperty('message', 'navigateTo: net::ERR_NAME_NOT_RESOLVED');
  });

  it('reads visible texts only', async () => {
    page({
      '.toast': [{ text: 'Clock-in recorded' }, { text: 'stale', visible: false }],
    });
    const driver = createDriver();
    await driver.open();

    expect(await driver.readAllText('.toast')).toEqual(['Clock-in recorded']);
  });

  it('answers null and false for missing elements', async () => {
    const driver = createDriver();
    await driver.open();

    expect(await driver.readText('#clock')).toBeNull();
    expect(await driver.isEnabled('#clock-in')).toBe(false);
    expect(await driver.isVisible('#clock-in')).toBe(false);
  });

  it('reports a disabled button', async () => {
    page({ '#clock-out': [{ text: 'Clock out', enabled: false }] });
    const driver = createDriver();
    await driver.open();

    expect(await driver.isVisible('#clock-out')).toBe(true);
    expect(await driver.isEnabled('#clock-out')).toBe(false);
  });

  it('stores screenshots under a timestamped name', async () => {
    const driver = createDriver();
    await driver.open();

    const file = await driver.captureScreenshot('enter-result');

    const expected = path.join(
      tmpdir(),
      'shiftclock-driver-test',
      '2026-03-02T08-30-00-000Z-enter-result.png'
    );
    expect(file).toBe(expected);
    expect(mockPage.screenshot).toHaveBeenCalledWith({ path: expected, fullPage: true });
  });

  it('closes context and browser once', async () => {
    const driver = createDriver();
    await driver.open();

    await driver.close();
    await driver.close();

    expect(mockContext.close).toHaveBeenCalledTimes(1);
    expect(mockBrowser.close).toHaveBeenCalledTimes(1);
    await expect(driver.fill('#user', 'jdoe')).rejects.toThrow('fill: session is not open');
  });
});
