import * as os from 'os';
import * as path from 'path';
import { chromium, Browser, BrowserContext, Page } from 'playwright';
import { BrowserLaunchOptions } from '../../../src/application/ports/BrowserPort';
import { PlaywrightBrowserAdapter } from '../../../src/infrastructure/browser/PlaywrightBrowserAdapter';

// Mock playwright
jest.mock('playwright', () => ({
  chromium: {
    launch: jest.fn(),
  },
}));

type Listener = (arg: unknown) => void;

interface FakeLocator {
  count: jest.Mock;
  first: jest.Mock;
  getAttribute: jest.Mock;
  isChecked: jest.Mock;
  check: jest.Mock;
  click: jest.Mock;
}

function fakeLocator(count: number, type: string | null = null, checked = false): FakeLocator {
  const locator: FakeLocator = {
    count: jest.fn().mockResolvedValue(count),
    first: jest.fn(),
    getAttribute: jest.fn().mockResolvedValue(type),
    isChecked: jest.fn().mockResolvedValue(checked),
    check: jest.fn().mockResolvedValue(undefined),
    click: jest.fn().mockResolvedValue(undefined),
  };
  locator.first.mockReturnValue(locator);
  return locator;
}

function fakeRequest(url: string, errorText?: string, redirectedTo: unknown = null) {
  return {
    url: () => url,
    method: () => 'GET',
    failure: () => (errorText ? { errorText } : null),
    redirectedTo: () => redirectedTo,
  };
}

const launchOptions: BrowserLaunchOptions = {
  headless: true,
  viewportWidth: 1280,
  viewportHeight: 720,
  captureConsoleErrors: false,
};

describe('PlaywrightBrowserAdapter', () => {
  let adapter: PlaywrightBrowserAdapter;
  let listeners: Map<string, Listener>;
  let locators: Map<string, FakeLocator>;
  let mockPage: {
    on: jest.Mock;
    goto: jest.Mock;
    waitForLoadState: jest.Mock;
    waitForSelector: jest.Mock;
    locator: jest.Mock;
    screenshot: jest.Mock;
  };
  let mockContext: { newPage: jest.Mock };
  let mockBrowser: { newContext: jest.Mock; close: jest.Mock };

  const emit = (name: string, arg: unknown): void => {
    const listener = listeners.get(name);
    if (!listener) throw new Error(`No listener for ${name}`);
    listener(arg);
  };

  beforeEach(() => {
    jest.clearAllMocks();
    listeners = new Map();
    locators = new Map();

    mockPage = {
      on: jest.fn((name: string, listener: Listener) => listeners.set(name, listener)),
      goto: jest.fn().mockResolvedValue({ status: () => 200 }),
      waitForLoadState: jest.fn().mockResolvedValue(undefined),
      waitForSelector: jest.fn().mockResolvedValue(undefined),
      locator: jest.fn((selector: string) => locators.get(selector) ?? fakeLocator(0)),
      screenshot: jest.fn().mockResolvedValue(Buffer.from('png')),
    };
    mockContext = { newPage: jest.fn().mockResolvedValue(mockPage as unknown as Page) };
    mockBrowser = {
      newContext: jest.fn().mockResolvedValue(mockContext as unknown as BrowserContext),
      close: jest.fn().mockResolvedValue(undefined),
    };

    jest.mocked(chromium.launch).mockResolvedValue(mockBrowser as unknown as Browser);
    adapter = new PlaywrightBrowserAdapter();
  });

  describe('launch', () => {
    it('should launch chromium with the configured viewport', async () => {
      await adapter.launch(launchOptions);

      expect(chromium.launch).toHaveBeenCalledWith({
        headless: true,
        args: ['--no-sandbox', '--disable-dev-shm-usage'],
      });
      expect(mockBrowser.newContext).toHaveBeenCalledWith({ viewport: { width: 1280, height: 720 } });
      expect(mockContext.newPage).toHaveBeenCalled();
    });

    it('should attach traffic and error listeners', async () => {
      await adapter.launch(launchOptions);

      expect(Array.from(listeners.keys())).toEqual(['request', 'response', 'requestfailed', 'pageerror']);
    });

    it('should listen to the console only when asked', async () => {
      await adapter.launch({ ...launchOptions, captureConsoleErrors: true });

      expect(listeners.has('console')).toBe(true);
    });

    it('should wrap launch errors', async () => {
      jest.mocked(chromium.launch).mockRejectedValue(new Error('Executable does not exist'));

      await expect(adapter.launch(launchOptions)).rejects.toMatchObject({
        kind: 'LAUNCH_FAILURE',
        message: 'Browser launch failed: Executable does not exist',
      });
    });
  });

  describe('traffic recording', () => {
    beforeEach(async () => {
      await adapter.launch({ ...launchOptions, captureConsoleErrors: true });
    });

    it('should record completed requests with their status', () => {
      const request = fakeRequest('https://tiles.example.com/t.png');
      emit('request', request);
      emit('response', { request: () => request, status: () => 204 });

      expect(adapter.getRequests()).toEqual([
        {
          url: 'https://tiles.example.com/t.png',
          method: 'GET',
          startedAt: expect.any(Number),
          endedAt: expect.any(Number),
          status: 204,
        },
      ]);
    });

    it('should keep only the final hop of a redirect', () => {
      const final = fakeRequest('https://tiles.example.com/v2/t.png');
      const hop = fakeRequest('https://tiles.example.com/t.png', undefined, final);
      emit('request', hop);
      emit('response', { request: () => hop, status: () => 301 });
      emit('request', final);
      emit('response', { request: () => final, status: () => 200 });

      expect(adapter.getRequests().map(r => [r.url, r.status])).toEqual([['https://tiles.example.com/v2/t.png', 200]]);
    });

    it('should keep an unfollowed 3xx response', () => {
      const request = fakeRequest('https://map.example.org/api/getAIS.php');
      emit('request', request);
      emit('response', { request: () => request, status: () => 304 });

      expect(adapter.getRequests().map(r => r.status)).toEqual([304]);
    });

    it('should record network failures', () => {
      const request = fakeRequest('https://gone.example.com/data', 'net::ERR_NAME_NOT_RESOLVED');
      emit('request', request);
      emit('requestfailed', request);

      const [recorded] = adapter.getRequests();
      expect(recorded.errorText).toBe('net::ERR_NAME_NOT_RESOLVED');
      expect(recorded.status).toBeUndefined();
    });

    it('should leave pending requests open', () => {
      emit('request', fakeRequest('https://tiles.example.com/slow'));

      expect(adapter.getRequests()[0].endedAt).toBeUndefined();
    });

    it('should return copies', () => {
      emit('request', fakeRequest('https://tiles.example.com/t.png'));
      adapter.getRequests()[0].status = 500;

      expect(adapter.getRequests()[0].status).toBeUndefined();
    });

    it('should collect page errors and console errors', () => {
      emit('pageerror', new Error('OpenLayers is not defined'));
      emit('console', { type: () => 'error', text: () => 'Failed to load resource' });
      emit('console', { type: () => 'log', text: () => 'layer ready' });

      expect(adapter.getPageErrors()).toEqual(['OpenLayers is not defined', 'Failed to load resource']);
    });
  });

  describe('navigate', () => {
    it('should fail before launch', async () => {
      await expect(adapter.navigate('https://map.example.org', 1000)).rejects.toMatchObject({
        kind: 'NAVIGATION_FAILURE',
        message: 'Browser not launched. Call launch() first.',
      });
    });

    it('should load the page', async () => {
      await adapter.launch(launchOptions);
      await adapter.navigate('https://map.example.org', 1000);

      expect(mockPage.goto).toHaveBeenCalledWith('https://map.example.org', {
        timeout: 1000,
        waitUntil: 'domcontentloaded',
      });
    });

    it('should reject an error status', async () => {
      mockPage.goto.mockResolvedValue({ status: () => 503 });
      await adapter.launch(launchOptions);

      await expect(adapter.navigate('https://map.example.org', 1000)).rejects.toMatchObject({
        kind: 'NAVIGATION_FAILURE',
        message: 'Page answered HTTP 503',
      });
    });

    it('should map a playwright timeout', async () => {
      const timeout = new Error('page.goto: Timeout 1000ms exceeded.');
      timeout.name = 'TimeoutError';
      mockPage.goto.mockRejectedValue(timeout);
      await adapter.launch(launchOptions);

      await expect(adapter.navigate('https://map.example.org', 1000)).rejects.toMatchObject({
        kind: 'NAVIGATION_TIMEOUT',
        message: 'Navigation to https://map.example.org exceeded 1000ms',
      });
    });

    it('should wait for the ready selector', async () => {
      await adapter.launch(launchOptions);
      await adapter.waitForReady(800, '#map');

      expect(mockPage.waitForLoadState).toHaveBeenCalledWith('load', { timeout: 800 });
      expect(mockPage.waitForSelector).toHaveBeenCalledWith('#map', { state: 'attached', timeout: 800 });
    });
  });

  describe('activateOverlay', () => {
    beforeEach(async () => {
      await adapter.launch(launchOptions);
    });

    it('should check the first existing checkbox', async () => {
      const checkbox = fakeLocator(1, 'checkbox');
      locators.set('#b', checkbox);

      const activation = await adapter.activateOverlay({ selectors: ['#a', '#b'] }, 300);

      expect(activation).toEqual({ activated: true, selector: '#b' });
      expect(checkbox.check).toHaveBeenCalledWith({ timeout: 300, force: true });
    });

    it('should leave an already checked control as is', async () => {
      const checkbox = fakeLocator(1, 'checkbox', true);
      locators.set('#a', checkbox);

      const activation = await adapter.activateOverlay({ selectors: ['#a'] }, 300);

      expect(activation).toEqual({ activated: true, selector: '#a', alreadyActive: true });
      expect(checkbox.check).not.toHaveBeenCalled();
    });

    it('should click other controls after opening the reveal control', async () => {
      const reveal = fakeLocator(1);
      reveal.click.mockRejectedValue(new Error('not visible'));
      const button = fakeLocator(1, null);
      locators.set('#menu', reveal);
      locators.set('#layer', button);

      const activation = await adapter.activateOverlay({ selectors: ['#layer'], revealSelector: '#menu' }, 300);

      expect(activation).toEqual({ activated: true, selector: '#layer' });
      expect(reveal.click).toHaveBeenCalledWith({ timeout: 300 });
      expect(button.click).toHaveBeenCalledWith({ timeout: 300 });
    });

    it('should move on when a candidate cannot be activated', async () => {
      const broken = fakeLocator(1, 'checkbox');
      broken.check.mockRejectedValue(new Error('element is detached'));
      const working = fakeLocator(1, null);
      locators.set('#a', broken);
      locators.set('#b', working);

      const activation = await adapter.activateOverlay({ selectors: ['#a', '#b'] }, 300);

      expect(activation.selector).toBe('#b');
    });

    it('should throw when no selector matches', async () => {
      await expect(adapter.activateOverlay({ selectors: ['#a', '#b'] }, 300)).rejects.toMatchObject({
        kind: 'TRIGGER_NOT_FOUND',
        message: 'No overlay control matched any of: #a, #b',
      });
    });
  });

  describe('screenshot', () => {
    it('should save a screenshot', async () => {
      await adapter.launch(launchOptions);
      const file = path.join(os.tmpdir(), `overlay-shots-${process.pid}`, 'page.png');

      await expect(adapter.screenshot(file)).resolves.toBe(file);
      expect(mockPage.screenshot).toHaveBeenCalledWith({ path: file });
    });
  });

  describe('close', () => {
    it('should close the browser once', async () => {
      await adapter.launch(launchOptions);

      await adapter.close();
      await adapter.close();

      expect(mockBrowser.close).toHaveBeenCalledTimes(1);
    });

    it('should be a no-op when never launched', async () => {
      await expect(adapter.close()).resolves.toBeUndefined();
    });

    it('should report teardown failures', async () => {
      mockBrowser.close.mockRejectedValue(new Error('Target closed'));
      await adapter.launch(launchOptions);

      await expect(adapter.close()).rejects.toMatchObject({
        kind: 'SESSION_TEARDOWN_FAILURE',
        message: 'Browser close failed: Target closed',
      });
    });
  });
});
