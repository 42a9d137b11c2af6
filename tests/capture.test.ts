/**
 * Page Capturer Tests
 *
 * The browser boundary is replaced by FakePage/FakeLauncher. The smoke test
 * at the end needs Playwright browsers: npx playwright install chromium
 */

import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { rm, access, mkdir } from 'fs/promises';
import { join } from 'path';
import {
  PageCapturer,
  createPageCapturer,
  capturePage,
  classifyFailure,
} from '../src/lib/capture/index.js';
import { NavigationTimeoutError } from '../src/lib/browser/index.js';
import { FakeLauncher, FakePage } from './helpers/fake-page.js';

const PAGE_URL = 'https://example.com/';
const OUTPUT = './test-captures/page.png';

describe('PageCapturer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('options', () => {
    it('should use default options when none provided', () => {
      const capturer = createPageCapturer();
      expect(capturer.getOptions()).toEqual({
        browser: 'chromium',
        headless: true,
        maxScrolls: 50,
      });
    });

    it('should keep custom options', () => {
      const capturer = createPageCapturer({ browser: 'firefox', headless: false, maxScrolls: 10 });
      expect(capturer.getOptions()).toEqual({
        browser: 'firefox',
        headless: false,
        maxScrolls: 10,
      });
    });
  });

  describe('captureFull', () => {
    it('should return the screenshot path and the extracted content', async () => {
      const page = new FakePage({
        finalUrl: 'https://www.example.com/',
        title: 'Example Domain',
        bodyText: 'Example Domain\nThis domain is for examples.',
        html: '<html><body><h1>Example Domain</h1></body></html>',
        scrollHeight: 900,
        elements: {
          h1: [{ text: 'Example Domain' }],
          'meta[name="viewport"]': [{ attributes: { content: 'width=device-width' } }],
        },
      });
      const launcher = new FakeLauncher(page);
      const capturer = new PageCapturer({ launcher });

      const outcome = await capturer.captureFull({ url: PAGE_URL, outputPath: OUTPUT });

      expect(outcome).toEqual({
        ok: true,
        value: {
          screenshotPath: OUTPUT,
          url: 'https://www.example.com/',
          title: 'Example Domain',
          textContent: 'Example Domain\nThis domain is for examples.',
          html: '<html><body><h1>Example Domain</h1></body></html>',
          meta: { viewport: 'width=device-width' },
          images: [],
          headings: { h1: ['Example Domain'] },
        },
      });
    });

    it('should navigate once and extract after the screenshot', async () => {
      const page = new FakePage({ scrollHeight: 900 });
      const launcher = new FakeLauncher(page);

      await new PageCapturer({ launcher }).captureFull({ url: PAGE_URL, outputPath: OUTPUT });

      expect(page.gotoCalls).toEqual([
        { url: PAGE_URL, options: { waitUntil: 'load', timeoutMs: 30000 } },
      ]);
      expect(page.events.filter(event => event === 'goto')).toHaveLength(1);
      expect(page.events.indexOf('screenshot')).toBeLessThan(page.events.indexOf('title'));
      expect(page.events.indexOf('innerText:body')).toBeLessThan(page.events.indexOf('close'));
      expect(page.events[page.events.length - 1]).toBe('close');
    });

    it('should return a frozen snapshot', async () => {
      const page = new FakePage({
        elements: { img: [{ attributes: { src: '/a.png' } }], h2: [{ text: 'Sub' }] },
      });
      const outcome = await new PageCapturer({ launcher: new FakeLauncher(page) }).captureFull({
        url: PAGE_URL,
        outputPath: OUTPUT,
      });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(Object.isFrozen(outcome.value)).toBe(true);
      expect(Object.isFrozen(outcome.value.images)).toBe(true);
      expect(Object.isFrozen(outcome.value.images[0])).toBe(true);
      expect(Object.isFrozen(outcome.value.headings)).toBe(true);
      expect(Object.isFrozen(outcome.value.headings.h2)).toBe(true);
      expect(Object.isFrozen(outcome.value.meta)).toBe(true);
    });

    it('should report a navigation timeout without a partial snapshot', async () => {
      const page = new FakePage({
        navigationError: new NavigationTimeoutError(PAGE_URL, 5000),
      });
      const launcher = new FakeLauncher(page);

      const outcome = await new PageCapturer({ launcher }).captureFull({
        url: PAGE_URL,
        outputPath: OUTPUT,
        timeoutMs: 5000,
      });

      expect(outcome).toEqual({
        ok: false,
        failure: {
          kind: 'navigation-timeout',
          message: 'Page load timed out after 5000ms: https://example.com/',
        },
      });
      expect(page.screenshots).toHaveLength(0);
      expect(launcher.closed).toBe(1);
      expect(console.error).toHaveBeenCalledWith('[Capture] Page load timed out (5000ms)');
    });

    it('should report other failures as unclassified and still close the browser', async () => {
      const page = new FakePage({ screenshotError: new Error('disk full') });
      const launcher = new FakeLauncher(page);

      const outcome = await new PageCapturer({ launcher }).captureFull({
        url: PAGE_URL,
        outputPath: OUTPUT,
      });

      expect(outcome).toEqual({
        ok: false,
        failure: { kind: 'unclassified', message: 'disk full' },
      });
      expect(launcher.closed).toBe(1);
    });

    it('should report a failed title read as unclassified', async () => {
      const page = new FakePage();
      page.title = async () => {
        throw new Error('Target closed');
      };
      const launcher = new FakeLauncher(page);

      const outcome = await new PageCapturer({ launcher }).captureFull({
        url: PAGE_URL,
        outputPath: OUTPUT,
      });

      expect(outcome).toEqual({
        ok: false,
        failure: { kind: 'unclassified', message: 'Target closed' },
      });
      expect(launcher.closed).toBe(1);
    });
  });

  describe('captureImage', () => {
    it('should take a full-page PNG with animations disabled', async () => {
      const page = new FakePage({ scrollHeight: 900 });
      const launcher = new FakeLauncher(page);

      const ok = await new PageCapturer({ launcher }).captureImage({ url: PAGE_URL, outputPath: OUTPUT });

      expect(ok).toBe(true);
      expect(page.screenshots).toEqual([
        { path: OUTPUT, fullPage: true, animations: 'disabled', scale: 'device', type: 'png' },
      ]);
      expect(launcher.closed).toBe(1);
    });

    it('should not extract content', async () => {
      const page = new FakePage();
      await new PageCapturer({ launcher: new FakeLauncher(page) }).captureImage({
        url: PAGE_URL,
        outputPath: OUTPUT,
      });

      expect(page.events).not.toContain('title');
      expect(page.events).not.toContain('innerText:body');
    });

    it('should open the session with the request viewport and timeout', async () => {
      const launcher = new FakeLauncher(new FakePage());

      await new PageCapturer({ launcher }).captureImage({ url: PAGE_URL, outputPath: OUTPUT });
      await new PageCapturer({ launcher }).captureImage({
        url: PAGE_URL,
        outputPath: OUTPUT,
        viewport: { width: 390, height: 844 },
        timeoutMs: 60000,
      });

      expect(launcher.opened).toEqual([
        { viewport: { width: 1920, height: 1080 }, timeoutMs: 30000 },
        { viewport: { width: 390, height: 844 }, timeoutMs: 60000 },
      ]);
    });

    it('should wait after load, then scroll for lazy content', async () => {
      const page = new FakePage({ scrollHeight: 2000 });

      await new PageCapturer({ launcher: new FakeLauncher(page) }).captureImage({
        url: PAGE_URL,
        outputPath: OUTPUT,
        waitMs: 1500,
        scrollDelayMs: 250,
      });

      expect(page.events).toEqual([
        'goto',
        'wait:1500',
        'scroll:0',
        'wait:250',
        'scroll:1080',
        'wait:250',
        'scroll:0',
        'wait:250',
        'screenshot',
        'close',
      ]);
    });

    it('should not scroll for viewport-only captures', async () => {
      const page = new FakePage({ scrollHeight: 5000 });

      await new PageCapturer({ launcher: new FakeLauncher(page) }).captureImage({
        url: PAGE_URL,
        outputPath: OUTPUT,
        fullPage: false,
        waitMs: 0,
      });

      expect(page.scrolls).toHaveLength(0);
      expect(page.idleWaits).toHaveLength(0);
      expect(page.waits).toHaveLength(0);
      expect(page.screenshots[0].fullPage).toBe(false);
    });

    it('should not scroll when the step delay is zero', async () => {
      const page = new FakePage({ scrollHeight: 5000 });

      await new PageCapturer({ launcher: new FakeLauncher(page) }).captureImage({
        url: PAGE_URL,
        outputPath: OUTPUT,
        scrollDelayMs: 0,
      });

      expect(page.scrolls).toHaveLength(0);
      expect(page.screenshots[0].fullPage).toBe(true);
    });

    it('should pass the scroll cap to the lazy-load trigger', async () => {
      const page = new FakePage({ scrollHeight: scrollCount => 1000 + scrollCount * 5000 });

      await new PageCapturer({ launcher: new FakeLauncher(page), maxScrolls: 3 }).captureImage({
        url: PAGE_URL,
        outputPath: OUTPUT,
        waitMs: 0,
      });

      expect(page.scrolls).toEqual([0, 1080, 2160, 0]);
    });

    it('should return false on a navigation timeout', async () => {
      const page = new FakePage({ navigationError: new NavigationTimeoutError(PAGE_URL, 30000) });
      const launcher = new FakeLauncher(page);

      const ok = await new PageCapturer({ launcher }).captureImage({ url: PAGE_URL, outputPath: OUTPUT });

      expect(ok).toBe(false);
      expect(launcher.closed).toBe(1);
    });

    it('should keep a successful result when closing the browser fails', async () => {
      const launcher = new FakeLauncher(new FakePage(), { closeError: new Error('boom') });

      const ok = await new PageCapturer({ launcher }).captureImage({ url: PAGE_URL, outputPath: OUTPUT });

      expect(ok).toBe(true);
      expect(console.error).toHaveBeenCalledWith('[Capture] Failed to close browser: boom');
    });

    it('should report a launch failure', async () => {
      const launcher = new FakeLauncher(new FakePage(), {
        openError: new Error('Executable does not exist'),
      });

      const outcome = await new PageCapturer({ launcher }).captureImageResult({
        url: PAGE_URL,
        outputPath: OUTPUT,
      });

      expect(outcome).toEqual({
        ok: false,
        failure: { kind: 'unclassified', message: 'Executable does not exist' },
      });
      expect(launcher.closed).toBe(0);
    });
  });

  describe('captureImageResult', () => {
    it('should resolve to the screenshot path', async () => {
      const outcome = await new PageCapturer({
        launcher: new FakeLauncher(new FakePage()),
      }).captureImageResult({ url: PAGE_URL, outputPath: OUTPUT });

      expect(outcome).toEqual({ ok: true, value: OUTPUT });
    });

    it('should distinguish a navigation timeout', async () => {
      const page = new FakePage({ navigationError: new NavigationTimeoutError(PAGE_URL, 100) });

      const outcome = await new PageCapturer({ launcher: new FakeLauncher(page) }).captureImageResult({
        url: PAGE_URL,
        outputPath: OUTPUT,
        timeoutMs: 100,
      });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.failure.kind).toBe('navigation-timeout');
    });
  });

  describe('request validation', () => {
    it('should reject a non-positive viewport before launching', async () => {
      const launcher = new FakeLauncher(new FakePage());

      const outcome = await new PageCapturer({ launcher }).captureFull({
        url: PAGE_URL,
        outputPath: OUTPUT,
        viewport: { width: 0, height: 800 },
      });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.failure.kind).toBe('invalid-request');
      expect(outcome.failure.message).toContain('viewport.width');
      expect(launcher.opened).toHaveLength(0);
    });

    it('should reject negative durations', async () => {
      const launcher = new FakeLauncher(new FakePage());

      const ok = await new PageCapturer({ launcher }).captureImage({
        url: PAGE_URL,
        outputPath: OUTPUT,
        waitMs: -1,
      });

      expect(ok).toBe(false);
      expect(launcher.opened).toHaveLength(0);
    });

    it('should reject non-http URLs', async () => {
      const launcher = new FakeLauncher(new FakePage());

      const outcome = await new PageCapturer({ launcher }).captureImageResult({
        url: 'ftp://example.com/file',
        outputPath: OUTPUT,
      });

      expect(outcome).toEqual({
        ok: false,
        failure: {
          kind: 'invalid-request',
          message: 'url: URL must start with http:// or https://',
        },
      });
    });
  });

  describe('capturePage', () => {
    it('should run a full capture with a fresh capturer', async () => {
      const page = new FakePage({ title: 'One-shot' });

      const outcome = await capturePage(
        { url: PAGE_URL, outputPath: OUTPUT },
        { launcher: new FakeLauncher(page) }
      );

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.value.title).toBe('One-shot');
    });
  });
});

describe('classifyFailure', () => {
  it('should classify navigation timeouts', () => {
    expect(classifyFailure(new NavigationTimeoutError('https://a.test/', 10)).kind).toBe(
      'navigation-timeout'
    );
  });

  it('should stringify non-Error values', () => {
    expect(classifyFailure('socket hang up')).toEqual({
      kind: 'unclassified',
      message: 'socket hang up',
    });
  });
});

// Browser-dependent tests - require: npx playwright install chromium
describe.skipIf(!process.env.PLAYWRIGHT_DEPS)('PageCapturer (requires browser)', () => {
  const outputDir = './test-captures-browser';

  afterAll(async () => {
    try {
      await rm(outputDir, { recursive: true, force: true });
    } catch {}
  });

  it('should capture a live page', async () => {
    const outputPath = join(outputDir, 'example.png');
    await mkdir(outputDir, { recursive: true });

    const outcome = await createPageCapturer().captureFull({
      url: 'https://example.com',
      outputPath,
      waitMs: 100,
      scrollDelayMs: 100,
    });

    expect(outcome.ok).toBe(true);
    await expect(access(outputPath)).resolves.toBeUndefined();
  }, 60000);
});
