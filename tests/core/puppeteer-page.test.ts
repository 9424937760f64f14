import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CookieParam } from 'puppeteer-core';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { type PageDriver, PuppeteerPage } from '../../core/puppeteer-page';

class FakeDriver implements PageDriver {
  titleText = 'Jobs';
  currentUrl = 'https://jobs.example.com/search?q=go';
  evaluateResult: unknown = null;
  error: Error | null = null;
  scripts: string[] = [];
  initScripts: string[] = [];
  reloads: Array<{ waitUntil: 'domcontentloaded'; timeout: number }> = [];
  cookies: CookieParam[] = [];
  userAgent: string | null = null;
  image = Uint8Array.from([137, 80, 78, 71]);

  private check(): void {
    if (this.error) throw this.error;
  }

  async title(): Promise<string> {
    this.check();
    return this.titleText;
  }

  url(): string {
    this.check();
    return this.currentUrl;
  }

  async evaluate(script: string): Promise<unknown> {
    this.check();
    this.scripts.push(script);
    return this.evaluateResult;
  }

  async evaluateOnNewDocument(script: string): Promise<unknown> {
    this.check();
    this.initScripts.push(script);
    return { identifier: '1' };
  }

  async reload(options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown> {
    this.check();
    this.reloads.push(options);
    return null;
  }

  async screenshot(): Promise<Uint8Array> {
    this.check();
    return this.image;
  }

  async content(): Promise<string> {
    this.check();
    return '<html><body>Jobs</body></html>';
  }

  async setCookie(...cookies: CookieParam[]): Promise<void> {
    this.check();
    this.cookies.push(...cookies);
  }

  async setUserAgent(userAgent: string): Promise<void> {
    this.check();
    this.userAgent = userAgent;
  }
}

describe('PuppeteerPage', () => {
  let driver: FakeDriver;
  let page: PuppeteerPage;

  beforeEach(() => {
    driver = new FakeDriver();
    page = new PuppeteerPage(driver, 15000);
  });

  test('wraps driver values in results', async () => {
    expect(await page.title()).toEqual({ success: true, data: 'Jobs' });
    expect(await page.url()).toEqual({ success: true, data: 'https://jobs.example.com/search?q=go' });
    expect(await page.content()).toEqual({ success: true, data: '<html><body>Jobs</body></html>' });
  });

  test('evaluates scripts with a serialised argument', async () => {
    driver.evaluateResult = 2;

    const result = await page.evaluate('(arg) => arg.n + 1', { n: 1 });

    expect(result).toEqual({ success: true, data: 2 });
    expect(driver.scripts).toEqual(['((arg) => arg.n + 1)({"n":1})']);
  });

  test('passes null when no argument is given', async () => {
    await page.evaluate('() => 1');

    expect(driver.scripts).toEqual(['(() => 1)(null)']);
  });

  test('keeps only string attributes of a matched element', async () => {
    driver.evaluateResult = { 'data-sitekey': '0xKEY', class: 'cf-turnstile', tabindex: 3 };

    expect(await page.querySelector('.cf-turnstile')).toEqual({
      success: true,
      data: { attributes: { 'data-sitekey': '0xKEY', class: 'cf-turnstile' } },
    });

    driver.evaluateResult = null;
    expect(await page.querySelector('.missing')).toEqual({ success: true, data: null });
  });

  test('treats only a literal true as visible', async () => {
    driver.evaluateResult = true;
    expect(await page.isVisible('.cf-turnstile')).toEqual({ success: true, data: true });

    driver.evaluateResult = 'yes';
    expect(await page.isVisible('.cf-turnstile')).toEqual({ success: true, data: false });
  });

  test('returns an empty string for non-text inner text', async () => {
    driver.evaluateResult = 42;

    expect(await page.innerText('body')).toEqual({ success: true, data: '' });
  });

  test.each([
    ['Navigating frame was detached', 'detached-frame'],
    ['Execution context was destroyed, most likely because of a navigation', 'navigation-race'],
    ['Protocol error (Runtime.evaluate): Target closed', 'target-closed'],
    ['Navigation timeout of 15000 ms exceeded', 'timeout'],
    ['something else', 'unknown'],
  ])('maps "%s" to %s', async (message, kind) => {
    const error = new Error(message);
    driver.error = error;

    const result = await page.title();

    expect(result).toEqual({ success: false, error: kind, cause: error });
  });

  test('installs init scripts and reloads with the navigation timeout', async () => {
    await page.addInitScript('window.x = 1;');
    await page.reload();

    expect(driver.initScripts).toEqual(['window.x = 1;']);
    expect(driver.reloads).toEqual([{ waitUntil: 'domcontentloaded', timeout: 15000 }]);
  });

  test('sets cookies and the user agent', async () => {
    const result = await page.addCookies([
      {
        name: 'cf_clearance',
        value: 'v',
        domain: '.jobs.example.com',
        path: '/',
        expires: -1,
        httpOnly: true,
        secure: true,
        sameSite: 'Lax',
      },
    ]);
    await page.setUserAgent('Mozilla/5.0 Test');

    expect(result).toEqual({ success: true, data: undefined });
    expect(driver.cookies).toEqual([
      {
        name: 'cf_clearance',
        value: 'v',
        domain: '.jobs.example.com',
        path: '/',
        expires: -1,
        httpOnly: true,
        secure: true,
        sameSite: 'Lax',
      },
    ]);
    expect(driver.userAgent).toBe('Mozilla/5.0 Test');
  });

  describe('screenshot', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'puppeteer-page-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('writes the captured image to disk', async () => {
      const file = path.join(dir, 'shot.png');

      expect(await page.screenshot(file)).toEqual({ success: true, data: undefined });
      expect([...fs.readFileSync(file)]).toEqual([137, 80, 78, 71]);
    });
  });
});
