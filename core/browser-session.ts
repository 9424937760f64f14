/**
 * Browser launch and relaunch.
 * Proxy settings are fixed at launch, so applying a rotated proxy session
 * means closing the browser and starting a new one.
 */

import puppeteerCore from 'puppeteer-core';
import type { Browser } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { BrowserConfig } from '../types/config';
import type { BrowserPage } from '../types/browser';
import { fail, isFail, ok, type Result } from '../utils/result';
import { createEnhancedLogger } from '../utils/logger';
import { CollectorErrors, ErrorClassifier } from './errors';
import type { ProxyDescriptor } from './proxy-session-manager';
import { PuppeteerPage } from './puppeteer-page';
import { RENDER_HOOK_SCRIPT } from './solvers/page-scripts';

const logger = createEnhancedLogger('BrowserSession');

const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

export const BROWSER_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--disable-gpu',
  '--window-size=1280,960',
];

export const BROWSER_VIEWPORT = { width: 1280, height: 960 };

export type LaunchConfig = NonNullable<Parameters<typeof puppeteerCore.launch>[0]>;

export type BrowserLauncher = (options: LaunchConfig) => Promise<Browser>;

/**
 * Chromium launch arguments for a proxy descriptor. Credentials never go on
 * the command line; they are supplied per page through `authenticate`.
 */
export function launchArgs(proxy: ProxyDescriptor | null): string[] {
  const args = [...BROWSER_ARGS];
  if (proxy) {
    args.push(`--proxy-server=${proxy.server}`);
  }
  return args;
}

/**
 * Installs the widget render hook so sitekeys are captured from the widget's
 * own render call on every document the page loads.
 */
export async function installRenderHook(page: BrowserPage): Promise<Result<void, string>> {
  const installed = await page.addInitScript(RENDER_HOOK_SCRIPT);
  if (isFail(installed)) {
    logger.warn('Could not install render hook', { kind: installed.error });
    return fail(installed.error);
  }
  return ok(undefined);
}

export class BrowserSession {
  private browser: Browser | null = null;
  private page: PuppeteerPage | null = null;
  private proxy: ProxyDescriptor | null = null;
  private readonly launcher: BrowserLauncher;

  constructor(
    private readonly config: BrowserConfig,
    launcher?: BrowserLauncher,
  ) {
    this.launcher = launcher ?? ((options) => puppeteer.launch(options));
  }

  get currentProxy(): ProxyDescriptor | null {
    return this.proxy;
  }

  get isOpen(): boolean {
    return this.browser !== null;
  }

  async launch(proxy: ProxyDescriptor | null = null): Promise<PuppeteerPage> {
    if (this.browser) {
      await this.close();
    }

    const executablePath = this.config.executablePath;
    if (!executablePath) {
      throw CollectorErrors.invalidConfiguration(
        'browser.executablePath is required (set PUPPETEER_EXECUTABLE_PATH)',
      );
    }

    if (proxy) {
      logger.info(`Launching with proxy: ${proxy.server}`, { bucket: proxy.bucket, sessionId: proxy.sessionId });
    }

    this.browser = await this.launcher({
      headless: this.config.headless,
      executablePath,
      args: launchArgs(proxy),
      defaultViewport: BROWSER_VIEWPORT,
    });
    this.proxy = proxy;

    let page: PuppeteerPage;
    try {
      const rawPage = await this.browser.newPage();
      if (proxy?.username) {
        await rawPage.authenticate({ username: proxy.username, password: proxy.password ?? '' });
      }
      if (this.config.userAgent) {
        await rawPage.setUserAgent(this.config.userAgent);
      }
      page = new PuppeteerPage(rawPage);
    } catch (error) {
      await this.close();
      throw ErrorClassifier.classify(error, { operation: 'newPage' });
    }

    this.page = page;
    await installRenderHook(page);
    logger.info('Browser launched successfully');
    return page;
  }

  /**
   * Closes the current browser and launches a new one behind `proxy`. Called
   * after `ProxySessionManager.rotate()`.
   */
  async relaunch(proxy: ProxyDescriptor | null): Promise<PuppeteerPage> {
    logger.info('Relaunching browser with rotated proxy session', {
      sessionId: proxy?.sessionId ?? null,
      rotationCount: proxy?.rotationCount ?? 0,
    });
    await this.close();
    return this.launch(proxy);
  }

  getPage(): PuppeteerPage {
    if (!this.page) {
      throw CollectorErrors.browserNotInitialized();
    }
    return this.page;
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (!browser) return;
    try {
      await browser.close();
    } catch (error) {
      logger.warn('Browser close failed', { error: error instanceof Error ? error.message : String(error) });
    }
  }
}
