import { promises as fs } from 'fs';
import type { CookieParam } from 'puppeteer-core';
import type {
  BrowserContextHandle,
  BrowserCookie,
  BrowserPage,
  ElementInfo,
  JsonValue,
  PageResult,
} from '../types/browser';
import { fail, ok } from '../utils/result';
import { classifyPageError } from './errors';

const ATTRIBUTES_SCRIPT = `(selector) => {
  var el = document.querySelector(selector);
  if (!el) return null;
  var attrs = {};
  for (var i = 0; i < el.attributes.length; i++) {
    attrs[el.attributes[i].name] = el.attributes[i].value;
  }
  return attrs;
}`;

const VISIBLE_SCRIPT = `(selector) => {
  var nodes = document.querySelectorAll(selector);
  for (var i = 0; i < nodes.length; i++) {
    var el = nodes[i];
    var style = window.getComputedStyle(el);
    if (style.display === 'none' || style.visibility === 'hidden' || style.opacity === '0') continue;
    var rect = el.getBoundingClientRect();
    if (rect.width > 0 && rect.height > 0) return true;
  }
  return false;
}`;

const INNER_TEXT_SCRIPT = `(selector) => {
  var el = document.querySelector(selector);
  return el ? el.innerText || el.textContent || '' : '';
}`;

function invoke(script: string, arg: JsonValue | undefined): string {
  return `(${script})(${JSON.stringify(arg ?? null)})`;
}

function toAttributes(value: unknown): ElementInfo | null {
  if (value === null || typeof value !== 'object') return null;
  const attributes: Record<string, string> = {};
  for (const [name, attr] of Object.entries(value)) {
    if (typeof attr === 'string') attributes[name] = attr;
  }
  return { attributes: Object.freeze(attributes) };
}

/**
 * The part of a puppeteer `Page` the adapter drives.
 */
export interface PageDriver {
  title(): Promise<string>;
  url(): string;
  evaluate(script: string): Promise<unknown>;
  evaluateOnNewDocument(script: string): Promise<unknown>;
  reload(options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  screenshot(options: { fullPage: boolean }): Promise<Uint8Array>;
  content(): Promise<string>;
  setCookie(...cookies: CookieParam[]): Promise<void>;
  setUserAgent(userAgent: string): Promise<void>;
}

/**
 * BrowserPage and BrowserContextHandle over a puppeteer page. Every driver
 * exception becomes a `PageErrorKind` failure.
 */
export class PuppeteerPage implements BrowserPage, BrowserContextHandle {
  constructor(
    private readonly page: PageDriver,
    private readonly navigationTimeoutMs = 30000,
  ) {}

  private async guard<T>(fn: () => Promise<T>): Promise<PageResult<T>> {
    try {
      return ok(await fn());
    } catch (error) {
      return fail(classifyPageError(error), error);
    }
  }

  title(): Promise<PageResult<string>> {
    return this.guard(() => this.page.title());
  }

  url(): Promise<PageResult<string>> {
    return this.guard(async () => this.page.url());
  }

  querySelector(selector: string): Promise<PageResult<ElementInfo | null>> {
    return this.guard(async () => toAttributes(await this.page.evaluate(invoke(ATTRIBUTES_SCRIPT, selector))));
  }

  isVisible(selector: string): Promise<PageResult<boolean>> {
    return this.guard(async () => (await this.page.evaluate(invoke(VISIBLE_SCRIPT, selector))) === true);
  }

  innerText(selector: string): Promise<PageResult<string>> {
    return this.guard(async () => {
      const text = await this.page.evaluate(invoke(INNER_TEXT_SCRIPT, selector));
      return typeof text === 'string' ? text : '';
    });
  }

  evaluate(script: string, arg?: JsonValue): Promise<PageResult<unknown>> {
    return this.guard(async (): Promise<unknown> => this.page.evaluate(invoke(script, arg)));
  }

  addInitScript(script: string): Promise<PageResult<void>> {
    return this.guard(async () => {
      await this.page.evaluateOnNewDocument(script);
    });
  }

  reload(): Promise<PageResult<void>> {
    return this.guard(async () => {
      await this.page.reload({ waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
    });
  }

  screenshot(path: string): Promise<PageResult<void>> {
    return this.guard(async () => {
      const image = await this.page.screenshot({ fullPage: true });
      await fs.writeFile(path, image);
    });
  }

  content(): Promise<PageResult<string>> {
    return this.guard(() => this.page.content());
  }

  addCookies(cookies: BrowserCookie[]): Promise<PageResult<void>> {
    return this.guard(async () => {
      await this.page.setCookie(
        ...cookies.map((cookie) => ({
          name: cookie.name,
          value: cookie.value,
          domain: cookie.domain,
          path: cookie.path,
          expires: cookie.expires,
          httpOnly: cookie.httpOnly,
          secure: cookie.secure,
          sameSite: cookie.sameSite,
        })),
      );
    });
  }

  setUserAgent(userAgent: string): Promise<PageResult<void>> {
    return this.guard(() => this.page.setUserAgent(userAgent));
  }
}
