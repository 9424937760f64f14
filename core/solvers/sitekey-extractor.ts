/**
 * Sitekey extraction for Turnstile, hCaptcha and reCAPTCHA v2 widgets.
 *
 * Sources are tried in order: parameters captured by the render hook, DOM
 * attributes, iframe URLs, then regexes over the page source.
 */

import { z } from 'zod';
import type { BrowserPage } from '../../types/browser';
import { isFail, isOk } from '../../utils/result';
import { ExtractorChain, type Extractor } from '../extractor-chain';
import { IFRAME_SOURCES_SCRIPT, READ_HOOK_SCRIPT } from './page-scripts';

export type WidgetKind = 'turnstile' | 'hcaptcha' | 'recaptcha_v2';

export interface ChallengeParams {
  kind: WidgetKind;
  sitekey: string;
  action?: string;
  cdata?: string;
  /** Global function name registered as the widget callback */
  callback?: string;
}

const widgetKindSchema = z.enum(['turnstile', 'hcaptcha', 'recaptcha_v2']);

const hookSnapshotSchema = z.object({
  params: z
    .object({
      kind: widgetKindSchema,
      sitekey: z.string().min(1),
      action: z.string().nullish(),
      cdata: z.string().nullish(),
      callback: z.string().nullish(),
    })
    .nullable(),
  cType: z.string().nullable(),
});

export type HookSnapshot = z.infer<typeof hookSnapshotSchema>;

/** Cloudflare interstitial types that cannot be cleared with a widget token */
const FULL_CHALLENGE_TYPES = new Set(['managed', 'interactive']);

const WIDGET_SELECTORS: Record<WidgetKind, string[]> = {
  turnstile: ['.cf-turnstile', "iframe[src*='challenges.cloudflare.com']"],
  hcaptcha: ['.h-captcha', "iframe[src*='hcaptcha.com']"],
  recaptcha_v2: ['.g-recaptcha', "iframe[src*='recaptcha']"],
};

const WIDGET_ORDER: WidgetKind[] = ['turnstile', 'hcaptcha', 'recaptcha_v2'];

const SOURCE_PATTERNS: RegExp[] = [
  /class=["'][^"']*cf-turnstile[^"']*["'][^>]*data-sitekey=["']([^"']+)["']/i,
  /data-sitekey=["']([^"']+)["'][^>]*class=["'][^"']*cf-turnstile/i,
  /turnstileSiteKey["']?\s*[:=]\s*["']([^"']+)["']/i,
  /data-sitekey=["']([^"']+)["']/i,
  /sitekey['":\s]+['"]([^'"]+)['"]/i,
];

function clean(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Pulls a sitekey out of a widget iframe URL: Cloudflare puts it in a `/0x…`
 * path segment, hCaptcha in `sitekey`, reCAPTCHA in `k`.
 */
export function sitekeyFromIframeSrc(src: string): { kind: WidgetKind; sitekey: string } | null {
  let url: URL;
  try {
    url = new URL(src, 'https://placeholder.invalid');
  } catch {
    return null;
  }

  if (url.hostname.includes('challenges.cloudflare.com')) {
    const segment = url.pathname.match(/\/(0x[a-zA-Z0-9_-]+)/);
    const fromQuery = clean(url.searchParams.get('k')) ?? clean(url.searchParams.get('sitekey'));
    const sitekey = segment ? segment[1] : fromQuery;
    return sitekey ? { kind: 'turnstile', sitekey } : null;
  }
  if (url.hostname.includes('hcaptcha.com')) {
    const sitekey = clean(url.searchParams.get('sitekey'));
    return sitekey ? { kind: 'hcaptcha', sitekey } : null;
  }
  if (url.href.includes('recaptcha')) {
    const sitekey = clean(url.searchParams.get('k'));
    return sitekey ? { kind: 'recaptcha_v2', sitekey } : null;
  }
  return null;
}

export function sitekeyFromSource(html: string): string | null {
  for (const pattern of SOURCE_PATTERNS) {
    const match = html.match(pattern);
    const sitekey = clean(match?.[1]);
    if (sitekey) return sitekey;
  }
  return null;
}

export async function readHookSnapshot(page: BrowserPage): Promise<HookSnapshot | null> {
  const result = await page.evaluate(READ_HOOK_SCRIPT);
  if (isFail(result)) return null;
  const parsed = hookSnapshotSchema.safeParse(result.data);
  return parsed.success ? parsed.data : null;
}

/**
 * True when Cloudflare reports a managed or interactive interstitial, which a
 * widget token will not clear even if a sitekey is present.
 */
export async function isFullChallenge(page: BrowserPage): Promise<boolean> {
  const snapshot = await readHookSnapshot(page);
  return snapshot?.cType ? FULL_CHALLENGE_TYPES.has(snapshot.cType) : false;
}

export async function detectWidgetKind(page: BrowserPage): Promise<WidgetKind> {
  for (const kind of WIDGET_ORDER) {
    for (const selector of WIDGET_SELECTORS[kind]) {
      const found = await page.querySelector(selector);
      if (isOk(found) && found.data !== null) return kind;
    }
  }
  return 'turnstile';
}

const renderHookExtractor: Extractor<BrowserPage, ChallengeParams> = {
  name: 'render-hook',
  async extract(page) {
    const snapshot = await readHookSnapshot(page);
    const params = snapshot?.params;
    if (!params) return null;
    return {
      kind: params.kind,
      sitekey: params.sitekey.trim(),
      action: clean(params.action),
      cdata: clean(params.cdata),
      callback: clean(params.callback),
    };
  },
};

const domAttributeExtractor: Extractor<BrowserPage, ChallengeParams> = {
  name: 'dom-attribute',
  async extract(page) {
    const kind = await detectWidgetKind(page);
    const selectors = [
      ...WIDGET_SELECTORS[kind].filter((s) => !s.startsWith('iframe')),
      '[data-sitekey]',
    ];
    for (const selector of selectors) {
      const found = await page.querySelector(selector);
      if (isFail(found) || found.data === null) continue;
      const attrs = found.data.attributes;
      const sitekey = clean(attrs['data-sitekey']);
      if (sitekey) {
        return {
          kind,
          sitekey,
          action: clean(attrs['data-action']),
          cdata: clean(attrs['data-cdata']),
          callback: clean(attrs['data-callback']),
        };
      }
    }
    return null;
  },
};

const iframeExtractor: Extractor<BrowserPage, ChallengeParams> = {
  name: 'iframe-src',
  async extract(page) {
    const result = await page.evaluate(IFRAME_SOURCES_SCRIPT);
    if (isFail(result)) return null;
    const sources = z.array(z.string()).safeParse(result.data);
    if (!sources.success) return null;
    for (const src of sources.data) {
      const hit = sitekeyFromIframeSrc(src);
      if (hit) return hit;
    }
    return null;
  },
};

const pageSourceExtractor: Extractor<BrowserPage, ChallengeParams> = {
  name: 'page-source',
  async extract(page) {
    const html = await page.content();
    if (isFail(html)) return null;
    const sitekey = sitekeyFromSource(html.data);
    if (!sitekey) return null;
    return { kind: await detectWidgetKind(page), sitekey };
  },
};

export function createSitekeyChain(): ExtractorChain<BrowserPage, ChallengeParams> {
  return new ExtractorChain([renderHookExtractor, domAttributeExtractor, iframeExtractor, pageSourceExtractor]);
}

export class SitekeyExtractor {
  private readonly chain = createSitekeyChain();

  async extract(page: BrowserPage): Promise<(ChallengeParams & { source: string }) | null> {
    const hit = await this.chain.run(page);
    return hit ? { ...hit.value, source: hit.source } : null;
  }
}
