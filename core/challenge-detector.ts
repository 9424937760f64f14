/**
 * ChallengeDetector
 *
 * Classifies a page snapshot as clear or blocked. Checks run in a fixed order
 * and the first match wins: title, URL, content-marker allowlist, challenge
 * selectors, then body text. `classify` is pure; `inspect` captures a fresh
 * signal from a live page and fails open when the page cannot be queried.
 */

import type { BrowserPage, ChallengeVerdict, PageErrorKind, PageSignal } from '../types/browser';
import { fail, isFail, ok, type Result } from '../utils/result';
import { createModuleLogger } from '../utils/logger';
import { ErrorCode } from './errors';

const logger = createModuleLogger('ChallengeDetector');

export const CHALLENGE_TITLES = [
  'just a moment...',
  'attention required! | cloudflare',
  'please wait...',
  'checking your browser',
] as const;

export const CHALLENGE_URL_MARKERS = [
  '__cf_chl',
  '/cdn-cgi/',
  'challenges.cloudflare.com',
  'cf-challenge',
] as const;

export interface MarkerRule {
  selector: string;
  reason: string;
  /** Generic selectors must be visible to count; hidden template nodes match them too */
  requireVisible: boolean;
}

export const CHALLENGE_MARKERS: readonly MarkerRule[] = [
  { selector: '#cf-challenge-running', reason: 'selector:#cf-challenge-running', requireVisible: false },
  { selector: 'form#challenge-form', reason: 'selector:form#challenge-form', requireVisible: false },
  {
    selector: "iframe[src*='challenges.cloudflare.com']",
    reason: 'selector:cloudflare-iframe',
    requireVisible: false,
  },
  { selector: "iframe[src*='hcaptcha.com']", reason: 'selector:hcaptcha-iframe', requireVisible: true },
  { selector: "iframe[src*='recaptcha']", reason: 'selector:recaptcha-iframe', requireVisible: true },
  { selector: '.cf-turnstile', reason: 'selector:cf-turnstile', requireVisible: true },
  { selector: '[data-sitekey]', reason: 'selector:data-sitekey', requireVisible: true },
];

export const CHALLENGE_BODY_PHRASES = [
  'verify you are human',
  'additional verification required',
  "please verify you're a human",
  'checking your browser before accessing',
] as const;

const CLEAR: ChallengeVerdict = { kind: 'clear' };

function blocked(reason: string): ChallengeVerdict {
  return { kind: 'blocked', reason };
}

export interface ChallengeDetectorOptions {
  /** Selectors that only render on a genuine content page */
  contentMarkers?: string[];
}

export interface Inspection {
  verdict: ChallengeVerdict;
  /** `null` when the page could not be queried and the verdict failed open */
  signal: PageSignal | null;
}

export class ChallengeDetector {
  private readonly contentMarkers: readonly string[];

  constructor(options: ChallengeDetectorOptions = {}) {
    this.contentMarkers = [...(options.contentMarkers ?? [])];
  }

  classify(signal: PageSignal): ChallengeVerdict {
    const title = signal.title.toLowerCase();
    for (const marker of CHALLENGE_TITLES) {
      if (title.includes(marker)) return blocked(`title:${marker}`);
    }

    const url = signal.url.toLowerCase();
    for (const marker of CHALLENGE_URL_MARKERS) {
      if (url.includes(marker)) return blocked(`url:${marker}`);
    }

    for (const selector of this.contentMarkers) {
      if (signal.markerPresence[selector]) return CLEAR;
    }

    for (const rule of CHALLENGE_MARKERS) {
      const hit = rule.requireVisible ? signal.markerVisible[rule.selector] : signal.markerPresence[rule.selector];
      if (hit) return blocked(rule.reason);
    }

    const body = signal.bodyText.toLowerCase();
    for (const phrase of CHALLENGE_BODY_PHRASES) {
      if (body.includes(phrase)) return blocked(`body:${phrase}`);
    }

    return CLEAR;
  }

  /**
   * Builds a fresh PageSignal covering every selector the classifier reads.
   */
  async capture(page: BrowserPage): Promise<Result<PageSignal, PageErrorKind>> {
    const title = await page.title();
    if (isFail(title)) return title;
    const url = await page.url();
    if (isFail(url)) return url;

    const markerPresence: Record<string, boolean> = {};
    const markerVisible: Record<string, boolean> = {};

    const presenceSelectors = [
      ...this.contentMarkers,
      ...CHALLENGE_MARKERS.filter((r) => !r.requireVisible).map((r) => r.selector),
    ];
    for (const selector of presenceSelectors) {
      const found = await page.querySelector(selector);
      if (isFail(found)) return found;
      markerPresence[selector] = found.data !== null;
    }

    for (const rule of CHALLENGE_MARKERS.filter((r) => r.requireVisible)) {
      const visible = await page.isVisible(rule.selector);
      if (isFail(visible)) return visible;
      markerVisible[rule.selector] = visible.data;
    }

    const bodyText = await page.innerText('body');
    if (isFail(bodyText)) return fail(bodyText.error, bodyText.cause);

    return ok(
      Object.freeze({
        title: title.data,
        url: url.data,
        markerPresence: Object.freeze(markerPresence),
        markerVisible: Object.freeze(markerVisible),
        bodyText: bodyText.data,
      }),
    );
  }

  async inspect(page: BrowserPage): Promise<Inspection> {
    const signal = await this.capture(page);
    if (isFail(signal)) {
      logger.debug('Page query failed during detection, treating page as clear', {
        kind: signal.error,
        errorCode: ErrorCode.DETECTION_FAILED,
      });
      return { verdict: CLEAR, signal: null };
    }
    return { verdict: this.classify(signal.data), signal: signal.data };
  }
}
