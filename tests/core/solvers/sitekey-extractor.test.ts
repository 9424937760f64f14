/**
 * Sitekey 提取与 token 注入单元测试
 */

import { describe, expect, test } from 'vitest';
import { IFRAME_SOURCES_SCRIPT, INJECT_TOKEN_SCRIPT, READ_HOOK_SCRIPT } from '../../../core/solvers/page-scripts';
import {
  isFullChallenge,
  SitekeyExtractor,
  sitekeyFromIframeSrc,
  sitekeyFromSource,
} from '../../../core/solvers/sitekey-extractor';
import { injectToken } from '../../../core/solvers/token-injector';
import type { JsonValue } from '../../../types/browser';
import { FakePage } from '../../helpers/fake-page';

describe('SitekeyExtractor', () => {
  test('prefers parameters captured by the render hook', async () => {
    const page = new FakePage({ elements: { '.cf-turnstile': { 'data-sitekey': '0xDOM' } } });
    page.onEvaluate(READ_HOOK_SCRIPT, () => ({
      params: { kind: 'turnstile', sitekey: ' 0xHOOK ', action: 'apply', cdata: null, callback: 'onDone' },
      cType: null,
    }));

    const params = await new SitekeyExtractor().extract(page);

    expect(params).toEqual({
      kind: 'turnstile',
      sitekey: '0xHOOK',
      action: 'apply',
      callback: 'onDone',
      source: 'render-hook',
    });
  });

  test('reads widget attributes from the DOM', async () => {
    const page = new FakePage({ elements: { '.h-captcha': { 'data-sitekey': 'hc-key', 'data-callback': 'cb' } } });

    const params = await new SitekeyExtractor().extract(page);

    expect(params).toEqual({ kind: 'hcaptcha', sitekey: 'hc-key', callback: 'cb', source: 'dom-attribute' });
  });

  test('falls back to widget iframe URLs', async () => {
    const page = new FakePage();
    page.onEvaluate(IFRAME_SOURCES_SCRIPT, () => [
      'https://ads.example.net/frame',
      'https://challenges.cloudflare.com/cdn-cgi/challenge-platform/turnstile/if/ov2/0x4AAAAAAAFRAME/light/normal',
    ]);

    const params = await new SitekeyExtractor().extract(page);

    expect(params).toEqual({ kind: 'turnstile', sitekey: '0x4AAAAAAAFRAME', source: 'iframe-src' });
  });

  test('scans the page source last', async () => {
    const page = new FakePage({ html: '<div class="cf-turnstile" data-sitekey="0xSRC"></div>' });

    const params = await new SitekeyExtractor().extract(page);

    expect(params).toEqual({ kind: 'turnstile', sitekey: '0xSRC', source: 'page-source' });
  });

  test('returns null when no source has a sitekey', async () => {
    expect(await new SitekeyExtractor().extract(new FakePage())).toBeNull();
  });

  test('detects managed interstitials from the hook snapshot', async () => {
    const page = new FakePage();
    page.onEvaluate(READ_HOOK_SCRIPT, () => ({ params: null, cType: 'managed' }));

    expect(await isFullChallenge(page)).toBe(true);
    expect(await isFullChallenge(new FakePage())).toBe(false);
  });
});

describe('sitekey helpers', () => {
  test('sitekeyFromIframeSrc recognises each widget', () => {
    expect(sitekeyFromIframeSrc('https://newassets.hcaptcha.com/captcha/v1/frame?sitekey=hc-1')).toEqual({
      kind: 'hcaptcha',
      sitekey: 'hc-1',
    });
    expect(sitekeyFromIframeSrc('https://www.google.com/recaptcha/api2/anchor?k=6Lc-key&co=x')).toEqual({
      kind: 'recaptcha_v2',
      sitekey: '6Lc-key',
    });
    expect(sitekeyFromIframeSrc('https://example.com/frame')).toBeNull();
  });

  test('sitekeyFromSource matches configuration objects', () => {
    expect(sitekeyFromSource('<script>var cfg = { turnstileSiteKey: "0xCFG" };</script>')).toBe('0xCFG');
    expect(sitekeyFromSource('<p>nothing</p>')).toBeNull();
  });
});

describe('injectToken', () => {
  test('passes the response fields for the widget kind', async () => {
    const page = new FakePage();
    const args: Array<JsonValue | undefined> = [];
    page.onEvaluate(INJECT_TOKEN_SCRIPT, (arg) => {
      args.push(arg);
      return { via: ['input', 'callback'], submitted: false, callbackErrors: [] };
    });

    const result = await injectToken(page, 'tok', 'hcaptcha');

    expect(result).toEqual({ success: true, data: { via: ['input', 'callback'], submitted: false, callbackErrors: [] } });
    expect(args).toEqual([{ token: 'tok', kind: 'hcaptcha', fieldNames: ['h-captcha-response', 'g-recaptcha-response'] }]);
  });

  test('fails when nothing was applied', async () => {
    const page = new FakePage();
    page.onEvaluate(INJECT_TOKEN_SCRIPT, () => ({ via: [], submitted: false, callbackErrors: [] }));

    expect(await injectToken(page, 'tok', 'turnstile')).toEqual({ success: false, error: 'nothing_injected' });
  });

  test('fails on an unexpected result or a dead page', async () => {
    const page = new FakePage();
    expect(await injectToken(page, 'tok', 'turnstile')).toEqual({ success: false, error: 'unexpected_injection_result' });

    page.failOn.set('evaluate', 'target-closed');
    const result = await injectToken(page, 'tok', 'turnstile');
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error).toBe('evaluate:target-closed');
  });
});
