// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import {
  CHALLENGE_CALLBACK_GLOBAL,
  CHALLENGE_PARAMS_GLOBAL,
  INJECT_TOKEN_SCRIPT,
  READ_HOOK_SCRIPT,
  RENDER_HOOK_SCRIPT,
} from '../../../core/solvers/page-scripts';

const PAGE_GLOBALS = [
  CHALLENGE_CALLBACK_GLOBAL,
  CHALLENGE_PARAMS_GLOBAL,
  '__jobwardenHookInstalled',
  '__jobwardenHookError',
  '_cf_chl_opt',
  'turnstile',
  'hcaptcha',
  'onSolved',
  'brokenWidget',
];

interface WidgetApi {
  render: (container: unknown, options: unknown) => unknown;
}

/** Compiles an arrow-function script the way the page evaluates it. */
function compile(source: string): (arg?: unknown) => unknown {
  const fn: unknown = new Function(`return (${source});`)();
  if (typeof fn !== 'function') throw new Error('script is not a function');
  return (arg) => Reflect.apply(fn, undefined, [arg]);
}

const injectToken = compile(INJECT_TOKEN_SCRIPT);
const readHook = compile(READ_HOOK_SCRIPT);

describe('page scripts', () => {
  let submits: number;
  const countSubmit = (event: Event) => {
    event.preventDefault();
    submits++;
  };

  beforeEach(() => {
    submits = 0;
    document.body.innerHTML = '';
    document.addEventListener('submit', countSubmit);
  });

  afterEach(() => {
    document.removeEventListener('submit', countSubmit);
    for (const key of PAGE_GLOBALS) Reflect.deleteProperty(window, key);
    vi.useRealTimers();
  });

  describe('INJECT_TOKEN_SCRIPT', () => {
    test('fills the response field, fires its events and submits the form', () => {
      document.body.innerHTML = `
        <form id="apply">
          <input type="hidden" name="cf-turnstile-response">
          <div class="cf-turnstile" data-sitekey="0xKEY"></div>
          <button type="submit">Apply</button>
        </form>`;
      const field = document.querySelector('input[name="cf-turnstile-response"]');
      if (!(field instanceof HTMLInputElement)) throw new Error('missing field');
      const events: string[] = [];
      field.addEventListener('input', (event) => events.push(event.type));
      field.addEventListener('change', (event) => events.push(event.type));

      const result = injectToken({ token: 'tok-1', kind: 'turnstile', fieldNames: ['cf-turnstile-response'] });

      expect(result).toEqual({ via: ['input'], submitted: true, callbackErrors: [] });
      expect(field.value).toBe('tok-1');
      expect(events).toEqual(['input', 'change']);
      expect(submits).toBe(1);
    });

    test('runs each distinct callback once and collects their errors', () => {
      document.body.innerHTML = `
        <form>
          <div class="cf-turnstile" data-sitekey="0xKEY" data-callback="brokenWidget"></div>
          <span data-callback="onSolved"></span>
        </form>`;
      const received: string[] = [];
      Reflect.set(window, CHALLENGE_CALLBACK_GLOBAL, (token: string) => received.push(`hook:${token}`));
      Reflect.set(window, CHALLENGE_PARAMS_GLOBAL, {
        kind: 'turnstile',
        sitekey: '0xKEY',
        action: null,
        cdata: null,
        callback: 'onSolved',
      });
      Reflect.set(window, 'onSolved', (token: string) => received.push(`named:${token}`));
      Reflect.set(window, 'brokenWidget', () => {
        throw new Error('widget gone');
      });

      const result = injectToken({ token: 'tok-2', kind: 'turnstile', fieldNames: ['cf-turnstile-response'] });

      expect(result).toEqual({ via: ['callback'], submitted: false, callbackErrors: ['Error: widget gone'] });
      expect(received).toEqual(['hook:tok-2', 'named:tok-2']);
      expect(document.querySelector('input[name="cf-turnstile-response"]')).toBeNull();
      expect(submits).toBe(0);
    });

    test('adds a hidden input to the widget form when nothing else takes the token', () => {
      document.body.innerHTML = `
        <form id="apply">
          <div class="h-captcha" data-sitekey="hkey"></div>
          <button>Apply</button>
        </form>`;

      const result = injectToken({
        token: 'tok-3',
        kind: 'hcaptcha',
        fieldNames: ['h-captcha-response', 'g-recaptcha-response'],
      });

      expect(result).toEqual({ via: ['synthetic'], submitted: true, callbackErrors: [] });
      const input = document.querySelector('#apply input[name="h-captcha-response"]');
      if (!(input instanceof HTMLInputElement)) throw new Error('missing synthetic input');
      expect(input.type).toBe('hidden');
      expect(input.value).toBe('tok-3');
      expect(submits).toBe(1);
    });

    test('appends the hidden input to the body when the page has no form', () => {
      document.body.innerHTML = '<div class="g-recaptcha" data-sitekey="rkey"></div>';

      const result = injectToken({ token: 'tok-4', kind: 'recaptcha_v2', fieldNames: ['g-recaptcha-response'] });

      expect(result).toEqual({ via: ['synthetic'], submitted: false, callbackErrors: [] });
      const input = document.querySelector('input[name="g-recaptcha-response"]');
      expect(input?.parentElement).toBe(document.body);
      expect(submits).toBe(0);
    });
  });

  describe('RENDER_HOOK_SCRIPT', () => {
    const install = () => {
      vi.useFakeTimers();
      new Function(RENDER_HOOK_SCRIPT)();
      vi.advanceTimersByTime(10);
    };

    test('records turnstile render options and keeps the original render', () => {
      document.body.innerHTML = '<div id="cf"></div>';
      const rendered: unknown[] = [];
      const turnstile: WidgetApi = {
        render: (container) => {
          rendered.push(container);
          return 'widget-1';
        },
      };
      Reflect.set(window, 'turnstile', turnstile);
      const onToken = (token: string) => token;

      install();
      const widget = turnstile.render('#cf', { sitekey: ' 0xKEY ', action: 'apply', cData: 'c-1', callback: onToken });

      expect(widget).toBe('widget-1');
      expect(rendered).toEqual(['#cf']);
      expect(Reflect.get(window, CHALLENGE_PARAMS_GLOBAL)).toEqual({
        kind: 'turnstile',
        sitekey: '0xKEY',
        action: 'apply',
        cdata: 'c-1',
        callback: null,
      });
      expect(Reflect.get(window, CHALLENGE_CALLBACK_GLOBAL)).toBe(onToken);
    });

    test('reads the sitekey from the container element and keeps a named callback', () => {
      document.body.innerHTML = '<div id="hc" data-sitekey="hkey"></div>';
      const hcaptcha: WidgetApi = { render: () => 'hc-1' };
      Reflect.set(window, 'hcaptcha', hcaptcha);

      install();
      hcaptcha.render(document.getElementById('hc'), { callback: 'onCaptcha' });

      expect(Reflect.get(window, CHALLENGE_PARAMS_GLOBAL)).toEqual({
        kind: 'hcaptcha',
        sitekey: 'hkey',
        action: null,
        cdata: null,
        callback: 'onCaptcha',
      });
      expect(Reflect.get(window, CHALLENGE_CALLBACK_GLOBAL)).toBeUndefined();
    });

    test('records nothing when the render call has no sitekey', () => {
      const rendered: unknown[] = [];
      const turnstile: WidgetApi = { render: (container) => rendered.push(container) };
      Reflect.set(window, 'turnstile', turnstile);

      install();
      turnstile.render('#missing', {});

      expect(rendered).toEqual(['#missing']);
      expect(Reflect.get(window, CHALLENGE_PARAMS_GLOBAL)).toBeUndefined();
    });
  });

  describe('READ_HOOK_SCRIPT', () => {
    test('returns the hooked params and the interstitial type', () => {
      const params = { kind: 'turnstile', sitekey: '0xKEY', action: null, cdata: null, callback: null };
      Reflect.set(window, CHALLENGE_PARAMS_GLOBAL, params);
      Reflect.set(window, '_cf_chl_opt', { cType: 'managed' });

      expect(readHook()).toEqual({ params, cType: 'managed' });
    });

    test('returns nulls on a page without a widget', () => {
      expect(readHook()).toEqual({ params: null, cType: null });
    });
  });
});
