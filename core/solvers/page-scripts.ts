/**
 * Scripts evaluated inside the controlled page. They run in the browser, so
 * they are plain ES5 source strings rather than compiled TypeScript.
 */

export const CHALLENGE_PARAMS_GLOBAL = '__jobwardenChallengeParams';
export const CHALLENGE_CALLBACK_GLOBAL = '__jobwardenChallengeCallback';

/**
 * Init script: wraps `render` on turnstile/hcaptcha/grecaptcha as soon as each
 * global appears and records the parameters of the first render call. The
 * original render still runs, so the widget behaves as usual.
 */
export const RENDER_HOOK_SCRIPT = `
(function () {
    if (window.__jobwardenHookInstalled) return;
    window.__jobwardenHookInstalled = true;

    var apis = { turnstile: 'turnstile', hcaptcha: 'hcaptcha', grecaptcha: 'recaptcha_v2' };

    var str = function (value) {
        return typeof value === 'string' && value.trim() ? value.trim() : null;
    };

    var record = function (kind, container, options) {
        var opts = options && typeof options === 'object' ? options : {};
        var el = null;
        if (typeof container === 'string') {
            el = document.querySelector(container);
        } else if (container && typeof container === 'object' && 'nodeType' in container) {
            el = container;
        }
        var sitekey = str(opts.sitekey) || str(opts.siteKey) ||
            (el && el.getAttribute ? str(el.getAttribute('data-sitekey')) : null);
        if (!sitekey) return;

        var callbackName = null;
        if (typeof opts.callback === 'function') {
            window.${CHALLENGE_CALLBACK_GLOBAL} = opts.callback;
        } else if (typeof opts.callback === 'string') {
            callbackName = opts.callback;
        }

        window.${CHALLENGE_PARAMS_GLOBAL} = {
            kind: kind,
            sitekey: sitekey,
            action: str(opts.action),
            cdata: str(opts.cData) || str(opts.cdata),
            callback: callbackName
        };
    };

    var patch = function (name, kind) {
        var api = window[name];
        if (!api || typeof api.render !== 'function' || api.__jobwardenPatched) return;
        var original = api.render;
        api.render = function (container, options) {
            try { record(kind, container, options); } catch (e) { window.__jobwardenHookError = String(e); }
            return original.apply(this, arguments);
        };
        api.__jobwardenPatched = true;
    };

    var timer = setInterval(function () {
        for (var name in apis) patch(name, apis[name]);
    }, 10);
    setTimeout(function () { clearInterval(timer); }, 20000);
})();
`;

/** Reads what the render hook captured plus Cloudflare's interstitial options. */
export const READ_HOOK_SCRIPT = `() => {
    var params = window.${CHALLENGE_PARAMS_GLOBAL} || null;
    var opt = window._cf_chl_opt || window.__cf_chl_opt || null;
    return {
        params: params,
        cType: opt && typeof opt.cType === 'string' ? opt.cType : null
    };
}`;

/** Returns the `src` of every iframe on the page. */
export const IFRAME_SOURCES_SCRIPT = `() => {
    var out = [];
    var frames = document.querySelectorAll('iframe');
    for (var i = 0; i < frames.length; i++) {
        var src = frames[i].getAttribute('src');
        if (src) out.push(src);
    }
    return out;
}`;

/**
 * Applies a solved token. Argument: `{ token, kind, fieldNames }`.
 * Order: named response fields, then callbacks, then a synthetic hidden input
 * when neither exists. Submits the enclosing form when it has a submit control.
 */
export const INJECT_TOKEN_SCRIPT = `(arg) => {
    var via = [];
    var fields = [];
    for (var n = 0; n < arg.fieldNames.length; n++) {
        var found = document.querySelectorAll('[name="' + arg.fieldNames[n] + '"]');
        for (var f = 0; f < found.length; f++) fields.push(found[f]);
    }
    for (var i = 0; i < fields.length; i++) {
        fields[i].value = arg.token;
        fields[i].dispatchEvent(new Event('input', { bubbles: true }));
        fields[i].dispatchEvent(new Event('change', { bubbles: true }));
    }
    if (fields.length) via.push('input');

    var callbacks = [];
    if (typeof window.${CHALLENGE_CALLBACK_GLOBAL} === 'function') callbacks.push(window.${CHALLENGE_CALLBACK_GLOBAL});
    var params = window.${CHALLENGE_PARAMS_GLOBAL};
    if (params && params.callback && typeof window[params.callback] === 'function' &&
        callbacks.indexOf(window[params.callback]) < 0) {
        callbacks.push(window[params.callback]);
    }
    var declared = document.querySelectorAll('[data-callback]');
    for (var d = 0; d < declared.length; d++) {
        var fn = window[declared[d].getAttribute('data-callback')];
        if (typeof fn === 'function' && callbacks.indexOf(fn) < 0) callbacks.push(fn);
    }
    var called = 0;
    var callbackErrors = [];
    for (var c = 0; c < callbacks.length; c++) {
        try { callbacks[c](arg.token); called++; } catch (e) { callbackErrors.push(String(e)); }
    }
    if (called) via.push('callback');

    var anchor = fields[0] || document.querySelector('.cf-turnstile, .h-captcha, .g-recaptcha, [data-sitekey]');
    var form = anchor && anchor.closest ? anchor.closest('form') : null;
    if (!fields.length && !called) {
        var host = form || document.querySelector('form') || document.body;
        var input = document.createElement('input');
        input.type = 'hidden';
        input.name = arg.fieldNames[0];
        input.value = arg.token;
        host.appendChild(input);
        via.push('synthetic');
        form = input.closest('form');
    }

    var submitted = false;
    if (form && form.querySelector('[type="submit"], button:not([type])')) {
        if (typeof form.requestSubmit === 'function') form.requestSubmit(); else form.submit();
        submitted = true;
    }
    return { via: via, submitted: submitted, callbackErrors: callbackErrors };
}`;
