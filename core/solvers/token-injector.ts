import { z } from 'zod';
import type { BrowserPage } from '../../types/browser';
import { fail, isFail, ok, type Result } from '../../utils/result';
import { createModuleLogger } from '../../utils/logger';
import { INJECT_TOKEN_SCRIPT } from './page-scripts';
import type { WidgetKind } from './sitekey-extractor';

const logger = createModuleLogger('TokenInjector');

export const RESPONSE_FIELDS: Record<WidgetKind, string[]> = {
  turnstile: ['cf-turnstile-response'],
  hcaptcha: ['h-captcha-response', 'g-recaptcha-response'],
  recaptcha_v2: ['g-recaptcha-response'],
};

const injectionReportSchema = z.object({
  via: z.array(z.enum(['input', 'callback', 'synthetic'])),
  submitted: z.boolean(),
  callbackErrors: z.array(z.string()),
});

export type InjectionReport = z.infer<typeof injectionReportSchema>;

/**
 * Writes a solved token into the page. Fails when the page cannot be
 * evaluated or reports nothing applied; a token is never re-injected.
 */
export async function injectToken(
  page: BrowserPage,
  token: string,
  kind: WidgetKind,
): Promise<Result<InjectionReport, string>> {
  const result = await page.evaluate(INJECT_TOKEN_SCRIPT, {
    token,
    kind,
    fieldNames: RESPONSE_FIELDS[kind],
  });
  if (isFail(result)) {
    return fail(`evaluate:${result.error}`, result.cause);
  }

  const parsed = injectionReportSchema.safeParse(result.data);
  if (!parsed.success) {
    return fail('unexpected_injection_result');
  }
  if (parsed.data.via.length === 0) {
    return fail('nothing_injected');
  }
  if (parsed.data.callbackErrors.length > 0) {
    logger.warn('Widget callback raised during token injection', {
      kind,
      errors: parsed.data.callbackErrors.length,
    });
  }

  logger.debug('Token injected', { kind, via: parsed.data.via, submitted: parsed.data.submitted });
  return ok(parsed.data);
}
