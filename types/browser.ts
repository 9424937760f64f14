/**
 * Browser capability types.
 *
 * The resilience layer never touches driver objects directly: it works against
 * `BrowserPage` and `BrowserContextHandle`, whose calls report failures as
 * `Result` values tagged with a `PageErrorKind` instead of throwing.
 */

import type { Result } from '../utils/result';

export type PageErrorKind =
  | 'detached-frame'
  | 'navigation-race'
  | 'target-closed'
  | 'timeout'
  | 'unknown';

export type PageResult<T> = Result<T, PageErrorKind>;

export interface ElementInfo {
  /** Attribute name → value for the first matching element */
  attributes: Readonly<Record<string, string>>;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface BrowserPage {
  title(): Promise<PageResult<string>>;
  url(): Promise<PageResult<string>>;
  querySelector(selector: string): Promise<PageResult<ElementInfo | null>>;
  isVisible(selector: string): Promise<PageResult<boolean>>;
  innerText(selector: string): Promise<PageResult<string>>;
  /**
   * Evaluates a function expression (source text such as `(arg) => ...`) in the
   * page with `arg` as its single argument. The value is untrusted and must be
   * validated by the caller.
   */
  evaluate(script: string, arg?: JsonValue): Promise<PageResult<unknown>>;
  addInitScript(script: string): Promise<PageResult<void>>;
  reload(): Promise<PageResult<void>>;
  screenshot(path: string): Promise<PageResult<void>>;
  content(): Promise<PageResult<string>>;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds, -1 for a session cookie */
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'Strict' | 'Lax' | 'None';
}

export interface BrowserContextHandle {
  addCookies(cookies: BrowserCookie[]): Promise<PageResult<void>>;
  setUserAgent(userAgent: string): Promise<PageResult<void>>;
}

/**
 * Read-only snapshot of a controlled page, built fresh for every check.
 */
export interface PageSignal {
  readonly title: string;
  readonly url: string;
  readonly markerPresence: Readonly<Record<string, boolean>>;
  readonly markerVisible: Readonly<Record<string, boolean>>;
  readonly bodyText: string;
}

export type ChallengeVerdict =
  | { readonly kind: 'clear' }
  | { readonly kind: 'blocked'; readonly reason: string };

export interface SolveOutcome {
  ok: boolean;
  reason: string;
  /** True when a billable external solve call was made, successful or not */
  attempted: boolean;
}
