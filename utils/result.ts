/**
 * Result helper utilities for consistent success/failure handling.
 *
 * The browser capability boundary returns these instead of throwing, so callers
 * can decide per error kind whether a failure is benign (fail open) or fatal.
 */

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure<E> {
  success: false;
  error: E;
  cause?: unknown;
}

/**
 * 统一的结果类型
 * @template T 成功时的数据类型
 * @template E 失败时的错误类型（默认为 string）
 */
export type Result<T, E = string> = Success<T> | Failure<E>;

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function fail<E = string>(error: E, cause?: unknown): Failure<E> {
  return cause === undefined ? { success: false, error } : { success: false, error, cause };
}

export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success;
}

export function isFail<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.success;
}

/**
 * 获取结果数据，失败时返回默认值
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.success ? result.data : defaultValue;
}

/**
 * 将 Promise 转换为 Result 类型
 * @param mapError 把异常映射为错误类型
 */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  mapError: (error: unknown) => E,
): Promise<Result<T, E>> {
  try {
    const data = await promise;
    return ok(data);
  } catch (error) {
    return fail(mapError(error), error);
  }
}
