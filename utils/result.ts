/**
 * Result helper utilities for consistent success/failure handling.
 * 提供统一的结果处理工具，用于处理成功/失败场景
 *
 * Total operations (checkpoint store) return a Result instead of throwing.
 */

/**
 * 成功结果
 */
export interface Ok<T> {
  success: true;
  data: T;
  message: string;
}

/**
 * 失败结果
 */
export interface Fail {
  success: false;
  error: string;
}

/**
 * 统一的结果类型
 * @template T 成功时的数据类型
 */
export type Result<T> = Ok<T> | Fail;

/**
 * 创建成功结果
 */
export function ok<T>(data: T, message: string = 'ok'): Ok<T> {
  return { success: true, data, message };
}

/**
 * 创建失败结果
 */
export function fail(error: string): Fail {
  return { success: false, error };
}

export function isOk<T>(result: Result<T>): result is Ok<T> {
  return result.success;
}

export function isFail<T>(result: Result<T>): result is Fail {
  return !result.success;
}

/**
 * 获取结果数据，失败时返回默认值
 */
export function unwrapOr<T>(result: Result<T>, defaultValue: T): T {
  return result.success ? result.data : defaultValue;
}

/**
 * 将 Promise 转换为 Result，错误消息带上前缀
 */
export async function fromPromise<T>(promise: Promise<T>, errorPrefix: string): Promise<Result<T>> {
  try {
    return ok(await promise);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail(`${errorPrefix}: ${message}`);
  }
}
