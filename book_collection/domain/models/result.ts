/**
 * 成功と失敗を表現する Result 型
 * 型引数は <エラー, 値> の順
 */

/**
 * 成功した結果
 */
export interface Success<T> {
  readonly tag: "success";
  readonly value: T;

  isSuccess(): boolean;
  isError(): boolean;
  unwrap(): T;
  unwrapError(): never;
}

/**
 * 失敗した結果
 */
export interface Failure<E> {
  readonly tag: "failure";
  readonly error: E;

  isSuccess(): boolean;
  isError(): boolean;
  unwrap(): never;
  unwrapError(): E;
}

export type Result<E, T> = Success<T> | Failure<E>;

/**
 * 成功の結果を作成
 */
export function ok<E, T>(value: T): Result<E, T> {
  return {
    tag: "success",
    value,
    isSuccess() {
      return true;
    },
    isError() {
      return false;
    },
    unwrap() {
      return value;
    },
    unwrapError(): never {
      throw new Error("成功した結果からエラーは取り出せません");
    }
  };
}

/**
 * 失敗の結果を作成
 */
export function err<E, T>(error: E): Result<E, T> {
  return {
    tag: "failure",
    error,
    isSuccess() {
      return false;
    },
    isError() {
      return true;
    },
    unwrap(): never {
      throw error instanceof Error ? error : new Error(`失敗した結果から値は取り出せません: ${JSON.stringify(error)}`);
    },
    unwrapError() {
      return error;
    }
  };
}
