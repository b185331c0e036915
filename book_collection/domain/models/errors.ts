/**
 * 蔵書管理で扱うエラーの基底
 * code で種類を判別し、エントリポイントが終了コードとメッセージを決める
 */
export class AppError extends Error {
  readonly code: string;
  readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * 書籍の入力値が不正（タイトルが空など）
 * メニューでは再入力、フォームでは 400 として扱う
 */
export class ValidationError extends AppError {
  readonly field: string;
  readonly value?: unknown;

  constructor(message: string, field: string, value?: unknown, cause?: unknown) {
    super(message, "VALIDATION_ERROR", cause);
    this.field = field;
    this.value = value;
  }
}

export type FileOperation = "read" | "write";

/**
 * 保存ファイルまたはCSVの読み書きの失敗
 */
export class FileError extends AppError {
  readonly path: string;
  readonly operation: FileOperation;

  constructor(message: string, path: string, operation: FileOperation, cause?: unknown) {
    super(message, "FILE_ERROR", cause);
    this.path = path;
    this.operation = operation;
  }
}

/** 環境変数・引数の値が不正 */
export class ConfigError extends AppError {
  readonly key?: string;

  constructor(message: string, key?: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.key = key;
  }
}

/**
 * 任意の例外をAppErrorに正規化する
 * @param error 変換元のエラー
 * @param context メッセージの先頭に付けるコンテキスト
 */
export function normalizeError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const prefix = context ? `[${context}] ` : "";
  if (error instanceof Error) {
    return new AppError(`${prefix}${error.message}`, "UNKNOWN_ERROR", error);
  }

  return new AppError(`${prefix}予期せぬエラー: ${String(error)}`, "UNKNOWN_ERROR", error);
}

/**
 * 例外からメッセージ文字列を取り出す
 */
export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
