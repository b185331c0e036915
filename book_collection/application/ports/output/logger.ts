export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * ロガーのポート
 * アプリケーション層で使用するログインターフェース
 */
export interface Logger {
  /**
   * デバッグレベルのログを出力
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * 情報レベルのログを出力
   * 書籍の追加・更新・削除など、通常の操作の記録
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * 警告レベルのログを出力
   * 保存ファイルの破損や不正エントリの破棄など、処理は継続できる問題
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * エラーレベルのログを出力
   */
  error(message: string, context?: Record<string, unknown>): void;
}
