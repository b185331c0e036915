import type { LogLevel, Logger } from "@/application/ports/output/logger";

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/**
 * コンソールロガーの実装
 * 指定したレベル以上のログをコンソールに出力する
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  /**
   * @param prefix ログメッセージに付与するプレフィックス
   * @param level 有効にする最低ログレベル
   */
  constructor(prefix: string, level: LogLevel = "info") {
    this.prefix = prefix;
    this.threshold = LEVEL_ORDER[level];
  }

  private formatMessage(level: LogLevel, message: string): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.prefix}] ${message}`;
  }

  /**
   * コンテキスト情報をフォーマット
   */
  private formatContext(context?: Record<string, unknown>): string {
    if (!context) return "";

    try {
      // Errorはそのままだと {} になるため展開しておく
      const processedContext = { ...context };
      if (context.error instanceof Error) {
        processedContext.error = {
          name: context.error.name,
          message: context.error.message,
          stack: context.error.stack
        };
      }

      return JSON.stringify(processedContext, null, 2);
    } catch (e) {
      return `[Context serialization failed: ${e instanceof Error ? e.message : String(e)}]`;
    }
  }

  private write(level: LogLevel, sink: (...data: unknown[]) => void, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    sink(this.formatMessage(level, message));
    const formattedContext = this.formatContext(context);
    if (formattedContext) {
      sink(formattedContext);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", console.debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", console.info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", console.warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", console.error, message, context);
  }
}
