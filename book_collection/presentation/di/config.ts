import path from "node:path";

import type { LogLevel } from "@/application/ports/output/logger";

import { ConfigError } from "@/domain/models/errors";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const DEFAULT_DATA_FILE = "book_data.json";
export const DEFAULT_CSV_FILE = "book_data.csv";
export const DEFAULT_WEB_PORT = 8501;

/**
 * アプリケーション全体の設定
 */
export interface AppConfig {
  readonly dataFile: string;
  readonly csvFile: string;
  readonly logLevel: LogLevel;
  readonly web: {
    readonly host: string;
    readonly port: number;
  };
}

/**
 * コマンドライン引数による上書き
 */
export interface ConfigOverrides {
  readonly dataFile?: string;
  readonly csvFile?: string;
  readonly port?: number;
}

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === "") return "warn";
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ConfigError(`LOG_LEVEL は ${LOG_LEVELS.join(", ")} のいずれかを指定してください: ${value}`, "LOG_LEVEL");
  }
  return normalized;
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value === "") return DEFAULT_WEB_PORT;
  const port = Number(value);
  if (!Number.isInteger(port)) {
    throw new ConfigError(`WEB_PORT は整数で指定してください: ${value}`, "WEB_PORT");
  }
  return port;
}

/**
 * 環境変数から設定を読み込む
 * 相対パスは作業ディレクトリ基準で解決する
 * @param env 環境変数
 * @param overrides コマンドライン引数による上書き
 * @returns アプリケーション設定
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): AppConfig {
  return {
    dataFile: path.resolve(overrides.dataFile || env.BOOK_DATA_FILE || DEFAULT_DATA_FILE),
    csvFile: path.resolve(overrides.csvFile || env.BOOK_CSV_FILE || DEFAULT_CSV_FILE),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    web: {
      host: env.WEB_HOST || "127.0.0.1",
      port: overrides.port ?? parsePort(env.WEB_PORT)
    }
  };
}

/**
 * 設定のバリデーション
 * @param config アプリケーション設定
 * @throws {ConfigError} 値が範囲外の場合
 */
export function validateConfig(config: AppConfig): void {
  if (config.web.port < 0 || config.web.port > 65535) {
    throw new ConfigError(`ポート番号が範囲外です: ${config.web.port}`, "WEB_PORT");
  }

  if (path.resolve(config.dataFile) === path.resolve(config.csvFile)) {
    throw new ConfigError("保存ファイルとCSVの出力先に同じパスは指定できません", "BOOK_CSV_FILE");
  }
}
