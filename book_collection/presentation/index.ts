import path from "node:path";

import { config } from "dotenv";

import { executeCommand, parseCliArguments } from "./cli/commandExecutor";
import { createAppContext } from "./di/container";

import type { AppContext } from "./di/container";

import { normalizeError } from "@/domain/models/errors";

// 作業ディレクトリの .env を読み込む
config({ path: path.resolve(".env") });

/**
 * アプリケーションのエントリポイント
 * 責務:
 * 1. コマンドライン引数の解析 (yargsを使用)
 * 2. アプリケーションコンテキストのセットアップ
 * 3. シェルの起動
 * 4. 全体的なエラーハンドリング
 */
export async function main(argv: string[]): Promise<void> {
  try {
    const { mode, options } = await parseCliArguments(argv);

    const appContext: AppContext = createAppContext({
      overrides: { dataFile: options.dataFile, port: options.port }
    });

    await executeCommand(appContext, mode, options);
  } catch (error) {
    const appError = normalizeError(error, "main");
    console.error(`エラーが発生しました [${appError.code}]: ${appError.message}`);
    if (appError.code === "UNKNOWN_ERROR" && appError.cause instanceof Error && appError.cause.stack) {
      console.error(appError.cause.stack);
    }
    process.exit(1);
  }
}

// スクリプト直接実行時のエントリポイント
if (require.main === module) {
  main(process.argv).catch((error) => {
    console.error("予期しないエラーが発生しました:", error);
    process.exit(1);
  });
}
