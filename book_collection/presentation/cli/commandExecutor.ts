import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { createWebApp, startWebServer, stopWebServer } from "../web/server";

import { MenuShell } from "./menuShell";
import { createReadlinePrompter } from "./prompter";

import type { Prompter } from "./prompter";
import type { AppContext } from "../di/container";

export const MODES = ["menu", "web", "export"] as const;

export type Mode = (typeof MODES)[number];

const isMode = (value: unknown): value is Mode => MODES.some((mode) => mode === value);

/**
 * コマンドラインオプション
 */
export interface CliOptions {
  readonly dataFile?: string;
  readonly output?: string;
  readonly port?: number;
}

/**
 * コマンドライン引数を解析する
 * @param argv process.argv 形式の引数
 */
export async function parseCliArguments(argv: string[]): Promise<{ mode: Mode; options: CliOptions }> {
  const parsedArgs = await yargs(hideBin(argv))
    .scriptName("book-collection")
    .usage("$0 [menu|web|export]")
    .command("menu", "テキストメニューで蔵書を管理します (デフォルト)")
    .command("web", "フォーム画面のWebサーバーを起動します")
    .command("export", "蔵書をCSVに書き出して終了します")
    .option("data-file", {
      alias: "f",
      type: "string",
      description: "保存ファイルのパス (既定: book_data.json)"
    })
    .option("output", {
      alias: "o",
      type: "string",
      description: "CSVの出力先 (export のみ)"
    })
    .option("port", {
      alias: "p",
      type: "number",
      description: "Webサーバーのポート番号 (web のみ)"
    })
    .help()
    .alias("help", "h")
    .strict()
    .wrap(null)
    .parseAsync();

  const [command = "menu"] = parsedArgs._;
  if (!isMode(command)) {
    throw new Error(`不明なコマンドです: ${String(command)}`);
  }

  return {
    mode: command,
    options: {
      dataFile: parsedArgs["data-file"],
      output: parsedArgs.output,
      port: parsedArgs.port
    }
  };
}

/**
 * コマンドを実行する
 * @param appContext アプリケーションコンテキスト
 * @param mode 実行モード
 * @param cliOptions コマンドラインオプション
 * @param prompter メニュー用の入出力（テストで差し替える）
 */
export async function executeCommand(
  appContext: AppContext,
  mode: Mode,
  cliOptions: Readonly<CliOptions>,
  prompter?: Prompter
): Promise<void> {
  const { config, dependencies, useCases } = appContext;
  const { logger } = dependencies;

  logger.debug(`処理モード: ${mode}`, { dataFile: config.dataFile });

  // セッション開始時に一度だけ読み込む
  const loadResult = await useCases.loadCollection.execute();
  if (loadResult.isError()) {
    throw loadResult.unwrapError();
  }
  const collection = loadResult.unwrap();

  switch (mode) {
    case "menu": {
      const shell = new MenuShell(useCases, prompter ?? createReadlinePrompter(), collection);
      await shell.run();
      return;
    }

    case "export": {
      const exportResult = await useCases.exportBooks.execute({ collection, filePath: cliOptions.output });
      if (exportResult.isError()) {
        throw exportResult.unwrapError();
      }
      console.log(`Exported ${collection.length} books to ${exportResult.unwrap()}`);
      return;
    }

    case "web": {
      const app = createWebApp({ useCases, logger, initialCollection: collection });
      const { server, url } = await startWebServer(app, config.web.host, config.web.port);
      console.log(`Book Collection Manager is running at ${url} (Ctrl+C to stop)`);

      process.once("SIGINT", () => {
        stopWebServer(server)
          .then(() => logger.info("Webサーバーを停止しました"))
          .catch((error: unknown) => logger.error("Webサーバーの停止に失敗しました", { error }));
      });
      return;
    }
  }
}
