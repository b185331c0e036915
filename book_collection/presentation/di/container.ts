import { loadConfig, validateConfig } from "./config";
import { createCoreDependencies } from "./dependencies";
import { createUseCaseFactory } from "./useCaseFactory";

import type { AppConfig, ConfigOverrides } from "./config";
import type { CoreDependencies } from "./dependencies";
import type { UseCases } from "./useCaseFactory";
import type { Logger } from "@/application/ports/output/logger";

/**
 * アプリケーションのコンテキスト
 */
export interface AppContext {
  readonly config: AppConfig;
  readonly dependencies: CoreDependencies;
  readonly useCases: UseCases;
}

export interface AppContextOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: ConfigOverrides;
  readonly logger?: Logger;
}

/**
 * アプリケーションコンテキストを作成する
 * @param options 環境変数・引数による上書き・ロガーの差し替え
 */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  // 1. 設定の読み込みとバリデーション
  const config = loadConfig(options.env, options.overrides);
  validateConfig(config);

  // 2. コア依存関係の作成
  const dependencies = createCoreDependencies(config, options.logger);

  // 3. ユースケースの作成
  const useCases = createUseCaseFactory(dependencies);

  return {
    config,
    dependencies,
    useCases
  };
}
