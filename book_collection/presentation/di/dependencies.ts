import type { AppConfig } from "./config";
import type { BookRepository } from "@/application/ports/output/bookRepository";
import type { Logger } from "@/application/ports/output/logger";
import type { StorageService } from "@/application/ports/output/storageService";

import { ConsoleLogger } from "@/infrastructure/adapters/logging/consoleLogger";
import { JsonFileBookRepository } from "@/infrastructure/adapters/repositories/jsonFileBookRepository";
import { FileStorageService } from "@/infrastructure/adapters/storage/fileStorageService";

/**
 * アプリケーション全体で共有されるコア依存関係
 */
export interface CoreDependencies {
  readonly logger: Logger;
  readonly bookRepository: BookRepository;
  readonly storageService: StorageService;
}

/**
 * コア依存関係を作成する
 * @param config アプリケーション設定
 * @param logger 差し替え用のロガー（省略時はコンソール）
 */
export function createCoreDependencies(config: AppConfig, logger?: Logger): CoreDependencies {
  const appLogger = logger ?? new ConsoleLogger("BookCollection", config.logLevel);

  const bookRepository = new JsonFileBookRepository(config.dataFile, appLogger);
  const storageService = new FileStorageService(appLogger, { defaultCsvPath: config.csvFile });

  return {
    logger: appLogger,
    bookRepository,
    storageService
  };
}
