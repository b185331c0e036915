import type { Logger } from "../ports/output/logger";
import type { StorageService } from "../ports/output/storageService";
import type { BookCollection } from "@/domain/models/book";
import type { FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

export interface ExportBooksParams {
  collection: BookCollection;
  filePath?: string;
}

/**
 * コレクションをCSVにエクスポートするユースケース
 */
export function createExportBooksUseCase(
  storageService: StorageService,
  logger: Logger
): { execute: (params: ExportBooksParams) => Promise<Result<FileError, string>> } {
  async function execute(params: ExportBooksParams): Promise<Result<FileError, string>> {
    logger.info(`CSVにエクスポートします... (${params.collection.length}冊)`);

    const result = await storageService.exportToCsv(params.collection, params.filePath);
    if (result.isSuccess()) {
      logger.info(`CSVエクスポートが完了しました: ${result.unwrap()}`);
    }
    return result;
  }

  return {
    execute
  };
}
