import type { BookRepository } from "../ports/output/bookRepository";
import type { Logger } from "../ports/output/logger";
import type { BookCollection } from "@/domain/models/book";
import type { FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

/**
 * コレクション全体を保存するユースケース
 * 終了時の最終保存に使用する
 */
export function createSaveCollectionUseCase(
  bookRepository: BookRepository,
  logger: Logger
): { execute: (collection: BookCollection) => Promise<Result<FileError, void>> } {
  async function execute(collection: BookCollection): Promise<Result<FileError, void>> {
    const result = await bookRepository.save(collection);
    if (result.isError()) {
      const error = result.unwrapError();
      logger.error(`コレクションの保存に失敗しました: ${error.message}`, { error });
      return result;
    }

    logger.debug(`${collection.length}冊を保存しました`, { location: bookRepository.location });
    return result;
  }

  return {
    execute
  };
}
