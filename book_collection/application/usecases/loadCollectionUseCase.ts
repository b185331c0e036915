import type { BookRepository } from "../ports/output/bookRepository";
import type { Logger } from "../ports/output/logger";
import type { BookCollection } from "@/domain/models/book";
import type { FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

/**
 * セッション開始時にコレクションを読み込むユースケース
 */
export function createLoadCollectionUseCase(
  bookRepository: BookRepository,
  logger: Logger
): { execute: () => Promise<Result<FileError, BookCollection>> } {
  async function execute(): Promise<Result<FileError, BookCollection>> {
    logger.debug(`コレクションを読み込みます: ${bookRepository.location}`);

    const result = await bookRepository.load();
    if (result.isError()) {
      const error = result.unwrapError();
      logger.error(`コレクションの読み込みに失敗しました: ${error.message}`, { error });
      return result;
    }

    logger.info(`${result.unwrap().length}冊の書籍を読み込みました`, { location: bookRepository.location });
    return result;
  }

  return {
    execute
  };
}
