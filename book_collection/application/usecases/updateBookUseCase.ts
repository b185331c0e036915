import type { BookRepository } from "../ports/output/bookRepository";
import type { Logger } from "../ports/output/logger";
import type { Book, BookChanges, BookCollection } from "@/domain/models/book";
import type { FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

import { err, ok } from "@/domain/models/result";
import { updateBookByTitle } from "@/domain/services/bookCollectionService";

export interface UpdateBookParams {
  collection: BookCollection;
  originalTitle: string;
  changes: BookChanges;
}

export interface UpdateBookResult {
  collection: BookCollection;
  /** 該当なしの場合は null */
  updated: Book | null;
}

/**
 * 書籍の情報を更新するユースケース
 */
export function createUpdateBookUseCase(
  bookRepository: BookRepository,
  logger: Logger
): { execute: (params: UpdateBookParams) => Promise<Result<FileError, UpdateBookResult>> } {
  async function execute(params: UpdateBookParams): Promise<Result<FileError, UpdateBookResult>> {
    const result = updateBookByTitle(params.collection, params.originalTitle, params.changes);

    if (result.updated === null) {
      logger.debug(`更新対象の書籍が見つかりません: ${params.originalTitle}`);
      return ok(result);
    }

    const saveResult = await bookRepository.save(result.collection);
    if (saveResult.isError()) {
      const error = saveResult.unwrapError();
      logger.error(`書籍の更新後の保存に失敗しました: ${error.message}`, { error });
      return err(error);
    }

    logger.info(`書籍を更新しました: ${params.originalTitle.trim()} -> ${result.updated.title}`);
    return ok(result);
  }

  return {
    execute
  };
}
