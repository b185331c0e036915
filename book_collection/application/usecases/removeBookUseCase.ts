import type { BookRepository } from "../ports/output/bookRepository";
import type { Logger } from "../ports/output/logger";
import type { BookCollection } from "@/domain/models/book";
import type { FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

import { err, ok } from "@/domain/models/result";
import { removeBooksByTitle } from "@/domain/services/bookCollectionService";

export interface RemoveBookParams {
  collection: BookCollection;
  title: string;
}

export interface RemoveBookResult {
  collection: BookCollection;
  /** 0 なら該当なし */
  removedCount: number;
}

/**
 * タイトルで書籍を削除するユースケース
 * 同じタイトル（大文字小文字を区別しない）の書籍はすべて削除する
 */
export function createRemoveBookUseCase(
  bookRepository: BookRepository,
  logger: Logger
): { execute: (params: RemoveBookParams) => Promise<Result<FileError, RemoveBookResult>> } {
  async function execute(params: RemoveBookParams): Promise<Result<FileError, RemoveBookResult>> {
    const removed = removeBooksByTitle(params.collection, params.title);

    if (removed.removedCount === 0) {
      logger.debug(`削除対象の書籍が見つかりません: ${params.title}`);
      return ok(removed);
    }

    const saveResult = await bookRepository.save(removed.collection);
    if (saveResult.isError()) {
      const error = saveResult.unwrapError();
      logger.error(`書籍の削除後の保存に失敗しました: ${error.message}`, { error });
      return err(error);
    }

    logger.info(`書籍を削除しました: ${params.title.trim()} (${removed.removedCount}件)`);
    return ok(removed);
  }

  return {
    execute
  };
}
