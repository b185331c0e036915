import type { BookRepository } from "../ports/output/bookRepository";
import type { Logger } from "../ports/output/logger";
import type { Book, BookCollection, BookDraft } from "@/domain/models/book";
import type { AppError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

import { ValidationError } from "@/domain/models/errors";
import { err, ok } from "@/domain/models/result";
import { appendBook } from "@/domain/services/bookCollectionService";

export interface AddBookParams {
  collection: BookCollection;
  draft: BookDraft;
  /** フォーム画面では著者も必須 */
  requireAuthor?: boolean;
}

export interface AddBookResult {
  collection: BookCollection;
  book: Book;
}

/**
 * 入力値を検証する
 * 保存前に弾くため、不正な書籍が一部でも保存されることはない
 */
export function validateDraft(draft: Readonly<BookDraft>, requireAuthor = false): ValidationError | null {
  if (draft.title.trim() === "") {
    return new ValidationError("Title cannot be empty.", "title", draft.title);
  }
  if (requireAuthor && (draft.author ?? "").trim() === "") {
    return new ValidationError("Author cannot be empty.", "author", draft.author);
  }
  return null;
}

/**
 * 書籍を追加するユースケース
 */
export function createAddBookUseCase(
  bookRepository: BookRepository,
  logger: Logger
): { execute: (params: AddBookParams) => Promise<Result<AppError, AddBookResult>> } {
  async function execute(params: AddBookParams): Promise<Result<AppError, AddBookResult>> {
    const { collection, draft, requireAuthor = false } = params;

    const validationError = validateDraft(draft, requireAuthor);
    if (validationError) {
      logger.debug(`入力値が不正です: ${validationError.message}`, { field: validationError.field });
      return err(validationError);
    }

    const appended = appendBook(collection, draft);

    const saveResult = await bookRepository.save(appended.collection);
    if (saveResult.isError()) {
      const error = saveResult.unwrapError();
      logger.error(`書籍の追加後の保存に失敗しました: ${error.message}`, { error });
      return err(error);
    }

    logger.info(`書籍を追加しました: ${appended.book.title}`, { total: appended.collection.length });
    return ok(appended);
  }

  return {
    execute
  };
}
