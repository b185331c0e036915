import type { Logger } from "../ports/output/logger";
import type { Book, BookCollection } from "@/domain/models/book";
import type { ReadingProgress, SearchField } from "@/domain/services/bookCollectionService";

import { calculateProgress, searchBooks } from "@/domain/services/bookCollectionService";

export interface SearchBooksParams {
  collection: BookCollection;
  term: string;
  field?: SearchField;
}

/**
 * 参照系のユースケース（検索・一覧・読書進捗）
 * コレクションを変更しないため保存は行わない
 */
export function createQueryBooksUseCase(logger: Logger): {
  search: (params: SearchBooksParams) => Book[];
  list: (collection: BookCollection) => { books: BookCollection; isEmpty: boolean };
  progress: (collection: BookCollection) => ReadingProgress;
} {
  function search(params: SearchBooksParams): Book[] {
    const { collection, term, field = "any" } = params;
    const books = searchBooks(collection, term, field);
    logger.debug(`検索しました: "${term}" (${field}) -> ${books.length}件`);
    return books;
  }

  function list(collection: BookCollection): { books: BookCollection; isEmpty: boolean } {
    return { books: collection, isEmpty: collection.length === 0 };
  }

  function progress(collection: BookCollection): ReadingProgress {
    return calculateProgress(collection);
  }

  return {
    search,
    list,
    progress
  };
}
