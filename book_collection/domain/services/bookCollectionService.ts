import { createBook, hasTitle, updateBook } from "../models/book";

import type { Book, BookChanges, BookCollection, BookDraft } from "../models/book";

/**
 * 検索対象の項目
 * - any: タイトルまたは著者
 * - title: タイトルのみ
 * - author: 著者のみ
 */
export type SearchField = "any" | "title" | "author";

/**
 * 読書進捗
 */
export type ReadingProgress = {
  readonly total: number;
  readonly readCount: number;
  readonly percentage: number;
};

/**
 * コレクションの末尾に書籍を追加する
 * @returns 新しいコレクションと追加された書籍
 */
export function appendBook(collection: BookCollection, draft: Readonly<BookDraft>): { collection: BookCollection; book: Book } {
  const book = createBook(draft);
  return { collection: [...collection, book], book };
}

/**
 * タイトルが一致する書籍をすべて削除する
 * @returns 新しいコレクションと削除件数（0件なら元のコレクションをそのまま返す）
 */
export function removeBooksByTitle(
  collection: BookCollection,
  title: string
): { collection: BookCollection; removedCount: number } {
  const remaining = collection.filter((book) => !hasTitle(book, title));
  const removedCount = collection.length - remaining.length;
  return { collection: removedCount === 0 ? collection : remaining, removedCount };
}

/**
 * タイトルが一致する最初の書籍の位置を返す
 * @returns 見つからなければ -1
 */
export function findBookIndex(collection: BookCollection, title: string): number {
  return collection.findIndex((book) => hasTitle(book, title));
}

/**
 * タイトルが一致する最初の書籍を更新する
 * @returns 見つからなければ updated は null、コレクションは元のまま
 */
export function updateBookByTitle(
  collection: BookCollection,
  originalTitle: string,
  changes: Readonly<BookChanges>
): { collection: BookCollection; updated: Book | null } {
  const index = findBookIndex(collection, originalTitle);
  if (index === -1) {
    return { collection, updated: null };
  }

  const updated = updateBook(collection[index], changes);
  return { collection: collection.map((book, i) => (i === index ? updated : book)), updated };
}

/**
 * 部分一致（大文字小文字を区別しない）で書籍を検索する
 * @returns コレクションの並び順を保った検索結果
 */
export function searchBooks(collection: BookCollection, term: string, field: SearchField = "any"): Book[] {
  const needle = term.toLowerCase();
  const matches = (value: string): boolean => value.toLowerCase().includes(needle);

  return collection.filter((book) => {
    switch (field) {
      case "title":
        return matches(book.title);
      case "author":
        return matches(book.author);
      case "any":
        return matches(book.title) || matches(book.author);
    }
  });
}

/**
 * 読書進捗を計算する
 * 空のコレクションでは 0 除算せずに 0% を返す
 */
export function calculateProgress(collection: BookCollection): ReadingProgress {
  const total = collection.length;
  const readCount = collection.filter((book) => book.read).length;
  const percentage = total > 0 ? (readCount / total) * 100 : 0;
  return { total, readCount, percentage };
}
