import type { Book } from "@/domain/models/book";
import type { ReadingProgress } from "@/domain/services/bookCollectionService";

const orNotAvailable = (value: string): string => (value === "" ? "N/A" : value);

export const readStatusLabel = (book: Readonly<Book>): string => (book.read ? "Read" : "Unread");

/**
 * 書籍1冊を1行で表す
 * @example "Dune by Herbert (1965) - SF - Unread"
 */
export function formatBookLine(book: Readonly<Book>): string {
  return `${book.title} by ${book.author} (${orNotAvailable(book.year)}) - ${orNotAvailable(book.genre)} - ${readStatusLabel(book)}`;
}

/**
 * 1始まりの番号付きリスト
 */
export function formatNumberedList(books: readonly Book[]): string[] {
  return books.map((book, index) => `${index + 1}. ${formatBookLine(book)}`);
}

export const formatPercentage = (percentage: number): string => `${percentage.toFixed(2)}%`;

export function formatProgress(progress: ReadingProgress): string[] {
  return [
    `Total books in collection: ${progress.total}`,
    `Books read: ${progress.readCount}`,
    `Reading progress: ${formatPercentage(progress.percentage)}`
  ];
}
