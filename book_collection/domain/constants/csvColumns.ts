import type { Book } from "../models/book";

/**
 * CSVエクスポートのカラム定義
 * 保存ファイルのキーと同じ名前・同じ順序
 */
export const CSV_COLUMNS = ["title", "author", "year", "genre", "read"] as const satisfies ReadonlyArray<keyof Book>;

export type CsvColumnName = (typeof CSV_COLUMNS)[number];
