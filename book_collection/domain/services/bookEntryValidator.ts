import { z } from "zod";

import type { Book } from "../models/book";

/**
 * 保存ファイル上の値を表示用のテキストにする
 * 文字列以外の値（数値・配列・オブジェクトなど）も捨てずに文字列化する
 */
const toText = (value: unknown): string => {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
};

/**
 * 保存ファイル上の1エントリのスキーマ
 * オブジェクトであり、titleとauthorのキーを持つことだけを要求する
 */
const storedBookSchema = z
  .record(z.unknown())
  .refine((entry) => "title" in entry && "author" in entry, { message: "title と author のキーが必要です" })
  .transform(
    (entry): Book => ({
      title: toText(entry.title),
      author: toText(entry.author),
      year: toText(entry.year),
      genre: toText(entry.genre),
      read: entry.read === true
    })
  );

export type EntryValidationResult = {
  readonly books: Book[];
  readonly rejectedCount: number;
};

/**
 * 読み込んだ生データから有効な書籍エントリだけを取り出す
 * 不正なエントリは修復せずに捨て、その件数だけを返す（副作用なし）
 * @param rawEntries JSON.parse済みのトップレベル配列
 */
export function validateBookEntries(rawEntries: readonly unknown[]): EntryValidationResult {
  const books: Book[] = [];
  let rejectedCount = 0;

  for (const entry of rawEntries) {
    // 配列やプリミティブはz.recordの時点で弾かれる
    const parsed = storedBookSchema.safeParse(entry);
    if (!parsed.success) {
      rejectedCount++;
      continue;
    }

    books.push(parsed.data);
  }

  return { books, rejectedCount };
}
