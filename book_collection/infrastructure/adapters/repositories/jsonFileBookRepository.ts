import fs from "node:fs/promises";
import path from "node:path";

import type { BookRepository } from "@/application/ports/output/bookRepository";
import type { Logger } from "@/application/ports/output/logger";
import type { BookCollection } from "@/domain/models/book";
import type { Result } from "@/domain/models/result";

import { FileError, describeError } from "@/domain/models/errors";
import { err, ok } from "@/domain/models/result";
import { validateBookEntries } from "@/domain/services/bookEntryValidator";

/** 保存ファイルのインデント幅 */
const JSON_INDENT = 4;

/** 一時ファイル名の連番（同じプロセス内で保存が重なっても衝突させない） */
let tempFileSequence = 0;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * JSONファイルを保存先とする書籍リポジトリ
 * 変更のたびにコレクション全体を書き直す
 */
export class JsonFileBookRepository implements BookRepository {
  readonly location: string;
  private readonly logger: Logger;

  /**
   * @param filePath 保存ファイルのパス
   * @param logger ロガー
   */
  constructor(filePath: string, logger: Logger) {
    this.location = filePath;
    this.logger = logger;
  }

  async load(): Promise<Result<FileError, BookCollection>> {
    let text: string;
    try {
      text = await fs.readFile(this.location, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        this.logger.debug(`保存ファイルが存在しないため、空のコレクションで開始します: ${this.location}`);
        return ok([]);
      }

      return err(
        new FileError(`保存ファイルの読み込みに失敗しました: ${describeError(error)}`, this.location, "read", error)
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      this.logger.warn(`保存ファイルが壊れているため、空のコレクションで開始します: ${this.location}`, {
        reason: describeError(error)
      });
      return ok([]);
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn(`保存ファイルの形式が配列ではないため、空のコレクションで開始します: ${this.location}`);
      return ok([]);
    }

    const { books, rejectedCount } = validateBookEntries(parsed);
    if (rejectedCount > 0) {
      this.logger.warn(`不正な形式のエントリを${rejectedCount}件読み飛ばしました`, {
        location: this.location,
        loaded: books.length
      });
    }

    return ok(books);
  }

  async save(collection: BookCollection): Promise<Result<FileError, void>> {
    // 一時ファイルに書いてから置き換える
    tempFileSequence += 1;
    const tempPath = `${this.location}.${process.pid}.${tempFileSequence}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      await fs.writeFile(tempPath, serializeCollection(collection), "utf-8");
      await fs.rename(tempPath, this.location);
      return ok(undefined);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug(`一時ファイルの削除に失敗しました: ${tempPath}`, { error: cleanupError });
      });

      return err(
        new FileError(`保存ファイルの書き込みに失敗しました: ${describeError(error)}`, this.location, "write", error)
      );
    }
  }
}

/**
 * コレクションを保存ファイルの形式に変換する
 * キーの並びは title, author, year, genre, read で固定
 */
export function serializeCollection(collection: BookCollection): string {
  const entries = collection.map(({ title, author, year, genre, read }) => ({ title, author, year, genre, read }));
  return JSON.stringify(entries, null, JSON_INDENT);
}
