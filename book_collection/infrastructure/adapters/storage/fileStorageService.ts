import fs from "node:fs/promises";
import path from "node:path";

import { unparse } from "papaparse";

import type { Logger } from "@/application/ports/output/logger";
import type { StorageService } from "@/application/ports/output/storageService";
import type { BookCollection } from "@/domain/models/book";
import type { Result } from "@/domain/models/result";

import { CSV_COLUMNS } from "@/domain/constants/csvColumns";
import { FileError, describeError } from "@/domain/models/errors";
import { err, ok } from "@/domain/models/result";

/**
 * ファイルストレージサービスの実装
 * コレクションのCSVエクスポートを担当
 */
export class FileStorageService implements StorageService {
  private readonly logger: Logger;
  private readonly defaultCsvPath: string;

  /**
   * @param logger ロガー
   * @param options 設定オプション
   */
  constructor(logger: Logger, options: Readonly<{ defaultCsvPath: string }>) {
    this.logger = logger;
    this.defaultCsvPath = options.defaultCsvPath;
  }

  async exportToCsv(books: BookCollection, filePath?: string): Promise<Result<FileError, string>> {
    const targetPath = filePath || this.defaultCsvPath;

    try {
      const rows = books.map((book) => CSV_COLUMNS.map((column) => (column === "read" ? String(book.read) : book[column])));

      const csvData = unparse({ fields: [...CSV_COLUMNS], data: rows }, { header: true });

      await fs.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.writeFile(targetPath, csvData, "utf-8");

      this.logger.info(`CSVファイルを保存しました: ${targetPath} (${books.length}冊)`, {
        size: books.length,
        filePath: targetPath
      });

      return ok(targetPath);
    } catch (error) {
      const fileError = new FileError(
        `CSVファイルの書き込みに失敗しました: ${describeError(error)}`,
        targetPath,
        "write",
        error
      );

      this.logger.error(fileError.message, { error, filePath: targetPath });
      return err(fileError);
    }
  }
}
