import type { BookCollection } from "@/domain/models/book";
import type { FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

/**
 * ストレージサービスのポート
 * 保存ファイル以外へのエクスポートを担当
 */
export interface StorageService {
  /**
   * コレクションをCSVファイルにエクスポート
   * @param books 書籍コレクション
   * @param filePath 出力先ファイルパス（省略時は設定の既定パス）
   * @returns 成功時は書き出したファイルパス、失敗時はエラー
   */
  exportToCsv(books: BookCollection, filePath?: string): Promise<Result<FileError, string>>;
}
