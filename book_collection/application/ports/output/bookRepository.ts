import type { BookCollection } from "@/domain/models/book";
import type { FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";

/**
 * 書籍リポジトリのポート
 * コレクション全体の永続化と読み込みを担当
 */
export interface BookRepository {
  /**
   * 保存先からコレクションを読み込む
   * ファイルが存在しない・壊れている場合は空のコレクションを返す
   * @returns 読み込んだコレクション。権限不足などの入出力エラーの場合のみ FileError
   */
  load(): Promise<Result<FileError, BookCollection>>;

  /**
   * コレクション全体で保存先を置き換える
   * @param collection 保存するコレクション
   * @returns 成功時はvoid、失敗時はFileError
   */
  save(collection: BookCollection): Promise<Result<FileError, void>>;

  /**
   * 保存先のパス
   */
  readonly location: string;
}
