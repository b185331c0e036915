/**
 * 書籍レコード
 * コレクションに登録される1冊分の情報
 */
export type Book = {
  readonly title: string;
  readonly author: string;
  readonly year: string;
  readonly genre: string;
  readonly read: boolean;
};

/**
 * 書籍コレクション
 * 登録順を保持した書籍の配列。変更操作は常に新しい配列を返す
 */
export type BookCollection = readonly Book[];

/**
 * 新規登録時にユーザーから受け取る入力
 */
export type BookDraft = {
  title: string;
  author?: string;
  year?: string;
  genre?: string;
  read?: boolean;
};

/**
 * 更新時にユーザーから受け取る入力
 * テキスト項目は空欄なら元の値を維持する。readは常に入力値で上書きする
 */
export type BookChanges = {
  title?: string;
  author?: string;
  year?: string;
  genre?: string;
  read: boolean;
};

/**
 * 書籍を作成する
 * @param draft 入力値
 * @returns 前後の空白を除去した書籍オブジェクト
 */
export function createBook(draft: Readonly<BookDraft>): Book {
  return {
    title: draft.title.trim(),
    author: (draft.author ?? "").trim(),
    year: (draft.year ?? "").trim(),
    genre: (draft.genre ?? "").trim(),
    read: draft.read ?? false
  };
}

const keepOrReplace = (current: string, next: string | undefined): string => {
  const trimmed = (next ?? "").trim();
  return trimmed === "" ? current : trimmed;
};

/**
 * 書籍を更新する
 * @param book 元の書籍
 * @param changes 更新内容
 * @returns 更新された新しい書籍オブジェクト
 */
export function updateBook(book: Readonly<Book>, changes: Readonly<BookChanges>): Book {
  return {
    title: keepOrReplace(book.title, changes.title),
    author: keepOrReplace(book.author, changes.author),
    year: keepOrReplace(book.year, changes.year),
    genre: keepOrReplace(book.genre, changes.genre),
    read: changes.read
  };
}

/**
 * タイトルが一致するか（大文字小文字を区別しない）
 */
export function hasTitle(book: Readonly<Book>, title: string): boolean {
  return book.title.toLowerCase() === title.trim().toLowerCase();
}
