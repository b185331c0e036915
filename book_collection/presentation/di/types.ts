import type { AddBookParams, AddBookResult } from "@/application/usecases/addBookUseCase";
import type { ExportBooksParams } from "@/application/usecases/exportBooksUseCase";
import type { SearchBooksParams } from "@/application/usecases/queryBooksUseCase";
import type { RemoveBookParams, RemoveBookResult } from "@/application/usecases/removeBookUseCase";
import type { UpdateBookParams, UpdateBookResult } from "@/application/usecases/updateBookUseCase";
import type { Book, BookCollection } from "@/domain/models/book";
import type { AppError, FileError } from "@/domain/models/errors";
import type { Result } from "@/domain/models/result";
import type { ReadingProgress } from "@/domain/services/bookCollectionService";

// 各ユースケースの型定義
export interface LoadCollectionUseCase {
  execute: () => Promise<Result<FileError, BookCollection>>;
}

export interface SaveCollectionUseCase {
  execute: (collection: BookCollection) => Promise<Result<FileError, void>>;
}

export interface AddBookUseCase {
  execute: (params: AddBookParams) => Promise<Result<AppError, AddBookResult>>;
}

export interface RemoveBookUseCase {
  execute: (params: RemoveBookParams) => Promise<Result<FileError, RemoveBookResult>>;
}

export interface UpdateBookUseCase {
  execute: (params: UpdateBookParams) => Promise<Result<FileError, UpdateBookResult>>;
}

export interface QueryBooksUseCase {
  search: (params: SearchBooksParams) => Book[];
  list: (collection: BookCollection) => { books: BookCollection; isEmpty: boolean };
  progress: (collection: BookCollection) => ReadingProgress;
}

export interface ExportBooksUseCase {
  execute: (params: ExportBooksParams) => Promise<Result<FileError, string>>;
}
