import { vi } from "vitest";

import { FileError } from "../domain/models/errors";
import { err, ok } from "../domain/models/result";
import { createUseCaseFactory } from "../presentation/di/useCaseFactory";

import type { BookRepository } from "../application/ports/output/bookRepository";
import type { Logger } from "../application/ports/output/logger";
import type { StorageService } from "../application/ports/output/storageService";
import type { Book, BookCollection } from "../domain/models/book";
import type { Result } from "../domain/models/result";
import type { UseCases } from "../presentation/di/useCaseFactory";

// テスト用の書籍データ
export const dune: Book = { title: "Dune", author: "Herbert", year: "1965", genre: "SF", read: false };
export const neuromancer: Book = { title: "Neuromancer", author: "Gibson", year: "1984", genre: "Cyberpunk", read: true };

/**
 * 何も出力しないロガー（呼び出しは vi.fn で記録）
 */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

/**
 * メモリ上に保存するリポジトリ
 * save の呼び出しごとに保存内容を saved に積む
 */
export class InMemoryBookRepository implements BookRepository {
  readonly location = "memory://book_data.json";
  readonly saved: BookCollection[] = [];
  stored: BookCollection;
  failOnSave = false;

  constructor(initial: BookCollection = []) {
    this.stored = initial;
  }

  async load(): Promise<Result<FileError, BookCollection>> {
    return ok(this.stored);
  }

  async save(collection: BookCollection): Promise<Result<FileError, void>> {
    if (this.failOnSave) {
      return err(new FileError("disk full", this.location, "write"));
    }
    this.stored = collection;
    this.saved.push(collection);
    return ok(undefined);
  }
}

/**
 * CSV出力先を返すだけのストレージサービス
 */
export function createMockStorageService(exportedPath = "book_data.csv"): StorageService {
  return {
    exportToCsv: vi.fn(async (_books: BookCollection, filePath?: string) => ok<FileError, string>(filePath ?? exportedPath))
  };
}

/**
 * テスト用の依存関係からユースケース一式を作成する
 */
export function createTestUseCases(
  bookRepository: BookRepository,
  storageService: StorageService = createMockStorageService(),
  logger: Logger = createMockLogger()
): UseCases {
  return createUseCaseFactory({ logger, bookRepository, storageService });
}
