import type { CoreDependencies } from "./dependencies";
import type {
  AddBookUseCase,
  ExportBooksUseCase,
  LoadCollectionUseCase,
  QueryBooksUseCase,
  RemoveBookUseCase,
  SaveCollectionUseCase,
  UpdateBookUseCase
} from "./types";

import { createAddBookUseCase } from "@/application/usecases/addBookUseCase";
import { createExportBooksUseCase } from "@/application/usecases/exportBooksUseCase";
import { createLoadCollectionUseCase } from "@/application/usecases/loadCollectionUseCase";
import { createQueryBooksUseCase } from "@/application/usecases/queryBooksUseCase";
import { createRemoveBookUseCase } from "@/application/usecases/removeBookUseCase";
import { createSaveCollectionUseCase } from "@/application/usecases/saveCollectionUseCase";
import { createUpdateBookUseCase } from "@/application/usecases/updateBookUseCase";

/**
 * ユースケース一式
 * どちらのシェルもこの集合だけを通してコレクションを操作する
 */
export interface UseCases {
  readonly loadCollection: LoadCollectionUseCase;
  readonly saveCollection: SaveCollectionUseCase;
  readonly addBook: AddBookUseCase;
  readonly removeBook: RemoveBookUseCase;
  readonly updateBook: UpdateBookUseCase;
  readonly queryBooks: QueryBooksUseCase;
  readonly exportBooks: ExportBooksUseCase;
}

/**
 * ユースケースを作成する
 * @param deps コア依存関係
 */
export function createUseCaseFactory(deps: CoreDependencies): UseCases {
  const { bookRepository, storageService, logger } = deps;

  return {
    loadCollection: createLoadCollectionUseCase(bookRepository, logger),
    saveCollection: createSaveCollectionUseCase(bookRepository, logger),
    addBook: createAddBookUseCase(bookRepository, logger),
    removeBook: createRemoveBookUseCase(bookRepository, logger),
    updateBook: createUpdateBookUseCase(bookRepository, logger),
    queryBooks: createQueryBooksUseCase(logger),
    exportBooks: createExportBooksUseCase(storageService, logger)
  };
}
