import { describe, it, expect, vi } from "vitest";

import { createLoadCollectionUseCase } from "../../../application/usecases/loadCollectionUseCase";
import { createSaveCollectionUseCase } from "../../../application/usecases/saveCollectionUseCase";
import { FileError } from "../../../domain/models/errors";
import { err } from "../../../domain/models/result";
import { InMemoryBookRepository, createMockLogger, dune } from "../../helpers";

describe("LoadCollectionUseCase", () => {
  it("リポジトリからコレクションを読み込む", async () => {
    const useCase = createLoadCollectionUseCase(new InMemoryBookRepository([dune]), createMockLogger());

    const result = await useCase.execute();

    expect(result.unwrap()).toEqual([dune]);
  });

  it("読み込みエラーをそのまま返し、エラーログを出す", async () => {
    const repository = new InMemoryBookRepository();
    vi.spyOn(repository, "load").mockResolvedValue(err(new FileError("EISDIR", repository.location, "read")));
    const logger = createMockLogger();

    const result = await createLoadCollectionUseCase(repository, logger).execute();

    expect(result.isError()).toBe(true);
    expect(result.unwrapError().operation).toBe("read");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe("SaveCollectionUseCase", () => {
  it("コレクション全体を保存する", async () => {
    const repository = new InMemoryBookRepository();

    const result = await createSaveCollectionUseCase(repository, createMockLogger()).execute([dune]);

    expect(result.isSuccess()).toBe(true);
    expect(repository.stored).toEqual([dune]);
  });

  it("保存に失敗した場合はエラーを返す", async () => {
    const repository = new InMemoryBookRepository();
    repository.failOnSave = true;

    const result = await createSaveCollectionUseCase(repository, createMockLogger()).execute([dune]);

    expect(result.unwrapError()).toBeInstanceOf(FileError);
  });
});
