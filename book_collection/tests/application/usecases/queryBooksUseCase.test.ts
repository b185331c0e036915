import { describe, it, expect } from "vitest";

import { createQueryBooksUseCase } from "../../../application/usecases/queryBooksUseCase";
import { createMockLogger, dune, neuromancer } from "../../helpers";

describe("QueryBooksUseCase", () => {
  const useCase = createQueryBooksUseCase(createMockLogger());

  it("search は既定でタイトルと著者の両方を検索する", () => {
    expect(useCase.search({ collection: [dune, neuromancer], term: "herb" })).toEqual([dune]);
  });

  it("search で検索対象を指定できる", () => {
    expect(useCase.search({ collection: [dune, neuromancer], term: "herb", field: "title" })).toEqual([]);
  });

  it("list は空かどうかを返す", () => {
    expect(useCase.list([])).toEqual({ books: [], isEmpty: true });
    expect(useCase.list([dune]).isEmpty).toBe(false);
  });

  it("progress は既読率を返す", () => {
    expect(useCase.progress([dune, neuromancer])).toEqual({ total: 2, readCount: 1, percentage: 50 });
  });
});
