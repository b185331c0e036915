import { describe, it, expect } from "vitest";

import {
  formatBookLine,
  formatNumberedList,
  formatPercentage,
  formatProgress,
  readStatusLabel
} from "../../presentation/formatters";
import { dune, neuromancer } from "../helpers";

describe("formatters", () => {
  it("readStatusLabel は既読・未読を返す", () => {
    expect(readStatusLabel(dune)).toBe("Unread");
    expect(readStatusLabel(neuromancer)).toBe("Read");
  });

  it("formatBookLine は1行で書籍を表す", () => {
    expect(formatBookLine(neuromancer)).toBe("Neuromancer by Gibson (1984) - Cyberpunk - Read");
  });

  it("出版年・ジャンルが空なら N/A と表示する", () => {
    expect(formatBookLine({ title: "B", author: "C", year: "", genre: "", read: false })).toBe(
      "B by C (N/A) - N/A - Unread"
    );
  });

  it("formatNumberedList は1始まりの番号を付ける", () => {
    expect(formatNumberedList([dune, neuromancer])).toEqual([
      "1. Dune by Herbert (1965) - SF - Unread",
      "2. Neuromancer by Gibson (1984) - Cyberpunk - Read"
    ]);
  });

  it("formatPercentage は小数点以下2桁", () => {
    expect(formatPercentage(100 / 3)).toBe("33.33%");
    expect(formatPercentage(0)).toBe("0.00%");
  });

  it("formatProgress は3行を返す", () => {
    expect(formatProgress({ total: 3, readCount: 2, percentage: (2 / 3) * 100 })).toEqual([
      "Total books in collection: 3",
      "Books read: 2",
      "Reading progress: 66.67%"
    ]);
  });
});
