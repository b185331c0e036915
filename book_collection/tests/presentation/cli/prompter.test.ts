import { PassThrough } from "node:stream";

import { describe, it, expect } from "vitest";

import { createReadlinePrompter } from "../../../presentation/cli/prompter";

describe("createReadlinePrompter", () => {
  it("質問を出力し、入力された1行を返す", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createReadlinePrompter(input, output);

    const answer = prompter.ask("Enter the book title: ");
    input.write("Dune\n");

    expect(await answer).toBe("Dune");
    prompter.print("Book added successfully!");
    prompter.close();

    const written: unknown = output.read();
    expect(String(written)).toBe("Enter the book title: Book added successfully!\n");
  });

  it("閉じた後は null を返す", async () => {
    const prompter = createReadlinePrompter(new PassThrough(), new PassThrough());

    prompter.close();

    expect(await prompter.ask("Enter the book title: ")).toBeNull();
  });
});
