import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { JsonFileBookRepository } from "../../../infrastructure/adapters/repositories/jsonFileBookRepository";
import { createWebApp, startWebServer, stopWebServer } from "../../../presentation/web/server";
import { InMemoryBookRepository, createMockLogger, createTestUseCases, dune, neuromancer } from "../../helpers";

import type { Logger } from "../../../application/ports/output/logger";
import type { Server } from "node:http";

describe("Webサーバー", () => {
  let repository: InMemoryBookRepository;
  let logger: Logger;
  let server: Server;
  let baseUrl: string;

  const start = async (initial = [dune, neuromancer]) => {
    repository = new InMemoryBookRepository(initial);
    logger = createMockLogger();
    const app = createWebApp({
      useCases: createTestUseCases(repository, undefined, logger),
      logger,
      initialCollection: initial
    });
    const started = await startWebServer(app, "127.0.0.1", 0);
    server = started.server;
    baseUrl = started.url;
  };

  const postForm = (pathname: string, fields: Record<string, string>) =>
    fetch(`${baseUrl}${pathname}`, { method: "POST", body: new URLSearchParams(fields) });

  beforeEach(async () => {
    await start();
  });

  afterEach(async () => {
    await stopWebServer(server);
  });

  it("/ は一覧にリダイレクトする", async () => {
    const response = await fetch(`${baseUrl}/`, { redirect: "manual" });

    expect(response.status).toBe(302);
    expect(response.headers.get("location")).toBe("/books");
  });

  it("一覧に全件を表示する", async () => {
    const response = await fetch(`${baseUrl}/books`);
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/html");
    expect(html).toContain("<td>Dune</td><td>Herbert</td><td>1965</td><td>SF</td><td>Unread</td>");
    expect(html).toContain("<td>Neuromancer</td><td>Gibson</td><td>1984</td><td>Cyberpunk</td><td>Read</td>");
  });

  it("空のコレクションではメッセージを表示する", async () => {
    await stopWebServer(server);
    await start([]);

    const html = await (await fetch(`${baseUrl}/books`)).text();

    expect(html).toContain("<p>Your collection is empty.</p>");
  });

  describe("追加", () => {
    it("フォームから追加して保存する", async () => {
      await stopWebServer(server);
      await start([dune]);

      const response = await postForm("/books", {
        title: "Neuromancer",
        author: "Gibson",
        year: "1984",
        genre: "Cyberpunk",
        read: "on"
      });

      expect(response.status).toBe(200);
      expect(await response.text()).toContain(
        '<p class="notice success" role="status">Book &quot;Neuromancer&quot; added successfully!</p>'
      );
      expect(repository.saved).toEqual([[dune, neuromancer]]);
    });

    it("著者が空なら 400 を返し、入力値を残す", async () => {
      const response = await postForm("/books", { title: "Solaris", author: " " });
      const html = await response.text();

      expect(response.status).toBe(400);
      expect(html).toContain('<p class="notice error" role="status">Author cannot be empty.</p>');
      expect(html).toContain('<input id="title" name="title" type="text" value="Solaris">');
      expect(repository.saved).toHaveLength(0);
    });

    it("保存に失敗したら 500 を返し、エラーログを出す", async () => {
      repository.failOnSave = true;

      const response = await postForm("/books", { title: "Solaris", author: "Lem" });

      expect(response.status).toBe(500);
      expect(await response.text()).toContain("<h1>Something went wrong</h1>");
      expect(logger.error).toHaveBeenCalled();
    });
  });

  describe("削除", () => {
    it("タイトルが一致する書籍を削除する", async () => {
      const response = await postForm("/books/remove", { title: "dune" });

      expect(await response.text()).toContain("Removed 1 book(s) titled &quot;dune&quot;.");
      expect(repository.saved).toEqual([[neuromancer]]);
    });

    it("該当がなければ Book not found. と表示する", async () => {
      const response = await postForm("/books/remove", { title: "Solaris" });

      expect(response.status).toBe(200);
      expect(await response.text()).toContain('<p class="notice info" role="status">Book not found.</p>');
      expect(repository.saved).toHaveLength(0);
    });

    it("タイトルが空なら 400", async () => {
      const response = await postForm("/books/remove", { title: "" });

      expect(response.status).toBe(400);
      expect(await response.text()).toContain("Title cannot be empty.");
    });
  });

  describe("検索", () => {
    it("検索語がなければ結果欄を出さない", async () => {
      const html = await (await fetch(`${baseUrl}/books/search`)).text();

      expect(html).not.toContain("Matching Books");
      expect(html).not.toContain("No matching books found.");
    });

    it("指定した項目で検索する", async () => {
      const html = await (await fetch(`${baseUrl}/books/search?q=gib&field=author`)).text();

      expect(html).toContain("<h2>Matching Books</h2>");
      expect(html).toContain("<td>Neuromancer</td>");
      expect(html).not.toContain("<td>Dune</td>");
    });

    it("該当がなければメッセージを表示する", async () => {
      const html = await (await fetch(`${baseUrl}/books/search?q=gib&field=title`)).text();

      expect(html).toContain("<p>No matching books found.</p>");
    });

    it("不正な検索項目は 400", async () => {
      const response = await fetch(`${baseUrl}/books/search?q=gib&field=isbn`);

      expect(response.status).toBe(400);
    });
  });

  describe("更新", () => {
    it("選択した書籍の編集フォームを表示する", async () => {
      const html = await (await fetch(`${baseUrl}/books/edit?title=dune`)).text();

      expect(html).toContain('<input type="hidden" name="originalTitle" value="Dune">');
      expect(html).toContain('<option value="Dune" selected>Dune</option>');
    });

    it("存在しない書籍は 404", async () => {
      const response = await fetch(`${baseUrl}/books/edit?title=Solaris`);

      expect(response.status).toBe(404);
      expect(await response.text()).toContain("Book not found!");
    });

    it("空欄の項目を維持して更新する", async () => {
      const response = await postForm("/books/edit", {
        originalTitle: "Dune",
        title: "",
        author: "",
        year: "",
        genre: "Fiction"
      });

      expect(response.status).toBe(200);
      expect(await response.text()).toContain("Book updated successfully!");
      expect(repository.saved).toEqual([
        [{ title: "Dune", author: "Herbert", year: "1965", genre: "Fiction", read: false }, neuromancer]
      ]);
    });

    it("更新対象がなければ 404 で保存しない", async () => {
      const response = await postForm("/books/edit", { originalTitle: "Solaris", title: "X" });

      expect(response.status).toBe(404);
      expect(repository.saved).toHaveLength(0);
    });
  });

  it("読書進捗を表示する", async () => {
    const html = await (await fetch(`${baseUrl}/progress`)).text();

    expect(html).toContain("<dt>Total books in collection</dt><dd>2</dd>");
    expect(html).toContain("<dt>Books read</dt><dd>1</dd>");
    expect(html).toContain("<dd>50.00%</dd>");
  });

  it("存在しないページは 404", async () => {
    const response = await fetch(`${baseUrl}/unknown`);

    expect(response.status).toBe(404);
    expect(await response.text()).toContain("<h1>Page not found</h1>");
  });
});

describe("Webサーバーとファイル保存", () => {
  let tempDir: string;
  let repository: JsonFileBookRepository;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "book-collection-web-"));
    const logger = createMockLogger();
    repository = new JsonFileBookRepository(path.join(tempDir, "book_data.json"), logger);
    const app = createWebApp({ useCases: createTestUseCases(repository, undefined, logger), logger, initialCollection: [] });
    const started = await startWebServer(app, "127.0.0.1", 0);
    server = started.server;
    baseUrl = started.url;
  });

  afterEach(async () => {
    await stopWebServer(server);
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const addBook = (title: string) =>
    fetch(`${baseUrl}/books`, { method: "POST", body: new URLSearchParams({ title, author: "Anon" }) });

  it("同時に送信された追加がすべて保存され、画面とファイルが一致する", async () => {
    const responses = await Promise.all([addBook("A"), addBook("B"), addBook("C")]);

    expect(responses.map((response) => response.status)).toEqual([200, 200, 200]);

    const stored = (await repository.load()).unwrap();
    expect(stored.map((book) => book.title).sort()).toEqual(["A", "B", "C"]);

    const html = await (await fetch(`${baseUrl}/books`)).text();
    for (const book of stored) {
      expect(html).toContain(`<td>${book.title}</td><td>Anon</td>`);
    }
    expect(await fs.readdir(tempDir)).toEqual(["book_data.json"]);
  });

  it("追加・更新・削除を続けて行うとファイルは最後の状態と一致する", async () => {
    await addBook("A");
    await addBook("B");
    await fetch(`${baseUrl}/books/edit`, {
      method: "POST",
      body: new URLSearchParams({ originalTitle: "a", genre: "Essay", read: "on" })
    });
    await fetch(`${baseUrl}/books/remove`, { method: "POST", body: new URLSearchParams({ title: "B" }) });

    expect((await repository.load()).unwrap()).toEqual([
      { title: "A", author: "Anon", year: "", genre: "Essay", read: true }
    ]);
  });
});
