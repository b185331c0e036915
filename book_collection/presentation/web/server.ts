/**
 * フォーム画面のWebサーバー
 *
 * サイドバーのメニューから6つの操作を選び、操作のたびにページ全体を描画し直す。
 * コレクションはサーバーが保持し、ユースケースの戻り値で置き換える。
 */

import express from "express";

import {
  addBookFormSchema,
  editQuerySchema,
  formatZodError,
  removeBookFormSchema,
  searchQuerySchema,
  toBookChanges,
  toBookDraft,
  updateBookFormSchema
} from "./validation";
import {
  renderAddBookPage,
  renderBookListPage,
  renderEditBookPage,
  renderErrorPage,
  renderNotFoundPage,
  renderProgressPage,
  renderRemoveBookPage,
  renderSearchPage
} from "./views";

import type { UseCases } from "../di/useCaseFactory";
import type { Logger } from "@/application/ports/output/logger";
import type { BookCollection } from "@/domain/models/book";
import type { ErrorRequestHandler, Express, Request, RequestHandler, Response } from "express";
import type { Server } from "node:http";

import { ValidationError, describeError } from "@/domain/models/errors";
import { findBookIndex } from "@/domain/services/bookCollectionService";

/**
 * 非同期ハンドラの例外をエラーミドルウェアに渡す
 */
const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

/**
 * コレクションを変更する処理を受け付けた順に1件ずつ実行するキュー
 * 前の変更の保存が終わってから次の処理がコレクションを読む
 */
function createMutationQueue(): <T>(task: () => Promise<T>) => Promise<T> {
  let tail: Promise<unknown> = Promise.resolve();
  return (task) => {
    const run = tail.then(task);
    tail = run.catch(() => undefined);
    return run;
  };
}

/**
 * 不正なリクエスト（フォーム項目の型違いなど）
 */
class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

export interface WebAppOptions {
  readonly useCases: UseCases;
  readonly logger: Logger;
  readonly initialCollection: BookCollection;
}

/**
 * Expressアプリケーションを作成する
 */
export function createWebApp(options: WebAppOptions): Express {
  const { useCases, logger } = options;
  let collection = options.initialCollection;

  const enqueue = createMutationQueue();
  const mutation = (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
    asyncHandler((req, res) => enqueue(() => handler(req, res)));

  const app = express();
  app.disable("x-powered-by");
  app.use(express.urlencoded({ extended: false }));

  app.get("/", (_req, res) => {
    res.redirect("/books");
  });

  app.get("/books", (_req, res) => {
    const { books } = useCases.queryBooks.list(collection);
    res.type("html").send(renderBookListPage(books));
  });

  app.get("/books/new", (_req, res) => {
    res.type("html").send(renderAddBookPage());
  });

  app.post(
    "/books",
    mutation(async (req, res) => {
      const parsed = addBookFormSchema.safeParse(req.body);
      if (!parsed.success) throw new BadRequestError(formatZodError(parsed.error));
      const form = parsed.data;

      const result = await useCases.addBook.execute({ collection, draft: toBookDraft(form), requireAuthor: true });
      if (result.isError()) {
        const error = result.unwrapError();
        if (error instanceof ValidationError) {
          res.status(400).type("html").send(renderAddBookPage(form, { kind: "error", message: error.message }));
          return;
        }
        throw error;
      }

      const added = result.unwrap();
      collection = added.collection;
      res
        .type("html")
        .send(renderAddBookPage(undefined, { kind: "success", message: `Book "${added.book.title}" added successfully!` }));
    })
  );

  app.get("/books/remove", (_req, res) => {
    res.type("html").send(renderRemoveBookPage());
  });

  app.post(
    "/books/remove",
    mutation(async (req, res) => {
      const parsed = removeBookFormSchema.safeParse(req.body);
      if (!parsed.success) throw new BadRequestError(formatZodError(parsed.error));
      const { title } = parsed.data;

      if (title.trim() === "") {
        res.status(400).type("html").send(renderRemoveBookPage({ kind: "error", message: "Title cannot be empty." }));
        return;
      }

      const { collection: next, removedCount } = (await useCases.removeBook.execute({ collection, title })).unwrap();
      collection = next;

      const notice =
        removedCount === 0
          ? ({ kind: "info", message: "Book not found." } as const)
          : ({ kind: "success", message: `Removed ${removedCount} book(s) titled "${title.trim()}".` } as const);
      res.type("html").send(renderRemoveBookPage(notice));
    })
  );

  app.get("/books/search", (req, res) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) throw new BadRequestError(formatZodError(parsed.error));
    const { q, field } = parsed.data;

    // 検索語が送信されるまでは結果欄を出さない
    const results = q === undefined ? null : useCases.queryBooks.search({ collection, term: q, field });
    res.type("html").send(renderSearchPage(q ?? "", field, results));
  });

  app.get("/books/edit", (req, res) => {
    const parsed = editQuerySchema.safeParse(req.query);
    if (!parsed.success) throw new BadRequestError(formatZodError(parsed.error));
    const { title } = parsed.data;

    const titles = collection.map((book) => book.title);
    if (title === undefined) {
      res.type("html").send(renderEditBookPage(titles, null));
      return;
    }

    const index = findBookIndex(collection, title);
    if (index === -1) {
      res.status(404).type("html").send(renderEditBookPage(titles, null, { kind: "info", message: "Book not found!" }));
      return;
    }
    res.type("html").send(renderEditBookPage(titles, collection[index]));
  });

  app.post(
    "/books/edit",
    mutation(async (req, res) => {
      const parsed = updateBookFormSchema.safeParse(req.body);
      if (!parsed.success) throw new BadRequestError(formatZodError(parsed.error));
      const form = parsed.data;

      const { collection: next, updated } = (
        await useCases.updateBook.execute({ collection, originalTitle: form.originalTitle, changes: toBookChanges(form) })
      ).unwrap();
      collection = next;

      const titles = collection.map((book) => book.title);
      if (updated === null) {
        res.status(404).type("html").send(renderEditBookPage(titles, null, { kind: "info", message: "Book not found!" }));
        return;
      }
      res
        .type("html")
        .send(renderEditBookPage(titles, updated, { kind: "success", message: "Book updated successfully!" }));
    })
  );

  app.get("/progress", (_req, res) => {
    res.type("html").send(renderProgressPage(useCases.queryBooks.progress(collection)));
  });

  app.use((req, res) => {
    res.status(404).type("html").send(renderNotFoundPage(req.path));
  });

  const handleError: ErrorRequestHandler = (error, req, res, _next) => {
    if (error instanceof BadRequestError) {
      res.status(400).type("html").send(renderErrorPage(error.message));
      return;
    }

    logger.error(`リクエストの処理中にエラーが発生しました: ${req.method} ${req.path}`, { error });
    res.status(500).type("html").send(renderErrorPage(describeError(error)));
  };
  app.use(handleError);

  return app;
}

/**
 * 指定したホスト・ポートで待ち受けを開始する
 * @param port 0 を指定すると空いているポートを使う
 * @returns サーバーとアクセス用のURL
 */
export function startWebServer(app: Express, host: string, port: number): Promise<{ server: Server; url: string }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      const actualPort = typeof address === "object" && address !== null ? address.port : port;
      resolve({ server, url: `http://${host}:${actualPort}` });
    });
  });
}

/**
 * 待ち受けを終了する
 */
export function stopWebServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
