import { formatPercentage, readStatusLabel } from "../formatters";

import { escapeHtml } from "./html";

import type { Book, BookCollection } from "@/domain/models/book";
import type { ReadingProgress, SearchField } from "@/domain/services/bookCollectionService";

export type PageId = "add" | "remove" | "search" | "update" | "view" | "progress";

export type Notice = {
  readonly kind: "success" | "info" | "error";
  readonly message: string;
};

const NAV_ITEMS: ReadonlyArray<{ id: PageId; href: string; label: string }> = [
  { id: "add", href: "/books/new", label: "Add a new book" },
  { id: "remove", href: "/books/remove", label: "Remove a book" },
  { id: "search", href: "/books/search", label: "Search for books" },
  { id: "update", href: "/books/edit", label: "Update book details" },
  { id: "view", href: "/books", label: "View all books" },
  { id: "progress", href: "/progress", label: "View reading progress" }
];

const STYLE = `
body { font-family: sans-serif; margin: 0; display: flex; min-height: 100vh; }
nav { width: 14rem; background: #f0f2f6; padding: 1rem; }
nav a { display: block; padding: .4rem .6rem; color: inherit; text-decoration: none; border-radius: .3rem; }
nav a.active { background: #dfe3ea; font-weight: bold; }
main { flex: 1; padding: 1.5rem 2rem; }
label { display: block; margin: .6rem 0 .2rem; }
.notice { padding: .6rem 1rem; border-radius: .3rem; }
.notice.success { background: #e6f4ea; }
.notice.info { background: #e8f0fe; }
.notice.error { background: #fce8e6; }
table { border-collapse: collapse; }
th, td { border-bottom: 1px solid #ddd; padding: .3rem .8rem; text-align: left; }
`;

function renderNotice(notice?: Notice): string {
  if (!notice) return "";
  return `<p class="notice ${notice.kind}" role="status">${escapeHtml(notice.message)}</p>`;
}

/**
 * サイドバー付きのページ全体
 */
export function renderLayout(active: PageId | null, heading: string, body: string, notice?: Notice): string {
  const nav = NAV_ITEMS.map(
    (item) => `<a href="${item.href}"${item.id === active ? ' class="active"' : ""}>${escapeHtml(item.label)}</a>`
  ).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(heading)} - Book Collection Manager</title>
<style>${STYLE}</style>
</head>
<body>
<nav>
<h2>📚 Book Collection</h2>
${nav}
</nav>
<main>
<h1>${escapeHtml(heading)}</h1>
${renderNotice(notice)}
${body}
</main>
</body>
</html>`;
}

function textInput(name: string, label: string, value = "", placeholder = "", id = name): string {
  const placeholderAttr = placeholder === "" ? "" : ` placeholder="${escapeHtml(placeholder)}"`;
  return `<label for="${id}">${escapeHtml(label)}</label>
<input id="${id}" name="${name}" type="text" value="${escapeHtml(value)}"${placeholderAttr}>`;
}

function readCheckbox(checked: boolean): string {
  return `<label><input name="read" type="checkbox"${checked ? " checked" : ""}> I have read this book</label>`;
}

function renderBookTable(books: readonly Book[]): string {
  const rows = books
    .map(
      (book, index) =>
        `<tr><td>${index + 1}</td><td>${escapeHtml(book.title)}</td><td>${escapeHtml(book.author)}</td>` +
        `<td>${escapeHtml(book.year)}</td><td>${escapeHtml(book.genre)}</td><td>${readStatusLabel(book)}</td></tr>`
    )
    .join("\n");

  return `<table>
<thead><tr><th>#</th><th>Title</th><th>Author</th><th>Year</th><th>Genre</th><th>Status</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>`;
}

export function renderBookListPage(books: BookCollection): string {
  const body = books.length === 0 ? "<p>Your collection is empty.</p>" : renderBookTable(books);
  return renderLayout("view", "Your Book Collection", body);
}

export type AddFormValues = {
  readonly title: string;
  readonly author: string;
  readonly year: string;
  readonly genre: string;
  readonly read: boolean;
};

const EMPTY_ADD_FORM: AddFormValues = { title: "", author: "", year: "", genre: "", read: false };

export function renderAddBookPage(values: AddFormValues = EMPTY_ADD_FORM, notice?: Notice): string {
  const body = `<form method="post" action="/books">
${textInput("title", "Title", values.title)}
${textInput("author", "Author", values.author)}
${textInput("year", "Publication year", values.year)}
${textInput("genre", "Genre", values.genre)}
${readCheckbox(values.read)}
<p><button type="submit">Add book</button></p>
</form>`;
  return renderLayout("add", "Add a new book", body, notice);
}

export function renderRemoveBookPage(notice?: Notice): string {
  const body = `<form method="post" action="/books/remove">
${textInput("title", "Title of the book to remove")}
<p><button type="submit">Remove book</button></p>
</form>`;
  return renderLayout("remove", "Remove a book", body, notice);
}

const SEARCH_FIELD_LABELS: ReadonlyArray<{ value: SearchField; label: string }> = [
  { value: "any", label: "Title or author" },
  { value: "title", label: "Title" },
  { value: "author", label: "Author" }
];

/**
 * 検索画面
 * @param results 検索していない場合は null（結果欄を出さない）
 */
export function renderSearchPage(term: string, field: SearchField, results: readonly Book[] | null): string {
  const options = SEARCH_FIELD_LABELS.map(
    (option) =>
      `<option value="${option.value}"${option.value === field ? " selected" : ""}>${escapeHtml(option.label)}</option>`
  ).join("");

  const form = `<form method="get" action="/books/search">
${textInput("q", "Search term", term)}
<label for="field">Search by</label>
<select id="field" name="field">${options}</select>
<p><button type="submit">Search</button></p>
</form>`;

  let resultSection = "";
  if (results !== null) {
    resultSection =
      results.length === 0
        ? "<p>No matching books found.</p>"
        : `<h2>Matching Books</h2>\n${renderBookTable(results)}`;
  }

  return renderLayout("search", "Search for books", `${form}\n${resultSection}`);
}

/**
 * 更新画面
 * @param selected 編集対象。未選択なら選択フォームのみ
 */
export function renderEditBookPage(titles: readonly string[], selected: Book | null, notice?: Notice): string {
  const options = titles
    .map(
      (title) =>
        `<option value="${escapeHtml(title)}"${selected?.title === title ? " selected" : ""}>${escapeHtml(title)}</option>`
    )
    .join("");

  const chooser =
    titles.length === 0
      ? "<p>Your collection is empty.</p>"
      : `<form method="get" action="/books/edit">
<label for="title">Book to edit</label>
<select id="title" name="title">${options}</select>
<button type="submit">Select</button>
</form>`;

  const editor =
    selected === null
      ? ""
      : `<form method="post" action="/books/edit">
<p>Leave blank to keep existing value.</p>
<input type="hidden" name="originalTitle" value="${escapeHtml(selected.title)}">
${textInput("title", "New title", "", selected.title, "new-title")}
${textInput("author", "New author", "", selected.author)}
${textInput("year", "New year", "", selected.year)}
${textInput("genre", "New genre", "", selected.genre)}
${readCheckbox(selected.read)}
<p><button type="submit">Update book</button></p>
</form>`;

  return renderLayout("update", "Update book details", `${chooser}\n${editor}`, notice);
}

export function renderProgressPage(progress: ReadingProgress): string {
  const body = `<dl>
<dt>Total books in collection</dt><dd>${progress.total}</dd>
<dt>Books read</dt><dd>${progress.readCount}</dd>
<dt>Reading progress</dt><dd>${formatPercentage(progress.percentage)}</dd>
</dl>
<progress max="100" value="${progress.percentage.toFixed(2)}"></progress>`;
  return renderLayout("progress", "Reading progress", body);
}

export function renderNotFoundPage(path: string): string {
  return renderLayout(null, "Page not found", `<p>No page at ${escapeHtml(path)}.</p>`);
}

export function renderErrorPage(message: string): string {
  return renderLayout(null, "Something went wrong", "", { kind: "error", message });
}
