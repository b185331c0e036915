import { formatNumberedList, formatProgress } from "../formatters";

import type { Prompter } from "./prompter";
import type { UseCases } from "../di/useCaseFactory";
import type { BookCollection } from "@/domain/models/book";
import type { SearchField } from "@/domain/services/bookCollectionService";

import { findBookIndex } from "@/domain/services/bookCollectionService";

export const MENU_LINES = [
  "📚 Welcome to Your Book Collection Manager! 📚",
  "1. Add a new book",
  "2. Remove a book",
  "3. Search for books",
  "4. Update book details",
  "5. View all books",
  "6. View reading progress",
  "7. Exit"
] as const;

const isYes = (answer: string): boolean => answer.trim().toLowerCase() === "yes";

const toSearchField = (choice: string): SearchField => {
  switch (choice.trim()) {
    case "1":
      return "title";
    case "2":
      return "author";
    default:
      return "any";
  }
};

/**
 * テキストメニューのシェル
 * コレクションはこのシェルが保持し、ユースケースの戻り値で置き換える
 */
export class MenuShell {
  private collection: BookCollection;
  private inputClosed = false;

  constructor(
    private readonly useCases: UseCases,
    private readonly prompter: Prompter,
    initialCollection: BookCollection
  ) {
    this.collection = initialCollection;
  }

  /**
   * 現在のコレクション
   */
  get books(): BookCollection {
    return this.collection;
  }

  /**
   * メインループ
   * 保存の失敗は致命的エラーとして呼び出し元に投げる
   */
  async run(): Promise<void> {
    try {
      while (!this.inputClosed) {
        MENU_LINES.forEach((line) => this.prompter.print(line));
        const choice = await this.ask("Please choose an option (1-7): ");
        if (this.inputClosed) break;

        switch (choice.trim()) {
          case "1":
            await this.addBook();
            break;
          case "2":
            await this.removeBook();
            break;
          case "3":
            await this.searchBooks();
            break;
          case "4":
            await this.updateBook();
            break;
          case "5":
            this.showAllBooks();
            break;
          case "6":
            this.showProgress();
            break;
          case "7":
            await this.exit();
            return;
          default:
            this.prompter.print("Invalid choice. Please try again.");
            this.prompter.print();
        }
      }

      // 入力の終端は終了と同じ扱い
      await this.exit();
    } finally {
      this.prompter.close();
    }
  }

  private async ask(question: string): Promise<string> {
    if (this.inputClosed) return "";
    const answer = await this.prompter.ask(question);
    if (answer === null) {
      this.inputClosed = true;
      return "";
    }
    return answer;
  }

  private async addBook(): Promise<void> {
    let title = "";
    while (!this.inputClosed) {
      title = (await this.ask("Enter the book title: ")).trim();
      if (title !== "") break;
      if (!this.inputClosed) this.prompter.print("Title cannot be empty. Please try again.");
    }
    if (this.inputClosed) return;

    const author = await this.ask("Enter author: ");
    const year = await this.ask("Enter publication year: ");
    const genre = await this.ask("Enter genre: ");
    const read = isYes(await this.ask("Have you read this book? (yes/no): "));
    if (this.inputClosed) return;

    const result = await this.useCases.addBook.execute({
      collection: this.collection,
      draft: { title, author, year, genre, read }
    });
    this.collection = result.unwrap().collection;

    this.prompter.print("Book added successfully!");
    this.prompter.print();
  }

  private async removeBook(): Promise<void> {
    const title = await this.ask("Enter the title of the book to remove: ");
    if (this.inputClosed) return;

    const result = await this.useCases.removeBook.execute({ collection: this.collection, title });
    const { collection, removedCount } = result.unwrap();
    this.collection = collection;

    if (removedCount === 0) {
      this.prompter.print("Book not found");
    } else if (removedCount === 1) {
      this.prompter.print("Book removed successfully!");
    } else {
      this.prompter.print(`${removedCount} books removed successfully!`);
    }
    this.prompter.print();
  }

  private async searchBooks(): Promise<void> {
    const field = toSearchField(await this.ask("Search by:\n1. Title\n2. Author\n3. Title or author\nEnter your choice: "));
    const term = await this.ask("Enter search term: ");
    if (this.inputClosed) return;

    const books = this.useCases.queryBooks.search({ collection: this.collection, term, field });
    if (books.length === 0) {
      this.prompter.print("No matching books found.");
    } else {
      this.prompter.print("Matching Books:");
      formatNumberedList(books).forEach((line) => this.prompter.print(line));
    }
    this.prompter.print();
  }

  private async updateBook(): Promise<void> {
    const originalTitle = await this.ask("Enter the title of the book you want to edit: ");
    if (this.inputClosed) return;

    const index = findBookIndex(this.collection, originalTitle);
    if (index === -1) {
      this.prompter.print("Book not found!");
      this.prompter.print();
      return;
    }

    const current = this.collection[index];
    this.prompter.print("Leave blank to keep existing value.");
    const title = await this.ask(`New title (${current.title}): `);
    const author = await this.ask(`New author (${current.author}): `);
    const year = await this.ask(`New year (${current.year}): `);
    const genre = await this.ask(`New genre (${current.genre}): `);
    const read = isYes(await this.ask("Have you read this book? (yes/no): "));
    if (this.inputClosed) return;

    const result = await this.useCases.updateBook.execute({
      collection: this.collection,
      originalTitle,
      changes: { title, author, year, genre, read }
    });
    this.collection = result.unwrap().collection;

    this.prompter.print("Book updated successfully!");
    this.prompter.print();
  }

  private showAllBooks(): void {
    const { books, isEmpty } = this.useCases.queryBooks.list(this.collection);
    if (isEmpty) {
      this.prompter.print("Your collection is empty.");
    } else {
      this.prompter.print("Your Book Collection:");
      formatNumberedList(books).forEach((line) => this.prompter.print(line));
    }
    this.prompter.print();
  }

  private showProgress(): void {
    formatProgress(this.useCases.queryBooks.progress(this.collection)).forEach((line) => this.prompter.print(line));
    this.prompter.print();
  }

  private async exit(): Promise<void> {
    (await this.useCases.saveCollection.execute(this.collection)).unwrap();
    this.prompter.print("Thank you for using Book Collection Manager. Goodbye!");
  }
}
