import { z } from "zod";

import type { BookChanges, BookDraft } from "@/domain/models/book";
import type { SearchField } from "@/domain/services/bookCollectionService";

/** 未送信の項目は空文字として扱う */
const formText = z.string().optional().default("");

/** チェックボックスは送信されたときだけ true */
const checkbox = z
  .string()
  .optional()
  .transform((value) => value !== undefined);

export const addBookFormSchema = z.object({
  title: formText,
  author: formText,
  year: formText,
  genre: formText,
  read: checkbox
});

export const removeBookFormSchema = z.object({
  title: formText
});

export const updateBookFormSchema = z.object({
  originalTitle: formText,
  title: formText,
  author: formText,
  year: formText,
  genre: formText,
  read: checkbox
});

const searchFields = ["any", "title", "author"] as const satisfies readonly SearchField[];

export const searchQuerySchema = z.object({
  q: z.string().optional(),
  field: z.enum(searchFields).optional().default("any")
});

export const editQuerySchema = z.object({
  title: z.string().optional()
});

export type AddBookForm = z.infer<typeof addBookFormSchema>;
export type UpdateBookForm = z.infer<typeof updateBookFormSchema>;

export const toBookDraft = (form: AddBookForm): BookDraft => ({ ...form });

export const toBookChanges = (form: UpdateBookForm): BookChanges => ({
  title: form.title,
  author: form.author,
  year: form.year,
  genre: form.genre,
  read: form.read
});

/**
 * zod のエラーを画面表示用の1行にまとめる
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
