/**
 * Snippet file formats
 *
 * Two JSON shapes are understood:
 * - native: `[{ Id, Title, Content, CreatedAt, ModifiedAt, Order }]`,
 *   used for the library's own file
 * - legacy: `[{ Text, Description }]`, used for import/export with
 *   older tools
 *
 * The format is picked from the first row's keys rather than by
 * searching the raw text, so content that mentions "Text" can't flip it.
 */

import { z } from 'zod';
import type { Snippet } from './types.js';

const TimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' })
  .transform((value) => new Date(value));

export const NativeSnippetRowSchema = z.object({
  Id: z.string().nullish(),
  Title: z.string().nullish(),
  Content: z.string().nullish(),
  CreatedAt: TimestampSchema.nullish(),
  ModifiedAt: TimestampSchema.nullish(),
  Order: z.number().int().nullish(),
});

export const LegacySnippetRowSchema = z.object({
  Text: z.string().nullish(),
  Description: z.string().nullish(),
});

export type NativeSnippetRow = z.infer<typeof NativeSnippetRowSchema>;
export type LegacySnippetRow = z.infer<typeof LegacySnippetRowSchema>;

export type SnippetFileFormat = 'native' | 'legacy';

export type SnippetDocument =
  | { format: 'native'; rows: NativeSnippetRow[] }
  | { format: 'legacy'; rows: LegacySnippetRow[] };

const LEGACY_KEYS = ['Text', 'Description'];
const NATIVE_KEYS = ['Id', 'Title', 'Content'];

/**
 * Classify parsed rows by the keys of the first row.
 * An empty array, or a first row that isn't an object, counts as native.
 */
export function detectFormat(rows: readonly unknown[]): SnippetFileFormat {
  const first = rows[0];
  if (typeof first !== 'object' || first === null || Array.isArray(first)) {
    return 'native';
  }
  const keys = Object.keys(first);
  const hasLegacy = LEGACY_KEYS.some((key) => keys.includes(key));
  const hasNative = NATIVE_KEYS.some((key) => keys.includes(key));
  return hasLegacy && !hasNative ? 'legacy' : 'native';
}

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Drop a leading UTF-8 byte order mark, which JSON.parse rejects.
 */
export function stripByteOrderMark(text: string): string {
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

/**
 * Parse the text of a snippet file.
 * @throws SyntaxError for malformed JSON, ZodError for rows of the wrong shape
 */
export function parseSnippetDocument(text: string): SnippetDocument {
  const data: unknown = JSON.parse(stripByteOrderMark(text));
  const rows = z.array(z.unknown()).parse(data);

  if (detectFormat(rows) === 'legacy') {
    return { format: 'legacy', rows: z.array(LegacySnippetRowSchema).parse(rows) };
  }
  return { format: 'native', rows: z.array(NativeSnippetRowSchema).parse(rows) };
}

/**
 * Canonical row with fields in their stored order.
 */
export function toNativeRow(snippet: Snippet) {
  return {
    Id: snippet.id,
    Title: snippet.title,
    Content: snippet.content,
    CreatedAt: snippet.createdAt.toISOString(),
    ModifiedAt: snippet.modifiedAt.toISOString(),
    Order: snippet.order,
  };
}

export function toLegacyRow(snippet: Snippet) {
  return {
    Text: snippet.content,
    Description: snippet.title,
  };
}

/**
 * Serialize rows the way every snippet file is written: 2-space indent.
 */
export function stringifyRows(rows: readonly object[]): string {
  return JSON.stringify(rows, null, 2);
}
