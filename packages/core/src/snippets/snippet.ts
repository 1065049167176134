import { randomUUID } from 'crypto';
import type { Snippet } from './types.js';

export const DEFAULT_PREVIEW_LENGTH = 100;

/**
 * Clock and id source, injectable so tests get stable values.
 */
export interface SnippetFactoryOptions {
  now?: () => Date;
  generateId?: () => string;
}

export const defaultNow = (): Date => new Date();
export const defaultGenerateId = (): string => randomUUID();

/**
 * Create a snippet with a fresh id and both timestamps set to now.
 */
export function createSnippet(
  title: string,
  content: string,
  order = 0,
  { now = defaultNow, generateId = defaultGenerateId }: SnippetFactoryOptions = {}
): Snippet {
  const timestamp = now();
  return {
    id: generateId(),
    title,
    content,
    createdAt: timestamp,
    modifiedAt: new Date(timestamp.getTime()),
    order,
  };
}

/**
 * Single-line preview of the content for list display.
 * Newlines become spaces, carriage returns are dropped, and content
 * longer than `length` is cut and marked with "...".
 */
export function getPreview(snippet: Pick<Snippet, 'content'>, length = DEFAULT_PREVIEW_LENGTH): string {
  const { content } = snippet;
  const truncated = content.length > length;
  const head = truncated ? content.slice(0, length) : content;
  const flat = head.replace(/\n/g, ' ').replace(/\r/g, '');
  return truncated ? `${flat}...` : flat;
}

/**
 * Rewrite every `order` to match list position (0..N-1).
 */
export function renormalizeOrder(snippets: Snippet[]): void {
  snippets.forEach((snippet, index) => {
    snippet.order = index;
  });
}

export function cloneSnippet(snippet: Snippet): Snippet {
  return {
    ...snippet,
    createdAt: new Date(snippet.createdAt.getTime()),
    modifiedAt: new Date(snippet.modifiedAt.getTime()),
  };
}

/**
 * True when both title and content are empty or whitespace.
 */
export function isEmptySnippet(snippet: Pick<Snippet, 'title' | 'content'>): boolean {
  return snippet.title.trim() === '' && snippet.content.trim() === '';
}
