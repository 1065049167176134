/**
 * Snippet data model
 */

/**
 * A titled, timestamped, reusable text record.
 */
export interface Snippet {
  id: string;
  title: string;
  content: string;
  /** UTC, set once at creation */
  createdAt: Date;
  /** UTC, bumped on every title/content edit */
  modifiedAt: Date;
  /** Dense zero-based rank, used by the custom sort */
  order: number;
}

export type SnippetSortMode = 'custom' | 'title' | 'dateCreated';

export type SortDirection = 'ascending' | 'descending';

/**
 * Whether the direction toggle applies to the custom sort.
 * - ignore: custom is always ascending by order
 * - respect: descending reverses the custom order too
 */
export type CustomSortDirectionPolicy = 'ignore' | 'respect';

export const SORT_MODES: readonly SnippetSortMode[] = ['custom', 'title', 'dateCreated'];
