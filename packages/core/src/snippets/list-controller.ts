/**
 * Snippet List Controller
 *
 * Owns the working set of snippets for one host session. Views
 * (refreshList, getAllSnippets) are synchronous and never mutate it;
 * every mutation runs under a mutex and finishes writing the whole
 * collection before the next one starts.
 */

import { Mutex } from 'async-mutex';
import { CircularBuffer, consoleLogger, nonBlank, type Logger } from '../utils/index.js';
import {
  cloneSnippet,
  createSnippet,
  defaultGenerateId,
  defaultNow,
  isEmptySnippet,
  renormalizeOrder,
  type SnippetFactoryOptions,
} from './snippet.js';
import type { SnippetStore } from './store.js';
import {
  SORT_MODES,
  type CustomSortDirectionPolicy,
  type Snippet,
  type SnippetSortMode,
  type SortDirection,
} from './types.js';

export const DEFAULT_HISTORY_SIZE = 20;

/**
 * Notifications sent to the host.
 * - change: the collection was mutated and persisted (re-read it)
 * - refresh: a new filtered/sorted view is ready to render
 * - selected / activated: single / double click on a snippet
 * - saveError: persisting a mutation failed; in-memory state is kept
 */
export type SnippetListEvent =
  | { type: 'change' }
  | { type: 'refresh'; snippets: Snippet[] }
  | { type: 'selected'; snippet: Snippet }
  | { type: 'activated'; snippet: Snippet }
  | { type: 'saveError'; error: string };

export type SnippetListListener = (event: SnippetListEvent) => void;

export interface SnippetListOptions extends SnippetFactoryOptions {
  sortMode?: SnippetSortMode;
  sortDirection?: SortDirection;
  customSortDirection?: CustomSortDirectionPolicy;
  /** Leave snippets with blank title and content out of views */
  hideEmptySnippets?: boolean;
  /** How many activations to remember */
  historySize?: number;
  logger?: Logger;
}

export class SnippetListController {
  private allSnippets: Snippet[] = [];
  private sortMode: SnippetSortMode;
  private sortDirection: SortDirection;
  private searchFilter = '';
  private readonly customSortDirection: CustomSortDirectionPolicy;
  private readonly hideEmptySnippets: boolean;
  private readonly history: CircularBuffer<string>;
  private readonly listeners: Set<SnippetListListener> = new Set();
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly factory: Required<SnippetFactoryOptions>;

  constructor(
    private readonly store: SnippetStore,
    options: SnippetListOptions = {}
  ) {
    this.sortMode = options.sortMode ?? 'custom';
    this.sortDirection = options.sortDirection ?? 'ascending';
    this.customSortDirection = options.customSortDirection ?? 'ignore';
    this.hideEmptySnippets = options.hideEmptySnippets ?? false;
    this.history = new CircularBuffer<string>(options.historySize ?? DEFAULT_HISTORY_SIZE);
    this.logger = options.logger ?? consoleLogger;
    this.factory = {
      now: options.now ?? defaultNow,
      generateId: options.generateId ?? defaultGenerateId,
    };
  }

  /**
   * Subscribe to list events
   * Returns an unsubscribe function
   */
  subscribe(listener: SnippetListListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get currentSortMode(): SnippetSortMode {
    return this.sortMode;
  }

  get currentSortDirection(): SortDirection {
    return this.sortDirection;
  }

  get currentSearchFilter(): string {
    return this.searchFilter;
  }

  getCurrentFilePath(): string {
    return this.store.snippetsFilePath;
  }

  /**
   * Copy of the working set, in list (not sort) order.
   */
  getAllSnippets(): Snippet[] {
    return this.allSnippets.map(cloneSnippet);
  }

  /**
   * Replace the working set with the contents of the snippet file.
   */
  async loadSnippets(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.allSnippets = await this.store.load();
      this.logger.info(
        `[SnippetList] Loaded ${this.allSnippets.length} snippets from ${this.store.snippetsFilePath}`
      );
      if (this.allSnippets.length > 0) {
        const firstFew = this.allSnippets
          .slice(0, 3)
          .map((s) => `"${s.title}"`)
          .join(', ');
        this.logger.debug(`[SnippetList] First snippets: ${firstFew}`);
      }
    });
    this.refreshList();
  }

  /**
   * Bind to another snippet file and reload from it.
   */
  async setFilePath(filePath: string): Promise<void> {
    this.store.setFilePath(filePath);
    await this.loadSnippets();
  }

  /**
   * Filtered, sorted view of the working set.
   *
   * Passing a filter (including '' or null) replaces the current search
   * filter; omitting it reuses the current one.
   */
  refreshList(filter?: string | null): Snippet[] {
    if (filter !== undefined) {
      this.searchFilter = filter ?? '';
    }

    const needle = nonBlank(this.searchFilter)?.toLowerCase();
    let view = this.allSnippets.filter(
      (s) =>
        needle === undefined ||
        s.title.toLowerCase().includes(needle) ||
        s.content.toLowerCase().includes(needle)
    );
    if (this.hideEmptySnippets) {
      view = view.filter((s) => !isEmptySnippet(s));
    }

    const sorted = view.sort(this.compareFn()).map(cloneSnippet);
    this.emit({ type: 'refresh', snippets: sorted });
    return sorted;
  }

  setSearchFilter(filter: string): Snippet[] {
    return this.refreshList(filter);
  }

  /**
   * Switch sort mode. Picking the current mode again flips the
   * direction; picking a different one starts ascending.
   */
  setSortMode(mode: SnippetSortMode): Snippet[] {
    if (mode === this.sortMode) {
      this.sortDirection = this.sortDirection === 'ascending' ? 'descending' : 'ascending';
    } else {
      this.sortMode = mode;
      this.sortDirection = 'ascending';
    }
    return this.refreshList();
  }

  setSortDirection(direction: SortDirection): Snippet[] {
    this.sortDirection = direction;
    return this.refreshList();
  }

  /**
   * custom → title → dateCreated → custom
   */
  cycleSortMode(): Snippet[] {
    const next = SORT_MODES[(SORT_MODES.indexOf(this.sortMode) + 1) % SORT_MODES.length] ?? 'custom';
    return this.setSortMode(next);
  }

  async addSnippet(title: string, content: string): Promise<Snippet> {
    const snippet = createSnippet(title, content, 0, this.factory);
    await this.mutate(() => {
      this.allSnippets.push(snippet);
      renormalizeOrder(this.allSnippets);
      return snippet;
    });
    return cloneSnippet(snippet);
  }

  /**
   * Returns false (and changes nothing) when the id is unknown.
   */
  async editSnippet(id: string, title: string, content: string): Promise<boolean> {
    const edited = await this.mutate(() => {
      const snippet = this.allSnippets.find((s) => s.id === id);
      if (!snippet) return undefined;

      snippet.title = title;
      snippet.content = content;
      snippet.modifiedAt = this.factory.now();
      return true;
    });
    return edited ?? false;
  }

  async deleteSnippet(id: string): Promise<boolean> {
    const deleted = await this.mutate(() => {
      const index = this.allSnippets.findIndex((s) => s.id === id);
      if (index < 0) return undefined;

      this.allSnippets.splice(index, 1);
      renormalizeOrder(this.allSnippets);
      return true;
    });
    return deleted ?? false;
  }

  /**
   * Move a snippet to the position of another (drag and drop).
   * Only applies in custom sort mode; returns false when nothing moved.
   */
  async reorderSnippet(movedId: string, targetId: string): Promise<boolean> {
    if (this.sortMode !== 'custom' || movedId === targetId) return false;

    const moved = await this.mutate(() => {
      const oldIndex = this.allSnippets.findIndex((s) => s.id === movedId);
      const newIndex = this.allSnippets.findIndex((s) => s.id === targetId);
      if (oldIndex < 0 || newIndex < 0) return undefined;

      const [snippet] = this.allSnippets.splice(oldIndex, 1);
      if (!snippet) return undefined;
      this.allSnippets.splice(newIndex, 0, snippet);
      renormalizeOrder(this.allSnippets);
      return true;
    });
    return moved ?? false;
  }

  /**
   * Append the snippets from another file.
   * @returns number of snippets imported
   * @throws SnippetImportError when the file can't be read or parsed
   */
  async importSnippets(filePath: string): Promise<number> {
    const imported = await this.store.importFrom(filePath);
    await this.mutate(() => {
      this.allSnippets.push(...imported);
      renormalizeOrder(this.allSnippets);
      return imported.length;
    });
    this.logger.info(`[SnippetList] Imported ${imported.length} snippets from ${filePath}`);
    return imported.length;
  }

  /**
   * @throws SnippetExportError when the file can't be written
   */
  async exportSnippets(filePath: string): Promise<void> {
    await this.mutex.runExclusive(() => this.store.exportTo(this.allSnippets, filePath));
  }

  /**
   * Single click. Returns the snippet, or undefined for an unknown id.
   */
  selectSnippet(id: string): Snippet | undefined {
    const snippet = this.allSnippets.find((s) => s.id === id);
    if (!snippet) return undefined;

    const copy = cloneSnippet(snippet);
    this.emit({ type: 'selected', snippet: copy });
    return copy;
  }

  /**
   * Double click. What activation does (usually inserting the content)
   * is up to the host.
   */
  activateSnippet(id: string): Snippet | undefined {
    const snippet = this.allSnippets.find((s) => s.id === id);
    if (!snippet) return undefined;

    this.history.push(id);
    const copy = cloneSnippet(snippet);
    this.emit({ type: 'activated', snippet: copy });
    return copy;
  }

  /**
   * Recently activated snippets, newest first. Deleted snippets are skipped.
   */
  getRecentActivations(): Snippet[] {
    const recent: Snippet[] = [];
    for (const id of this.history.newestFirst()) {
      const snippet = this.allSnippets.find((s) => s.id === id);
      if (snippet) recent.push(cloneSnippet(snippet));
    }
    return recent;
  }

  clearRecentActivations(): void {
    this.history.clear();
  }

  /**
   * Apply a change to the working set, persist it, refresh the view
   * and notify listeners. `apply` returns undefined when there is
   * nothing to change, which skips the save.
   */
  private async mutate<T>(apply: () => T | undefined): Promise<T | undefined> {
    const result = await this.mutex.runExclusive(async () => {
      const value = apply();
      if (value === undefined) return undefined;

      const saved = await this.store.save(this.allSnippets);
      if (!saved.success) {
        this.emit({ type: 'saveError', error: saved.error });
      }
      return value;
    });
    if (result === undefined) return undefined;

    this.refreshList();
    this.emit({ type: 'change' });
    return result;
  }

  private compareFn(): (a: Snippet, b: Snippet) => number {
    const sign = this.sortDirection === 'descending' ? -1 : 1;
    switch (this.sortMode) {
      case 'title':
        return (a, b) => sign * a.title.localeCompare(b.title);
      case 'dateCreated':
        return (a, b) => sign * (a.createdAt.getTime() - b.createdAt.getTime());
      case 'custom':
      default: {
        const customSign = this.customSortDirection === 'respect' ? sign : 1;
        return (a, b) => customSign * (a.order - b.order);
      }
    }
  }

  private emit(event: SnippetListEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error('[SnippetList] Listener error:', err);
      }
    }
  }
}
