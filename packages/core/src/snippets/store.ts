/**
 * Snippet Store
 *
 * Reads and writes a snippet collection at one file path. The library's
 * own file is kept in the native shape; import accepts either shape and
 * export always writes the legacy one.
 *
 * load() and save() never throw: a broken or missing file reads as an
 * empty library, and a failed write comes back as a SaveResult.
 * importFrom() and exportTo() are user actions and throw.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { consoleLogger, type Logger } from '../utils/index.js';
import { SnippetExportError, SnippetImportError, describeError } from './errors.js';
import {
  parseSnippetDocument,
  stringifyRows,
  toLegacyRow,
  toNativeRow,
  type SnippetDocument,
} from './formats.js';
import { defaultGenerateId, defaultNow, type SnippetFactoryOptions } from './snippet.js';
import type { Snippet } from './types.js';

export type SaveResult = { success: true } | { success: false; error: string };

export interface SnippetStoreOptions extends SnippetFactoryOptions {
  logger?: Logger;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class SnippetStore {
  private filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(filePath: string, options: SnippetStoreOptions = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? defaultNow;
    this.generateId = options.generateId ?? defaultGenerateId;
  }

  get snippetsFilePath(): string {
    return this.filePath;
  }

  /**
   * Point the store at another file. Blank paths are ignored.
   */
  setFilePath(filePath: string): void {
    if (filePath.trim()) {
      this.filePath = filePath;
    }
  }

  async load(): Promise<Snippet[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.debug(`[SnippetStore] No snippets file at ${this.filePath}`);
      } else {
        this.logger.error(`[SnippetStore] Error reading snippets: ${describeError(err)}`);
      }
      return [];
    }

    try {
      return this.toSnippets(parseSnippetDocument(text), false);
    } catch (err) {
      this.logger.error(`[SnippetStore] Error loading snippets: ${describeError(err)}`);
      return [];
    }
  }

  async save(snippets: readonly Snippet[]): Promise<SaveResult> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, stringifyRows(snippets.map(toNativeRow)), 'utf-8');
      return { success: true };
    } catch (err) {
      const error = describeError(err);
      this.logger.error(`[SnippetStore] Error saving snippets: ${error}`);
      return { success: false, error };
    }
  }

  /**
   * Read snippets from another file for merging into this library.
   * Every row gets a new id.
   * @throws SnippetImportError when the file can't be read or parsed
   */
  async importFrom(filePath: string): Promise<Snippet[]> {
    try {
      const text = await fs.readFile(filePath, 'utf-8');
      return this.toSnippets(parseSnippetDocument(text), true);
    } catch (err) {
      throw new SnippetImportError(filePath, err);
    }
  }

  /**
   * Write snippets in the legacy Text/Description shape.
   * @throws SnippetExportError when the file can't be written
   */
  async exportTo(snippets: readonly Snippet[], filePath: string): Promise<void> {
    try {
      await fs.writeFile(filePath, stringifyRows(snippets.map(toLegacyRow)), 'utf-8');
    } catch (err) {
      throw new SnippetExportError(filePath, err);
    }
  }

  private toSnippets(document: SnippetDocument, importing: boolean): Snippet[] {
    if (document.format === 'legacy') {
      return document.rows.map((row) => {
        const timestamp = this.now();
        // The importer falls back to the text when there's no description
        const title = importing ? row.Description ?? row.Text : row.Description;
        return {
          id: this.generateId(),
          title: title ?? '',
          content: row.Text ?? '',
          createdAt: timestamp,
          modifiedAt: new Date(timestamp.getTime()),
          order: 0,
        };
      });
    }

    return document.rows.map((row) => {
      const timestamp = this.now();
      return {
        id: importing ? this.generateId() : row.Id ?? this.generateId(),
        title: row.Title ?? '',
        content: row.Content ?? '',
        createdAt: row.CreatedAt ?? timestamp,
        modifiedAt: row.ModifiedAt ?? new Date(timestamp.getTime()),
        order: row.Order ?? 0,
      };
    });
  }
}
