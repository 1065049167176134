/**
 * Settings Store
 *
 * Loads the settings file once and keeps it in memory. update() merges
 * a patch and schedules a debounced write, so a burst of changes
 * (dragging a splitter, resizing the window) ends in one save.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { consoleLogger, debounce, type Debounced, type Logger } from '../utils/index.js';
import { describeError } from '../snippets/errors.js';
import { stripByteOrderMark } from '../snippets/formats.js';
import type { SaveResult } from '../snippets/store.js';
import { AppSettingsSchema, DEFAULT_SETTINGS, type AppSettings } from './schema.js';

export const DEFAULT_AUTO_SAVE_DELAY = 500;

export interface SettingsStoreOptions {
  /** ms to wait after the last update before writing */
  autoSaveDelay?: number;
  logger?: Logger;
}

export class SettingsStore {
  private current: AppSettings = { ...DEFAULT_SETTINGS };
  private dirty = false;
  private readonly logger: Logger;
  private readonly scheduleSave: Debounced<[]>;

  constructor(
    private readonly filePath: string,
    options: SettingsStoreOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.scheduleSave = debounce(() => {
      this.flush().catch((err) => {
        this.logger.error('[Settings] Auto-save failed:', err);
      });
    }, options.autoSaveDelay ?? DEFAULT_AUTO_SAVE_DELAY);
  }

  get settingsFilePath(): string {
    return this.filePath;
  }

  get settings(): Readonly<AppSettings> {
    return this.current;
  }

  get hasPendingChanges(): boolean {
    return this.dirty;
  }

  /**
   * Read the settings file. A missing or invalid file yields defaults.
   */
  async load(): Promise<AppSettings> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
        this.logger.error(`[Settings] Error reading settings: ${describeError(err)}`);
      }
      return this.reset();
    }

    try {
      const parsed = AppSettingsSchema.safeParse(JSON.parse(stripByteOrderMark(text)));
      if (!parsed.success) {
        this.logger.warn(`[Settings] Invalid settings file, using defaults: ${describeError(parsed.error)}`);
        return this.reset();
      }
      this.current = parsed.data;
      this.dirty = false;
      return { ...this.current };
    } catch (err) {
      this.logger.error(`[Settings] Error loading settings: ${describeError(err)}`);
      return this.reset();
    }
  }

  /**
   * Write settings now. They become the cached settings, and any
   * pending auto-save is dropped.
   */
  async save(settings: AppSettings): Promise<SaveResult> {
    this.scheduleSave.cancel();
    this.current = { ...settings };
    this.dirty = false;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(settings, null, 2), 'utf-8');
      return { success: true };
    } catch (err) {
      const error = describeError(err);
      this.logger.error(`[Settings] Error saving settings: ${error}`);
      this.dirty = true;
      return { success: false, error };
    }
  }

  /**
   * Merge a patch and schedule a write.
   */
  update(patch: Partial<AppSettings>): Readonly<AppSettings> {
    this.current = { ...this.current, ...patch };
    this.dirty = true;
    this.scheduleSave();
    return this.current;
  }

  /**
   * Write pending changes now instead of waiting for the debounce.
   */
  async flush(): Promise<SaveResult> {
    this.scheduleSave.cancel();
    if (!this.dirty) {
      return { success: true };
    }
    return this.save(this.current);
  }

  private reset(): AppSettings {
    this.current = { ...DEFAULT_SETTINGS };
    this.dirty = false;
    return { ...this.current };
  }
}
