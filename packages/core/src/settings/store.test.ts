import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { silentLogger } from '../utils/index.js';
import { DEFAULT_SETTINGS } from './schema.js';
import { SettingsStore } from './store.js';

describe('SettingsStore', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snipdock-settings-'));
    filePath = path.join(tempDir, 'prefs', 'settings.json');
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should return defaults when the file does not exist', async () => {
      const store = new SettingsStore(filePath, { logger: silentLogger });
      expect(await store.load()).toEqual(DEFAULT_SETTINGS);
    });

    it('should fill missing keys with defaults and drop unknown ones', async () => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify({ fontSize: 18, legacyFlag: true }));

      const store = new SettingsStore(filePath, { logger: silentLogger });
      const settings = await store.load();

      expect(settings).toEqual({ ...DEFAULT_SETTINGS, fontSize: 18 });
      expect('legacyFlag' in settings).toBe(false);
    });

    it('should fall back to defaults for invalid values', async () => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify({ sendKeyMode: 'altEnter' }));

      const logger = { ...silentLogger, warn: vi.fn() };
      const store = new SettingsStore(filePath, { logger });

      expect(await store.load()).toEqual(DEFAULT_SETTINGS);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should read a file that starts with a byte order mark', async () => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, '\uFEFF' + JSON.stringify({ alwaysOnTop: true }));

      const store = new SettingsStore(filePath, { logger: silentLogger });
      expect(await store.load()).toEqual({ ...DEFAULT_SETTINGS, alwaysOnTop: true });
    });

    it('should fall back to defaults for malformed JSON', async () => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, '{ nope');

      const store = new SettingsStore(filePath, { logger: silentLogger });
      expect(await store.load()).toEqual(DEFAULT_SETTINGS);
    });
  });

  describe('save', () => {
    it('should round-trip settings and create the folder', async () => {
      const store = new SettingsStore(filePath, { logger: silentLogger });
      const settings = { ...DEFAULT_SETTINGS, snippetsFilePath: '/tmp/mine.json', isMaximized: true };

      expect(await store.save(settings)).toEqual({ success: true });
      expect(await new SettingsStore(filePath, { logger: silentLogger }).load()).toEqual(settings);
    });
  });

  describe('update', () => {
    it('should merge the patch immediately', () => {
      const store = new SettingsStore(filePath, { logger: silentLogger });
      const settings = store.update({ alwaysOnTop: true });

      expect(settings.alwaysOnTop).toBe(true);
      expect(store.settings.alwaysOnTop).toBe(true);
      expect(store.hasPendingChanges).toBe(true);
    });

    it('should save once after the debounce delay', () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const store = new SettingsStore(filePath, { logger: silentLogger, autoSaveDelay: 200 });
      const save = vi.spyOn(store, 'save').mockResolvedValue({ success: true });

      store.update({ windowWidth: 900 });
      store.update({ windowHeight: 600 });
      vi.advanceTimersByTime(199);
      expect(save).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(save).toHaveBeenCalledTimes(1);
      expect(save).toHaveBeenCalledWith({ ...DEFAULT_SETTINGS, windowWidth: 900, windowHeight: 600 });
    });

    it('should write pending changes on flush and cancel the timer', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const store = new SettingsStore(filePath, { logger: silentLogger });
      const save = vi.spyOn(store, 'save');

      store.update({ textAreaFontSize: 16 });
      expect(await store.flush()).toEqual({ success: true });
      expect(store.hasPendingChanges).toBe(false);

      vi.advanceTimersByTime(1000);
      expect(save).toHaveBeenCalledTimes(1);

      const written: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      expect(written).toEqual({ ...DEFAULT_SETTINGS, textAreaFontSize: 16 });
    });

    it('should keep a direct save from being overwritten by a pending auto-save', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const store = new SettingsStore(filePath, { logger: silentLogger, autoSaveDelay: 200 });

      store.update({ fontSize: 20 });
      const saved = { ...DEFAULT_SETTINGS, fontSize: 12, alwaysOnTop: true };
      expect(await store.save(saved)).toEqual({ success: true });

      expect(store.settings).toEqual(saved);
      expect(store.hasPendingChanges).toBe(false);

      const save = vi.spyOn(store, 'save');
      vi.advanceTimersByTime(200);
      expect(save).not.toHaveBeenCalled();
      expect(await store.flush()).toEqual({ success: true });
      expect(save).not.toHaveBeenCalled();

      const written: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      expect(written).toEqual(saved);
    });

    it('should not write on flush when nothing changed', async () => {
      const store = new SettingsStore(filePath, { logger: silentLogger });
      const save = vi.spyOn(store, 'save');

      expect(await store.flush()).toEqual({ success: true });
      expect(save).not.toHaveBeenCalled();
    });
  });
});
