import { describe, it, expect } from 'vitest';
import * as path from 'path';
import type { SnippetLibraryConfig } from '../config.js';
import {
  getDefaultSnippetPath,
  getLegacyCandidates,
  resolveSnippetPath,
  type ExistsCheck,
} from './path-resolver.js';

const home = path.join(path.sep, 'home', 'tester');

const config: SnippetLibraryConfig = {
  homeDir: home,
  syncRoot: path.join(home, 'OneDrive'),
  documentsDir: path.join(home, 'Documents'),
  localAppDataDir: path.join(home, '.local', 'share'),
  applicationName: 'Snipdock',
  snippetsFileName: 'snippets.json',
  legacySnippetsFileName: 'ds_snippets.json',
  settingsFileName: 'settings.json',
};

function existing(...paths: string[]): ExistsCheck {
  const set = new Set(paths);
  return (p) => set.has(p);
}

const nothingExists = existing();

describe('getLegacyCandidates', () => {
  it('should list candidates in priority order', () => {
    expect(getLegacyCandidates(config)).toEqual([
      path.join(home, 'OneDrive', 'ds_snippets.json'),
      path.join(home, 'OneDrive', 'Snipdock', 'snippets.json'),
      path.join(home, 'Documents', 'Snipdock', 'snippets.json'),
      path.join(home, '.local', 'share', 'Snipdock', 'snippets.json'),
    ]);
  });
});

describe('getDefaultSnippetPath', () => {
  it('should use the sync root when it exists', () => {
    const exists = existing(config.syncRoot);
    expect(getDefaultSnippetPath(config, exists)).toBe(path.join(home, 'OneDrive', 'ds_snippets.json'));
  });

  it('should fall back to local app data', () => {
    expect(getDefaultSnippetPath(config, nothingExists)).toBe(
      path.join(home, '.local', 'share', 'Snipdock', 'snippets.json')
    );
  });
});

describe('resolveSnippetPath', () => {
  it('should return an explicit path without checking it exists', () => {
    const explicitPath = path.join(home, 'custom', 'mine.json');
    expect(resolveSnippetPath({ explicitPath }, config, nothingExists)).toBe(explicitPath);
  });

  it('should ignore a blank explicit path', () => {
    expect(resolveSnippetPath({ explicitPath: '   ' }, config, nothingExists)).toBe(
      path.join(home, '.local', 'share', 'Snipdock', 'snippets.json')
    );
  });

  it('should honor an existing explicit path in require-existing mode', () => {
    const explicitPath = path.join(home, 'custom', 'mine.json');
    const exists = existing(explicitPath);
    expect(
      resolveSnippetPath({ explicitPath, requireExistingExplicit: true }, config, exists)
    ).toBe(explicitPath);
  });

  it('should fall through when the explicit path is missing in require-existing mode', () => {
    const explicitPath = path.join(home, 'custom', 'mine.json');
    const documents = path.join(home, 'Documents', 'Snipdock', 'snippets.json');
    expect(
      resolveSnippetPath(
        { explicitPath, requireExistingExplicit: true },
        config,
        existing(documents)
      )
    ).toBe(documents);
  });

  it('should combine a folder override with the default file name', () => {
    const folderOverride = path.join(home, 'sync');
    expect(resolveSnippetPath({ folderOverride }, config, nothingExists)).toBe(
      path.join(home, 'sync', 'snippets.json')
    );
  });

  it('should combine a file name override with the default folder', () => {
    expect(resolveSnippetPath({ fileNameOverride: 'work.json' }, config, nothingExists)).toBe(
      path.join(home, '.local', 'share', 'Snipdock', 'work.json')
    );
  });

  it('should prefer overrides over existing legacy files', () => {
    const legacy = path.join(home, 'OneDrive', 'ds_snippets.json');
    expect(
      resolveSnippetPath({ fileNameOverride: 'work.json' }, config, existing(legacy))
    ).toBe(path.join(home, '.local', 'share', 'Snipdock', 'work.json'));
  });

  it('should pick the first existing legacy candidate', () => {
    const documents = path.join(home, 'Documents', 'Snipdock', 'snippets.json');
    const appData = path.join(home, '.local', 'share', 'Snipdock', 'snippets.json');
    expect(resolveSnippetPath({}, config, existing(appData, documents))).toBe(documents);
  });

  it('should return the synced default when no candidate exists', () => {
    expect(resolveSnippetPath({}, config, existing(config.syncRoot))).toBe(
      path.join(home, 'OneDrive', 'ds_snippets.json')
    );
  });
});
