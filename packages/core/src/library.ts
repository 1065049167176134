/**
 * Wires the snippet library together for a host application:
 * settings → resolved path → store → loaded list controller.
 */

import { createLibraryConfig, type SnippetLibraryConfig } from './config.js';
import type { AppSettings } from './settings/index.js';
import { SnippetListController, type SnippetListOptions } from './snippets/list-controller.js';
import { resolveSnippetPath, type ExistsCheck, type SnippetPathOptions } from './snippets/path-resolver.js';
import { SnippetStore } from './snippets/store.js';

export interface OpenSnippetLibraryOptions
  extends Omit<SnippetPathOptions, 'explicitPath'>,
    Omit<SnippetListOptions, 'sortMode' | 'sortDirection'> {
  config?: SnippetLibraryConfig;
  /** Supplies the explicit snippet path and the saved sort */
  settings?: Pick<AppSettings, 'snippetsFilePath' | 'snippetSortMode' | 'snippetSortDirection'>;
  exists?: ExistsCheck;
}

export async function openSnippetLibrary(
  options: OpenSnippetLibraryOptions = {}
): Promise<SnippetListController> {
  const { config = createLibraryConfig(), settings, exists, ...rest } = options;

  const filePath = resolveSnippetPath(
    {
      explicitPath: settings?.snippetsFilePath,
      folderOverride: rest.folderOverride,
      fileNameOverride: rest.fileNameOverride,
      requireExistingExplicit: rest.requireExistingExplicit,
    },
    config,
    exists
  );

  const store = new SnippetStore(filePath, {
    logger: rest.logger,
    now: rest.now,
    generateId: rest.generateId,
  });
  const controller = new SnippetListController(store, {
    ...rest,
    sortMode: settings?.snippetSortMode,
    sortDirection: settings?.snippetSortDirection,
  });
  await controller.loadSnippets();
  return controller;
}
