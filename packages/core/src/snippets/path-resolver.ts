/**
 * Decides where the snippet file lives.
 *
 * Priority:
 * 1. explicit full path
 * 2. folder and/or file-name override, filled in from defaults
 * 3. first existing file among the locations older releases used
 * 4. zero-config default (need not exist; created on first save)
 */

import * as fs from 'fs';
import * as path from 'path';
import { getDataFolderPath, type SnippetLibraryConfig } from '../config.js';
import { nonBlank } from '../utils/index.js';

export interface SnippetPathOptions {
  explicitPath?: string | null;
  folderOverride?: string | null;
  fileNameOverride?: string | null;
  /**
   * Only honor `explicitPath` when the file already exists; otherwise
   * fall through to the remaining steps.
   */
  requireExistingExplicit?: boolean;
}

export type ExistsCheck = (filePath: string) => boolean;

const fileExists: ExistsCheck = (filePath) => fs.existsSync(filePath);

/**
 * Locations older releases stored snippets in, most preferred first.
 */
export function getLegacyCandidates(config: SnippetLibraryConfig): string[] {
  const { syncRoot, documentsDir, localAppDataDir, applicationName, snippetsFileName } = config;
  return [
    path.join(syncRoot, config.legacySnippetsFileName),
    path.join(syncRoot, applicationName, snippetsFileName),
    path.join(documentsDir, applicationName, snippetsFileName),
    path.join(localAppDataDir, applicationName, snippetsFileName),
  ];
}

/**
 * The synced location when the sync root is present, else local app data.
 */
export function getDefaultSnippetPath(config: SnippetLibraryConfig, exists: ExistsCheck = fileExists): string {
  if (exists(config.syncRoot)) {
    return path.join(config.syncRoot, config.legacySnippetsFileName);
  }
  return path.join(getDataFolderPath(config), config.snippetsFileName);
}

export function resolveSnippetPath(
  options: SnippetPathOptions,
  config: SnippetLibraryConfig,
  exists: ExistsCheck = fileExists
): string {
  const explicitPath = nonBlank(options.explicitPath);
  if (explicitPath !== undefined && (!options.requireExistingExplicit || exists(explicitPath))) {
    return explicitPath;
  }

  const folder = nonBlank(options.folderOverride);
  const fileName = nonBlank(options.fileNameOverride);
  if (folder !== undefined || fileName !== undefined) {
    return path.join(folder ?? getDataFolderPath(config), fileName ?? config.snippetsFileName);
  }

  const legacy = getLegacyCandidates(config).find((candidate) => exists(candidate));
  if (legacy !== undefined) {
    return legacy;
  }

  return getDefaultSnippetPath(config, exists);
}
