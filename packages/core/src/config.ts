/**
 * Library configuration
 *
 * Folder and file names are passed to the resolver and stores explicitly;
 * there is no process-wide configuration object.
 */

import * as os from 'os';
import * as path from 'path';

export const DEFAULT_APPLICATION_NAME = 'Snipdock';
export const DEFAULT_SNIPPETS_FILE_NAME = 'snippets.json';
export const LEGACY_SNIPPETS_FILE_NAME = 'ds_snippets.json';
export const DEFAULT_SETTINGS_FILE_NAME = 'settings.json';

/**
 * Well-known folders of the current user.
 */
export interface PlatformFolders {
  homeDir: string;
  /** Root of the synced cloud folder (may not exist) */
  syncRoot: string;
  documentsDir: string;
  /** Per-user, machine-local application data */
  localAppDataDir: string;
}

export interface SnippetLibraryConfig extends PlatformFolders {
  /** Name of the per-application data folder */
  applicationName: string;
  snippetsFileName: string;
  /** File name used by older releases directly under the sync root */
  legacySnippetsFileName: string;
  settingsFileName: string;
}

export function getPlatformFolders(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): PlatformFolders {
  let localAppDataDir: string;
  if (platform === 'win32') {
    localAppDataDir = env['LOCALAPPDATA'] || path.join(homeDir, 'AppData', 'Local');
  } else if (platform === 'darwin') {
    localAppDataDir = path.join(homeDir, 'Library', 'Application Support');
  } else {
    localAppDataDir = env['XDG_DATA_HOME'] || path.join(homeDir, '.local', 'share');
  }

  return {
    homeDir,
    syncRoot: env['OneDrive'] || path.join(homeDir, 'OneDrive'),
    documentsDir: path.join(homeDir, 'Documents'),
    localAppDataDir,
  };
}

/**
 * Build a config from platform defaults, with any field overridden.
 */
export function createLibraryConfig(overrides: Partial<SnippetLibraryConfig> = {}): SnippetLibraryConfig {
  return {
    ...getPlatformFolders(),
    applicationName: DEFAULT_APPLICATION_NAME,
    snippetsFileName: DEFAULT_SNIPPETS_FILE_NAME,
    legacySnippetsFileName: LEGACY_SNIPPETS_FILE_NAME,
    settingsFileName: DEFAULT_SETTINGS_FILE_NAME,
    ...overrides,
  };
}

/**
 * Local data folder, e.g. ~/.local/share/Snipdock
 */
export function getDataFolderPath(config: SnippetLibraryConfig): string {
  return path.join(config.localAppDataDir, config.applicationName);
}

export function getSettingsPath(
  config: SnippetLibraryConfig,
  dataFolderPath?: string,
  fileName?: string
): string {
  return path.join(dataFolderPath ?? getDataFolderPath(config), fileName ?? config.settingsFileName);
}
