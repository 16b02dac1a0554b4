import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Locations, ProfilePath } from './types';

export const PROFILES_REGISTRY_FILE = 'profiles.ini';
export const PLACES_STORE_FILE = 'places.sqlite';
export const FAVICONS_STORE_FILE = 'favicons.sqlite';
export const FAVICONS_DIR_NAME = 'favicons';
export const SETTINGS_FILE_NAME = 'settings.json';

export const THEME_ICON_HINT = 'xdg:firefox';

const ASSETS_DIR = fileURLToPath(new URL('../../assets/', import.meta.url));

export const BOOKMARK_ICON_PATH = path.join(ASSETS_DIR, 'firefox_bookmark.svg');
export const HISTORY_ICON_PATH = path.join(ASSETS_DIR, 'firefox_history.svg');

type Environment = Record<string, string | undefined>;

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const resolveLocations = (
  env: Environment = process.env,
  homeDir: string = os.homedir(),
): Locations => {
  const firefoxRoot = nonEmpty(env.FOXMARKS_FIREFOX_ROOT) ?? path.join(homeDir, '.mozilla', 'firefox');
  const dataHome = nonEmpty(env.XDG_DATA_HOME) ?? path.join(homeDir, '.local', 'share');
  const dataDir = nonEmpty(env.FOXMARKS_DATA_DIR) ?? path.join(dataHome, 'foxmarks');
  return { firefoxRoot, dataDir };
};

/** Absolute registry paths (`IsRelative=0`) are used as-is. */
export const resolveProfileDir = (firefoxRoot: string, profilePath: ProfilePath): string =>
  path.isAbsolute(profilePath) ? profilePath : path.join(firefoxRoot, profilePath);

export const placesStorePath = (profileDir: string): string => path.join(profileDir, PLACES_STORE_FILE);

export const faviconsStorePath = (profileDir: string): string =>
  path.join(profileDir, FAVICONS_STORE_FILE);

export const faviconsDir = (dataDir: string): string => path.join(dataDir, FAVICONS_DIR_NAME);
