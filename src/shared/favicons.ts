import fs from 'node:fs/promises';
import path from 'node:path';
import { describeError } from './fs-utils';
import { THEME_ICON_HINT } from './paths';
import type { BookmarkRecord, EntityId, FaviconBlobs } from './types';

export type FaviconPaths = Map<EntityId, string>;

export const faviconFileName = (guid: EntityId): string => `favicon_${encodeURIComponent(guid)}.png`;

/** The local icon first, then the theme hint; hosts render whichever they can. */
export const iconUrls = (iconFile: string): readonly string[] => [`file:${iconFile}`, THEME_ICON_HINT];

// Entries are removed and written one at a time so large bookmark sets stay within the
// process's file descriptor limit.
const clearDirectory = async (directory: string): Promise<void> => {
  for (const entry of await fs.readdir(directory)) {
    try {
      await fs.rm(path.join(directory, entry), { recursive: true, force: true });
    } catch (error) {
      console.warn(`[foxmarks] Failed to remove favicon ${entry}: ${describeError(error)}`);
    }
  }
};

/**
 * Replaces the icon set in `iconDir` with one file per indexed bookmark that has a favicon blob.
 * Only the first bookmark of each URL is indexed, so later duplicates get no file.
 * Single files that cannot be removed or written are logged and skipped.
 */
export const replaceIcons = async (
  iconDir: string,
  blobs: FaviconBlobs,
  bookmarks: readonly BookmarkRecord[],
): Promise<FaviconPaths> => {
  await fs.mkdir(iconDir, { recursive: true });
  await clearDirectory(iconDir);

  const written: FaviconPaths = new Map();
  const seenUrls = new Set<string>();
  for (const bookmark of bookmarks) {
    if (seenUrls.has(bookmark.url)) {
      continue;
    }
    seenUrls.add(bookmark.url);

    const data = blobs.get(bookmark.urlHash);
    if (!data || data.length === 0) {
      continue;
    }
    const file = path.join(iconDir, faviconFileName(bookmark.guid));
    try {
      await fs.writeFile(file, data);
      written.set(bookmark.guid, file);
    } catch (error) {
      console.warn(`[foxmarks] Failed to write favicon for ${bookmark.guid}: ${describeError(error)}`);
    }
  }
  return written;
};
