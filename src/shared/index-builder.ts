import { createItemActions } from './actions';
import { iconUrls, replaceIcons, type FaviconPaths } from './favicons';
import {
  BOOKMARK_ICON_PATH,
  HISTORY_ICON_PATH,
  faviconsDir,
  faviconsStorePath,
  placesStorePath,
  resolveProfileDir,
} from './paths';
import { readBookmarks, readFavicons, readHistory } from './store';
import type { BookmarkRecord, EntityId, HistoryRecord, IndexItem, Locations, RebuildConfig } from './types';

export type FallbackIcons = {
  readonly bookmark: string;
  readonly history: string;
};

export const DEFAULT_FALLBACK_ICONS: FallbackIcons = {
  bookmark: BOOKMARK_ICON_PATH,
  history: HISTORY_ICON_PATH,
};

export type BuildIndexInput = {
  readonly bookmarks: readonly BookmarkRecord[];
  readonly history: readonly HistoryRecord[];
  readonly faviconPaths: FaviconPaths;
  readonly includeHistory: boolean;
  readonly icons?: FallbackIcons;
};

export const toSearchText = (title: string | null, url: string): string =>
  `${title ?? ''} ${url}`.toLowerCase();

export const createIndexItem = (
  id: EntityId,
  title: string | null,
  url: string,
  icons: readonly string[],
): IndexItem =>
  Object.freeze({
    id,
    text: title ? title : url,
    subtext: url,
    iconUrls: Object.freeze([...icons]),
    searchText: toSearchText(title, url),
    actions: createItemActions(url),
  });

/**
 * Joins bookmarks and (optionally) history into one item list. Each URL appears once;
 * bookmarks come first, both groups keep store order.
 */
export const buildIndexItems = ({
  bookmarks,
  history,
  faviconPaths,
  includeHistory,
  icons = DEFAULT_FALLBACK_ICONS,
}: BuildIndexInput): IndexItem[] => {
  const seenUrls = new Set<string>();
  const items: IndexItem[] = [];

  for (const bookmark of bookmarks) {
    if (seenUrls.has(bookmark.url)) {
      continue;
    }
    seenUrls.add(bookmark.url);
    const iconFile = faviconPaths.get(bookmark.guid) ?? icons.bookmark;
    items.push(createIndexItem(bookmark.guid, bookmark.title, bookmark.url, iconUrls(iconFile)));
  }

  if (!includeHistory) {
    return items;
  }

  // History never gets a favicon lookup.
  const historyIcons = iconUrls(icons.history);
  for (const entry of history) {
    if (seenUrls.has(entry.url)) {
      continue;
    }
    seenUrls.add(entry.url);
    items.push(createIndexItem(entry.guid, entry.title, entry.url, historyIcons));
  }

  return items;
};

export const buildIndex = async (
  config: RebuildConfig,
  locations: Locations,
  icons: FallbackIcons = DEFAULT_FALLBACK_ICONS,
): Promise<IndexItem[]> => {
  const profileDir = resolveProfileDir(locations.firefoxRoot, config.profilePath);
  const placesPath = placesStorePath(profileDir);

  const bookmarks = await readBookmarks(placesPath);
  console.info(`[foxmarks] Found ${bookmarks.length} bookmarks`);

  const favicons = await readFavicons(faviconsStorePath(profileDir));
  const faviconPaths = await replaceIcons(faviconsDir(locations.dataDir), favicons, bookmarks);

  let history: HistoryRecord[] = [];
  if (config.indexHistory) {
    history = await readHistory(placesPath);
    console.info(`[foxmarks] Found ${history.length} history items`);
  }

  return buildIndexItems({
    bookmarks,
    history,
    faviconPaths,
    includeHistory: config.indexHistory,
    icons,
  });
};
