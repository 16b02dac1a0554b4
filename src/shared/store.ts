import fs from 'node:fs/promises';
import Database from 'better-sqlite3';
import { StoreNotFoundError, StoreReadError } from './errors';
import { describeError, isRecord, pathExists } from './fs-utils';
import type { BookmarkRecord, FaviconBlobs, HistoryRecord } from './types';

export type StoreHandle = Database.Database;

const BOOKMARK_LEAF_TYPE = 1;

const BOOKMARKS_QUERY = `
  SELECT bookmark.guid AS guid, bookmark.title AS title, place.url AS url, place.url_hash AS urlHash
  FROM moz_bookmarks bookmark
    JOIN moz_places place ON place.id = bookmark.fk
  WHERE bookmark.type = ${BOOKMARK_LEAF_TYPE}
    AND place.hidden = 0
    AND place.url IS NOT NULL
`;

const HISTORY_QUERY = `
  SELECT place.guid AS guid, place.title AS title, place.url AS url
  FROM moz_places place
    LEFT JOIN moz_bookmarks bookmark ON place.id = bookmark.fk
  WHERE place.hidden = 0
    AND place.url IS NOT NULL
    AND bookmark.id IS NULL
`;

const FAVICONS_QUERY = `
  SELECT moz_pages_w_icons.page_url_hash AS urlHash, moz_icons.data AS data
  FROM moz_icons
    INNER JOIN moz_icons_to_pages ON moz_icons.id = moz_icons_to_pages.icon_id
    INNER JOIN moz_pages_w_icons ON moz_icons_to_pages.page_id = moz_pages_w_icons.id
`;

// Header bytes 18/19 hold the write/read format version: 2 means WAL.
const HEADER_WRITE_VERSION_OFFSET = 18;
const HEADER_READ_VERSION_OFFSET = 19;
const WAL_FORMAT_VERSION = 2;
const LEGACY_FORMAT_VERSION = 1;

const toRollbackJournal = (bytes: Buffer): Buffer => {
  if (bytes.length > HEADER_READ_VERSION_OFFSET && bytes[HEADER_WRITE_VERSION_OFFSET] === WAL_FORMAT_VERSION) {
    bytes[HEADER_WRITE_VERSION_OFFSET] = LEGACY_FORMAT_VERSION;
    bytes[HEADER_READ_VERSION_OFFSET] = LEGACY_FORMAT_VERSION;
  }
  return bytes;
};

/**
 * Opens a snapshot of the store at `storePath`.
 *
 * The browser may hold the file open while we read, so the file itself is never opened by
 * SQLite: its bytes are copied into an in-memory database. Like `immutable=1`, pages still
 * sitting in the write-ahead log are not visible.
 */
export const openReadonly = async (storePath: string): Promise<StoreHandle> => {
  if (!(await pathExists(storePath))) {
    throw new StoreNotFoundError(storePath);
  }
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(storePath);
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      throw new StoreNotFoundError(storePath);
    }
    throw new StoreReadError(storePath, error);
  }
  const handle = new Database(toRollbackJournal(bytes));
  try {
    handle.pragma('query_only = ON');
  } catch (error) {
    handle.close();
    throw error;
  }
  return handle;
};

export const withStore = async <T>(storePath: string, fn: (handle: StoreHandle) => T | Promise<T>): Promise<T> => {
  const handle = await openReadonly(storePath);
  try {
    return await fn(handle);
  } finally {
    handle.close();
  }
};

/** Failures that degrade a read to an empty result instead of failing the rebuild. */
const isUnreadableStore = (error: unknown): boolean =>
  error instanceof Database.SqliteError || error instanceof StoreReadError;

const toNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return undefined;
};

const toTitle = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const toBookmarkRecord = (row: unknown): BookmarkRecord | undefined => {
  if (!isRecord(row) || typeof row.guid !== 'string' || typeof row.url !== 'string') {
    return undefined;
  }
  return {
    guid: row.guid,
    title: toTitle(row.title),
    url: row.url,
    urlHash: toNumber(row.urlHash) ?? 0,
  };
};

const toHistoryRecord = (row: unknown): HistoryRecord | undefined => {
  if (!isRecord(row) || typeof row.guid !== 'string' || typeof row.url !== 'string') {
    return undefined;
  }
  return { guid: row.guid, title: toTitle(row.title), url: row.url };
};

const compact = <T>(values: (T | undefined)[]): T[] =>
  values.filter((value): value is T => value !== undefined);

export const queryBookmarks = (handle: StoreHandle): BookmarkRecord[] =>
  compact(handle.prepare(BOOKMARKS_QUERY).all().map(toBookmarkRecord));

export const queryHistory = (handle: StoreHandle): HistoryRecord[] =>
  compact(handle.prepare(HISTORY_QUERY).all().map(toHistoryRecord));

export const queryFavicons = (handle: StoreHandle): FaviconBlobs => {
  const blobs: FaviconBlobs = new Map();
  for (const row of handle.prepare(FAVICONS_QUERY).all()) {
    if (!isRecord(row) || !(row.data instanceof Uint8Array)) {
      continue;
    }
    const urlHash = toNumber(row.urlHash);
    if (urlHash === undefined) {
      continue;
    }
    // Shared hashes: the last row returned wins.
    blobs.set(urlHash, row.data);
  }
  return blobs;
};

export const readBookmarks = async (placesPath: string): Promise<BookmarkRecord[]> => {
  try {
    return await withStore(placesPath, queryBookmarks);
  } catch (error) {
    if (!isUnreadableStore(error)) {
      throw error;
    }
    console.error(`[foxmarks] Failed to read Firefox bookmarks: ${describeError(error)}`);
    return [];
  }
};

export const readHistory = async (placesPath: string): Promise<HistoryRecord[]> => {
  try {
    return await withStore(placesPath, queryHistory);
  } catch (error) {
    if (!isUnreadableStore(error)) {
      throw error;
    }
    console.error(`[foxmarks] Failed to read Firefox history: ${describeError(error)}`);
    return [];
  }
};

export const readFavicons = async (faviconsPath: string): Promise<FaviconBlobs> => {
  try {
    return await withStore(faviconsPath, queryFavicons);
  } catch (error) {
    if (!isUnreadableStore(error)) {
      throw error;
    }
    console.warn(`[foxmarks] Failed to read favicon data: ${describeError(error)}`);
    return new Map();
  }
};
