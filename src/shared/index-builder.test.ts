import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StoreNotFoundError } from './errors';
import { buildIndex, buildIndexItems, toSearchText, type FallbackIcons } from './index-builder';
import { createFirefoxRoot, createTempDir } from './testing/firefox-fixture';
import type { BookmarkRecord, HistoryRecord, IndexItem, Locations } from './types';

const icons: FallbackIcons = {
  bookmark: '/assets/bookmark.svg',
  history: '/assets/history.svg',
};

const summarize = (items: IndexItem[]) =>
  items.map(({ id, text, subtext, searchText }) => ({ id, text, subtext, searchText }));

describe('buildIndexItems', () => {
  it('lets the bookmark win when history holds the same URL', () => {
    const bookmarks: BookmarkRecord[] = [{ guid: 'b1', title: 'Example', url: 'https://ex.com', urlHash: 42 }];
    const history: HistoryRecord[] = [{ guid: 'h1', title: '', url: 'https://ex.com' }];

    const items = buildIndexItems({ bookmarks, history, faviconPaths: new Map(), includeHistory: true, icons });

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({ id: 'b1', text: 'Example', subtext: 'https://ex.com' });
  });

  it('keeps the first bookmark of a duplicated URL', () => {
    const items = buildIndexItems({
      bookmarks: [
        { guid: 'first', title: 'First', url: 'https://dup.test/', urlHash: 1 },
        { guid: 'second', title: 'Second', url: 'https://dup.test/', urlHash: 1 },
        { guid: 'other', title: 'Other', url: 'https://other.test/', urlHash: 2 },
      ],
      history: [],
      faviconPaths: new Map(),
      includeHistory: false,
      icons,
    });

    expect(items.map((item) => item.id)).toEqual(['first', 'other']);
  });

  it('leaves history out unless it is enabled', () => {
    const input = {
      bookmarks: [{ guid: 'b1', title: 'Docs', url: 'https://docs.test/', urlHash: 3 }],
      history: [
        { guid: 'h1', title: 'News', url: 'https://news.test/' },
        { guid: 'h2', title: null, url: 'https://blog.test/post' },
      ],
      faviconPaths: new Map<string, string>(),
      icons,
    };

    expect(buildIndexItems({ ...input, includeHistory: false }).map((item) => item.id)).toEqual(['b1']);
    expect(buildIndexItems({ ...input, includeHistory: true }).map((item) => item.id)).toEqual(['b1', 'h1', 'h2']);
  });

  it('shows the URL and keeps a leading space in the search text when the title is empty', () => {
    const items = buildIndexItems({
      bookmarks: [{ guid: 'b1', title: '', url: 'https://Empty.test/', urlHash: 1 }],
      history: [{ guid: 'h1', title: null, url: 'https://NoTitle.test/' }],
      faviconPaths: new Map(),
      includeHistory: true,
      icons,
    });

    expect(summarize(items)).toEqual([
      { id: 'b1', text: 'https://Empty.test/', subtext: 'https://Empty.test/', searchText: ' https://empty.test/' },
      { id: 'h1', text: 'https://NoTitle.test/', subtext: 'https://NoTitle.test/', searchText: ' https://notitle.test/' },
    ]);
  });

  it('lowercases title and URL into the search text', () => {
    expect(toSearchText('MDN Web Docs', 'https://Developer.Mozilla.org/')).toBe(
      'mdn web docs https://developer.mozilla.org/',
    );
  });

  it('uses the materialized favicon, the bookmark fallback, or the history icon', () => {
    const items = buildIndexItems({
      bookmarks: [
        { guid: 'with-icon', title: 'Icon', url: 'https://icon.test/', urlHash: 1 },
        { guid: 'no-icon', title: 'Plain', url: 'https://plain.test/', urlHash: 2 },
      ],
      history: [{ guid: 'h1', title: 'Visited', url: 'https://visited.test/' }],
      faviconPaths: new Map([
        ['with-icon', '/data/favicons/favicon_with-icon.png'],
        ['h1', '/data/favicons/favicon_h1.png'],
      ]),
      includeHistory: true,
      icons,
    });

    expect(items.map((item) => item.iconUrls)).toEqual([
      ['file:/data/favicons/favicon_with-icon.png', 'xdg:firefox'],
      ['file:/assets/bookmark.svg', 'xdg:firefox'],
      ['file:/assets/history.svg', 'xdg:firefox'],
    ]);
  });

  it('attaches open and copy actions carrying the URL', () => {
    const [item] = buildIndexItems({
      bookmarks: [{ guid: 'b1', title: 'Example', url: 'https://ex.com', urlHash: 1 }],
      history: [],
      faviconPaths: new Map(),
      includeHistory: false,
      icons,
    });

    expect(item?.actions).toEqual([
      { id: 'open', text: 'Open in Firefox', url: 'https://ex.com' },
      { id: 'copy', text: 'Copy URL', url: 'https://ex.com' },
    ]);
    expect(Object.isFrozen(item)).toBe(true);
  });
});

describe('buildIndex', () => {
  let tempDir: string;
  let locations: Locations;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    tempDir = await createTempDir();
    locations = { firefoxRoot: path.join(tempDir, 'firefox'), dataDir: path.join(tempDir, 'data') };
    await createFirefoxRoot(locations.firefoxRoot, [
      {
        section: 'Profile0',
        path: 'abc.default',
        places: {
          places: [
            { guid: 'p1', url: 'https://ex.com', title: 'Example', urlHash: 42 },
            { guid: 'p2', url: 'https://plain.test/', title: 'Plain', urlHash: 43 },
            { guid: 'p3', url: 'https://visited.test/', title: 'Visited', urlHash: 44 },
          ],
          bookmarks: [
            { guid: 'b1', title: 'Example', placeGuid: 'p1' },
            { guid: 'b2', title: 'Plain', placeGuid: 'p2' },
          ],
        },
        favicons: [
          { urlHash: 42, data: Uint8Array.from([7, 7, 7]) },
          { urlHash: 44, data: Uint8Array.from([8]) },
        ],
      },
    ]);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads the profile stores and materializes bookmark favicons', async () => {
    const items = await buildIndex({ profilePath: 'abc.default', indexHistory: true }, locations, icons);

    const iconFile = path.join(locations.dataDir, 'favicons', 'favicon_b1.png');
    expect(summarize(items)).toEqual([
      { id: 'b1', text: 'Example', subtext: 'https://ex.com', searchText: 'example https://ex.com' },
      { id: 'b2', text: 'Plain', subtext: 'https://plain.test/', searchText: 'plain https://plain.test/' },
      { id: 'p3', text: 'Visited', subtext: 'https://visited.test/', searchText: 'visited https://visited.test/' },
    ]);
    expect(items[0]?.iconUrls).toEqual([`file:${iconFile}`, 'xdg:firefox']);
    expect(items[2]?.iconUrls).toEqual(['file:/assets/history.svg', 'xdg:firefox']);
    expect(await fs.readFile(iconFile)).toEqual(Buffer.from([7, 7, 7]));
    expect(await fs.readdir(path.join(locations.dataDir, 'favicons'))).toEqual(['favicon_b1.png']);
  });

  it('produces the same items when rebuilt from unchanged stores', async () => {
    const config = { profilePath: 'abc.default', indexHistory: false };

    const first = await buildIndex(config, locations, icons);
    const second = await buildIndex(config, locations, icons);

    expect(second).toEqual(first);
    expect(first.map((item) => item.id)).toEqual(['b1', 'b2']);
  });

  it('fails when the profile has no places store', async () => {
    await expect(
      buildIndex({ profilePath: 'missing.profile', indexHistory: false }, locations, icons),
    ).rejects.toBeInstanceOf(StoreNotFoundError);
  });
});
