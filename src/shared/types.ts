export type EntityId = string;

/** Profile directory as written in `profiles.ini`, usually relative to the Firefox root. */
export type ProfilePath = string;

export type BookmarkRecord = {
  guid: EntityId;
  title: string | null;
  url: string;
  urlHash: number;
};

export type HistoryRecord = {
  guid: EntityId;
  title: string | null;
  url: string;
};

export type FaviconBlobs = Map<number, Uint8Array>;

export type ItemActionId = 'open' | 'copy';

export type ItemAction = {
  readonly id: ItemActionId;
  readonly text: string;
  readonly url: string;
};

export type IndexItem = {
  readonly id: EntityId;
  readonly text: string;
  readonly subtext: string;
  readonly iconUrls: readonly string[];
  readonly searchText: string;
  readonly actions: readonly ItemAction[];
};

export type PluginSettings = {
  currentProfilePath: ProfilePath;
  indexHistory: boolean;
};

export type RebuildConfig = {
  readonly profilePath: ProfilePath;
  readonly indexHistory: boolean;
};

export type Locations = {
  readonly firefoxRoot: string;
  readonly dataDir: string;
};
