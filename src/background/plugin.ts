import path from 'node:path';
import { buildIndex } from '../shared/index-builder';
import { SETTINGS_FILE_NAME } from '../shared/paths';
import { listProfiles } from '../shared/profiles';
import { RebuildCoordinator, type RebuildState } from '../shared/rebuild-coordinator';
import { SearchIndex } from '../shared/search-index';
import { JsonSettingsStore, resolveSettings, type SettingsStore } from '../shared/settings';
import type { IndexItem, Locations, PluginSettings, ProfilePath, RebuildConfig } from '../shared/types';

export const DEFAULT_TRIGGER = 'f ';

export type ConfigWidget =
  | {
      type: 'combobox';
      property: 'currentProfilePath';
      label: string;
      items: readonly ProfilePath[];
      toolTip: string;
    }
  | {
      type: 'checkbox';
      property: 'indexHistory';
      label: string;
      toolTip: string;
    };

export type PluginOptions = {
  locations: Locations;
  settingsStore?: SettingsStore;
  index?: SearchIndex;
  build?: (config: RebuildConfig) => Promise<readonly IndexItem[]>;
  /** Receives rebuild failures; defaults to `console.error`. */
  onError?: (error: unknown) => void;
};

const reportRebuildError = (error: unknown): void => {
  console.error('[foxmarks] Index rebuild failed', error);
};

export class FirefoxBookmarksPlugin {
  readonly defaultTrigger = DEFAULT_TRIGGER;

  readonly index: SearchIndex;

  private readonly coordinator: RebuildCoordinator;

  private readonly settingsStore: SettingsStore;

  private readonly onError: (error: unknown) => void;

  private constructor(
    readonly profiles: readonly ProfilePath[],
    private settings: PluginSettings,
    options: PluginOptions,
    settingsStore: SettingsStore,
  ) {
    this.index = options.index ?? new SearchIndex();
    this.settingsStore = settingsStore;
    this.onError = options.onError ?? reportRebuildError;
    const build = options.build ?? ((config: RebuildConfig) => buildIndex(config, options.locations));
    this.coordinator = new RebuildCoordinator({
      build,
      publish: (items) => {
        this.index.setItems(items);
        console.info(`[foxmarks] Published ${items.length} items`);
      },
    });
  }

  /**
   * Discovers profiles, settles the stored settings against them and starts the first rebuild.
   * Without any usable profile the plugin stays empty.
   */
  static async create(options: PluginOptions): Promise<FirefoxBookmarksPlugin> {
    const settingsStore =
      options.settingsStore ?? new JsonSettingsStore(path.join(options.locations.dataDir, SETTINGS_FILE_NAME));
    const profiles = await listProfiles(options.locations.firefoxRoot);
    const { settings, changed } = resolveSettings(await settingsStore.read(), profiles);

    const plugin = new FirefoxBookmarksPlugin(profiles, settings, options, settingsStore);
    if (profiles.length === 0) {
      console.error('[foxmarks] No Firefox profiles found');
      return plugin;
    }

    if (changed) {
      await settingsStore.write(settings);
    }
    plugin.updateIndexItems();
    return plugin;
  }

  get currentProfilePath(): ProfilePath {
    return this.settings.currentProfilePath;
  }

  get indexHistory(): boolean {
    return this.settings.indexHistory;
  }

  get rebuildState(): RebuildState {
    return this.coordinator.state;
  }

  async setCurrentProfilePath(profilePath: ProfilePath): Promise<void> {
    if (!this.profiles.includes(profilePath)) {
      throw new Error(`Unknown Firefox profile: ${profilePath}`);
    }
    await this.updateSettings({ currentProfilePath: profilePath });
  }

  async setIndexHistory(enabled: boolean): Promise<void> {
    await this.updateSettings({ indexHistory: enabled });
  }

  configWidget(): ConfigWidget[] {
    return [
      {
        type: 'combobox',
        property: 'currentProfilePath',
        label: 'Firefox Profile',
        items: this.profiles,
        toolTip: 'Select Firefox profile to search bookmarks from',
      },
      {
        type: 'checkbox',
        property: 'indexHistory',
        label: 'Index Firefox History',
        toolTip: 'Enable or disable indexing of Firefox history',
      },
    ];
  }

  handleQuery(text: string, limit?: number): IndexItem[] {
    return this.index.query(text, limit);
  }

  /** Starts a rebuild for the current settings without waiting for it. */
  updateIndexItems(): void {
    if (this.profiles.length === 0) {
      return;
    }
    void this.coordinator.trigger(this.rebuildConfig()).catch(this.onError);
  }

  whenIdle(): Promise<void> {
    return this.coordinator.whenIdle();
  }

  dispose(): Promise<void> {
    return this.coordinator.dispose();
  }

  private rebuildConfig(): RebuildConfig {
    return {
      profilePath: this.settings.currentProfilePath,
      indexHistory: this.settings.indexHistory,
    };
  }

  private async updateSettings(changes: Partial<PluginSettings>): Promise<void> {
    this.settings = { ...this.settings, ...changes };
    await this.settingsStore.write(this.settings);
    this.updateIndexItems();
  }
}
