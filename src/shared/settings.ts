import fs from 'node:fs/promises';
import path from 'node:path';
import { isRecord } from './fs-utils';
import type { PluginSettings, ProfilePath } from './types';

export const DEFAULT_PLUGIN_SETTINGS: PluginSettings = {
  currentProfilePath: '',
  indexHistory: false,
};

export interface SettingsStore {
  read(): Promise<Partial<PluginSettings>>;
  write(settings: PluginSettings): Promise<void>;
}

const pickSettings = (value: unknown): Partial<PluginSettings> => {
  if (!isRecord(value)) {
    return {};
  }
  const settings: Partial<PluginSettings> = {};
  if (typeof value.currentProfilePath === 'string') {
    settings.currentProfilePath = value.currentProfilePath;
  }
  if (typeof value.indexHistory === 'boolean') {
    settings.indexHistory = value.indexHistory;
  }
  return settings;
};

export class MemorySettingsStore implements SettingsStore {
  private stored: Partial<PluginSettings>;

  constructor(initial: Partial<PluginSettings> = {}) {
    this.stored = { ...initial };
  }

  async read(): Promise<Partial<PluginSettings>> {
    return { ...this.stored };
  }

  async write(settings: PluginSettings): Promise<void> {
    this.stored = { ...settings };
  }
}

export class JsonSettingsStore implements SettingsStore {
  constructor(private readonly filePath: string) {}

  async read(): Promise<Partial<PluginSettings>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    try {
      return pickSettings(JSON.parse(text));
    } catch (error) {
      console.warn(`[foxmarks] Ignoring unreadable settings at ${this.filePath}`, error);
      return {};
    }
  }

  async write(settings: PluginSettings): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(settings, null, 2)}\n`, 'utf8');
  }
}

export type ResolvedSettings = {
  readonly settings: PluginSettings;
  readonly changed: boolean;
};

/**
 * Fills in defaults and makes sure the selected profile is one of `profiles`, falling back to
 * the first one. `changed` tells the caller to persist the result.
 */
export const resolveSettings = (
  stored: Partial<PluginSettings>,
  profiles: readonly ProfilePath[],
): ResolvedSettings => {
  const settings: PluginSettings = { ...DEFAULT_PLUGIN_SETTINGS, ...stored };
  let changed = stored.indexHistory === undefined;

  const [firstProfile] = profiles;
  if (firstProfile !== undefined && !profiles.includes(settings.currentProfilePath)) {
    settings.currentProfilePath = firstProfile;
    changed = true;
  }

  return { settings, changed };
};
