import path from 'node:path';
import { FirefoxBookmarksPlugin } from './background/plugin';
import { createSystemActionHandlers, runItemAction } from './shared/actions';
import { SETTINGS_FILE_NAME, resolveLocations } from './shared/paths';
import { listProfiles } from './shared/profiles';
import { JsonSettingsStore, resolveSettings } from './shared/settings';
import type { ItemActionId } from './shared/types';

const USAGE = `Usage:
  foxmarks profiles
  foxmarks config [profile <path>] [history on|off]
  foxmarks search <text...>
  foxmarks open <n> <text...>
  foxmarks copy <n> <text...>`;

const locations = resolveLocations();
const settingsStore = new JsonSettingsStore(path.join(locations.dataDir, SETTINGS_FILE_NAME));

const printProfiles = async (): Promise<void> => {
  const profiles = await listProfiles(locations.firefoxRoot);
  const { settings } = resolveSettings(await settingsStore.read(), profiles);
  for (const profile of profiles) {
    console.log(`${profile === settings.currentProfilePath ? '*' : ' '} ${profile}`);
  }
};

const parseHistoryFlag = (value: string | undefined): boolean => {
  if (value === 'on') {
    return true;
  }
  if (value === 'off') {
    return false;
  }
  throw new Error(`Expected "on" or "off", got "${value ?? ''}"`);
};

const withPlugin = async (run: (plugin: FirefoxBookmarksPlugin) => Promise<void>): Promise<void> => {
  const plugin = await FirefoxBookmarksPlugin.create({
    locations,
    settingsStore,
    onError: (error) => {
      console.error('[foxmarks] Index rebuild failed', error);
      process.exitCode = 1;
    },
  });
  try {
    await run(plugin);
  } finally {
    await plugin.dispose();
  }
};

const configure = (args: string[]): Promise<void> =>
  withPlugin(async (plugin) => {
    for (let index = 0; index < args.length; index += 2) {
      const key = args[index];
      const value = args[index + 1];
      if (key === 'profile' && value) {
        await plugin.setCurrentProfilePath(value);
      } else if (key === 'history') {
        await plugin.setIndexHistory(parseHistoryFlag(value));
      } else {
        throw new Error(`Unknown setting "${key ?? ''}"\n${USAGE}`);
      }
    }
    console.log(`profile: ${plugin.currentProfilePath || '(none)'}`);
    console.log(`history: ${plugin.indexHistory ? 'on' : 'off'}`);
  });

const search = (text: string): Promise<void> =>
  withPlugin(async (plugin) => {
    await plugin.whenIdle();
    plugin.handleQuery(text).forEach((item, index) => {
      console.log(`${String(index + 1).padStart(3)}. ${item.text}\n     ${item.subtext}`);
    });
  });

const runAction = (actionId: ItemActionId, position: string | undefined, text: string): Promise<void> =>
  withPlugin(async (plugin) => {
    const itemNumber = Number(position);
    if (!Number.isInteger(itemNumber) || itemNumber < 1) {
      throw new Error(`Expected an item number, got "${position ?? ''}"`);
    }
    await plugin.whenIdle();
    const item = plugin.handleQuery(text)[itemNumber - 1];
    const action = item?.actions.find((candidate) => candidate.id === actionId);
    if (!action) {
      throw new Error(`No result #${itemNumber} for "${text}"`);
    }
    await runItemAction(action, createSystemActionHandlers());
    console.log(`${action.text}: ${action.url}`);
  });

const main = async (argv: string[]): Promise<void> => {
  const [command, ...rest] = argv;
  switch (command) {
    case 'profiles':
      await printProfiles();
      return;
    case 'config':
      await configure(rest);
      return;
    case 'search':
      await search(rest.join(' '));
      return;
    case 'open':
    case 'copy': {
      const [position, ...words] = rest;
      await runAction(command, position, words.join(' '));
      return;
    }
    default:
      console.log(USAGE);
      process.exitCode = command ? 1 : 0;
  }
};

main(process.argv.slice(2)).catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
