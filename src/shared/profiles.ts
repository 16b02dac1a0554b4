import fs from 'node:fs/promises';
import path from 'node:path';
import ini from 'ini';
import { describeError, isRecord, pathExists } from './fs-utils';
import {
  PROFILES_REGISTRY_FILE,
  faviconsStorePath,
  placesStorePath,
  resolveProfileDir,
} from './paths';
import type { ProfilePath } from './types';

const PROFILE_SECTION_PREFIX = 'Profile';

const readRegistryPaths = (text: string): ProfilePath[] => {
  const registry: unknown = ini.parse(text);
  if (!isRecord(registry)) {
    return [];
  }

  const paths: ProfilePath[] = [];
  for (const [sectionName, section] of Object.entries(registry)) {
    if (!sectionName.startsWith(PROFILE_SECTION_PREFIX) || !isRecord(section)) {
      continue;
    }
    const profilePath = section.Path;
    if (typeof profilePath === 'string' && profilePath.trim()) {
      paths.push(profilePath.trim());
    }
  }
  return paths;
};

const hasRequiredStores = async (profileDir: string): Promise<boolean> => {
  const [places, favicons] = await Promise.all([
    pathExists(placesStorePath(profileDir)),
    pathExists(faviconsStorePath(profileDir)),
  ]);
  return places && favicons;
};

/**
 * Lists the profiles registered in `profiles.ini` that hold both stores, in registry order.
 * A missing root or an unreadable registry yields an empty list.
 */
export const listProfiles = async (firefoxRoot: string): Promise<ProfilePath[]> => {
  if (!(await pathExists(firefoxRoot))) {
    return [];
  }

  let candidates: ProfilePath[];
  try {
    const text = await fs.readFile(path.join(firefoxRoot, PROFILES_REGISTRY_FILE), 'utf8');
    candidates = readRegistryPaths(text);
  } catch (error) {
    console.warn(`[foxmarks] Failed to read Firefox profiles: ${describeError(error)}`);
    return [];
  }

  const checks = await Promise.all(
    candidates.map((candidate) => hasRequiredStores(resolveProfileDir(firefoxRoot, candidate))),
  );
  return candidates.filter((_, index) => checks[index]);
};
