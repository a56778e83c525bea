import { UserAgent } from './utils';
import { modsCacheFile, authorsCacheFile, databaseFile } from './paths';

export const API_URL = 'https://mods.vintagestory.at/api';

export interface FetcherConfig {
  modsUrl: string;
  authorsUrl: string;
  modsCacheFile: string;
  authorsCacheFile: string;
  userAgent: string;
}

export interface ModIndexConfig extends FetcherConfig {
  databaseFile: string;
}

export const defaultConfig: Readonly<ModIndexConfig> = {
  modsUrl: `${API_URL}/mods`,
  authorsUrl: `${API_URL}/authors`,
  modsCacheFile,
  authorsCacheFile,
  databaseFile,
  userAgent: UserAgent,
};

export function resolveConfig(overrides: Partial<ModIndexConfig> = {}): ModIndexConfig {
  return { ...defaultConfig, ...overrides };
}
