import path from 'path';
import { ModDbFetcher } from './dataProviders/modDb';
import type { ModDbMod, ModDbAuthor } from './dataProviders/types';
import { ModStore } from './db/store';
import type { ModRecord, RowCounts } from './db/store';
import { mapMod, indexAuthorsByName } from './mapper';
import type { AuthorIndex } from './mapper';
import { resolveConfig } from './config';
import type { ModIndexConfig } from './config';
import { ensureExists } from './paths';
import { debug, info } from './logging';

export interface LoadSummary {
  mods: number;
  rows: RowCounts;
}

/**
 * Maps the record before touching the store, so a mod whose author cannot be
 * resolved leaves no rows behind.
 */
export function loadMod(store: ModStore, raw: ModDbMod, authorsByName: AuthorIndex): ModRecord {
  const {
    mod, author, modidStrs, tags,
  } = mapMod(raw, authorsByName);
  const authorRow = store.upsertAuthor({ id: author.userid, name: author.name });
  const modRecord = store.upsertMod(mod, authorRow);
  modidStrs.forEach((modidStr) => {
    store.upsertModIdStr(modidStr, modRecord);
  });
  tags.forEach((tagStr) => {
    store.attachTag(modRecord, store.upsertTag(tagStr));
  });
  return modRecord;
}

export function loadMods(store: ModStore, modList: Array<ModDbMod>, authorList: Array<ModDbAuthor>): LoadSummary {
  const authorsByName = indexAuthorsByName(authorList);
  debug(`Indexed ${authorsByName.size} authors by name`);
  modList.forEach((raw) => {
    loadMod(store, raw, authorsByName);
  });
  const rows = store.countRows();
  info(`Loaded ${modList.length} mods: ${JSON.stringify(rows)}`);
  return { mods: modList.length, rows };
}

export async function run(config: ModIndexConfig = resolveConfig()): Promise<LoadSummary> {
  const fetcher = new ModDbFetcher(config);
  const modList = await fetcher.fetchMods();
  const authorList = await fetcher.fetchAuthors();
  ensureExists(path.dirname(config.databaseFile));
  const store = ModStore.open(config.databaseFile);
  try {
    return loadMods(store, modList, authorList);
  } finally {
    store.close();
  }
}
