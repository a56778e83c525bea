import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import { fetchJson } from '../utils';
import { ensureExists } from '../paths';
import { defaultConfig } from '../config';
import type { FetcherConfig } from '../config';
import { CorruptCacheError, InvalidResponseError, ValidationError } from '../errors';
import { debug, info } from '../logging';
import { modDbModSchema, modDbAuthorSchema } from './types';
import type { ModDbMod, ModDbAuthor } from './types';

const collectionSchema = z.array(z.unknown());

function extractCollection(response: unknown, key: string, url: string): unknown[] {
  const result = z.object({ [key]: collectionSchema }).safeParse(response);
  if (!result.success) {
    throw new InvalidResponseError(`Response from ${url} has no array under "${key}"`, url, result.error);
  }
  return result.data[key];
}

function readCacheFile(filePath: string): unknown[] {
  const data = fs.readFileSync(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (e) {
    throw new CorruptCacheError(`Cache file ${filePath} is not valid JSON. Delete it to download again.`, filePath, e instanceof Error ? e : undefined);
  }
  const result = collectionSchema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptCacheError(`Cache file ${filePath} does not hold an array. Delete it to download again.`, filePath, result.error);
  }
  return result.data;
}

function parseRecords<T extends z.ZodTypeAny>(schema: T, records: unknown[], collection: string): Array<z.output<T>> {
  return records.map((record, index) => {
    const result = schema.safeParse(record);
    if (!result.success) {
      throw new ValidationError(`Invalid record ${collection}[${index}]: ${result.error.message}`, result.error, `${collection}[${index}]`);
    }
    return result.data;
  });
}

export class ModDbFetcher {
  readonly config: FetcherConfig;

  constructor(config: Partial<FetcherConfig> = {}) {
    this.config = { ...defaultConfig, ...config };
  }

  /**
   * Returns the array stored under `key` in the JSON served at `url`,
   * downloading it into `filePath` first when that file does not exist yet.
   * The return value is always what was read back from `filePath`.
   */
  async loadCollection(url: string, filePath: string, key: string): Promise<unknown[]> {
    if (!fs.existsSync(filePath)) {
      info(`Downloading:\n    ${url}\n    ${filePath}`);
      const response = await fetchJson(url, this.config.userAgent);
      const collection = extractCollection(response, key, url);
      ensureExists(path.dirname(filePath));
      fs.writeFileSync(filePath, JSON.stringify(collection));
    } else {
      debug(`Using cached ${key} from ${filePath}`);
    }
    return readCacheFile(filePath);
  }

  async fetchMods(): Promise<Array<ModDbMod>> {
    const records = await this.loadCollection(this.config.modsUrl, this.config.modsCacheFile, 'mods');
    return parseRecords(modDbModSchema, records, 'mods');
  }

  async fetchAuthors(): Promise<Array<ModDbAuthor>> {
    const records = await this.loadCollection(this.config.authorsUrl, this.config.authorsCacheFile, 'authors');
    return parseRecords(modDbAuthorSchema, records, 'authors');
  }
}
