import got, { RequestError } from 'got';
import { coerce, rcompare } from 'semver';
import {
  setLogDebug, debug, warn, error,
} from './logging';
import { NetworkError, InvalidResponseError } from './errors';

let isDebugMode = process.env.NODE_DEBUG?.includes('vs-mod-index') || false;

setLogDebug(isDebugMode);

export function isDebug(): boolean {
  return isDebugMode;
}

export function setDebug(shouldDebug: boolean): void {
  isDebugMode = shouldDebug;
  setLogDebug(shouldDebug);
}

export function buildUserAgent(name?: string, version?: string): string {
  return `${name?.replace(/ /g, '') || 'vs-mod-index'}/${version || 'unknown'}`;
}

export const UserAgent = buildUserAgent(process.env.VS_MOD_INDEX_USERAGENT, process.env.VS_MOD_INDEX_USERAGENT_VERSION);

/**
 * Single GET with no retries. An error status is only logged; whatever body
 * comes back is handed to the JSON parser.
 */
export async function fetchJson(url: string, userAgent = UserAgent): Promise<unknown> {
  let body: string;
  try {
    const res = await got(url, {
      retry: {
        limit: 0,
      },
      throwHttpErrors: false,
      dnsCache: false,
      headers: {
        'User-Agent': userAgent,
      },
    });
    debug(`GET ${url} -> ${res.statusCode}`);
    if (res.statusCode < 200 || res.statusCode >= 300) {
      warn(`GET ${url} returned status ${res.statusCode}`);
    }
    body = res.body;
  } catch (e) {
    if (e instanceof RequestError) {
      error(`Network error while fetching ${url}: ${e.message}`);
      throw new NetworkError(`Could not fetch ${url} (${e.message})`, e.response?.statusCode ?? 0);
    }
    throw e;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (e) {
    throw new InvalidResponseError(`Response from ${url} is not valid JSON`, url, e instanceof Error ? e : undefined);
  }
}

/**
 * Newest first. Strings semver cannot coerce sort after the ones it can.
 */
export function compareVersionsDesc(v1: string, v2: string): number {
  const fixedV1 = coerce(v1);
  const fixedV2 = coerce(v2);
  if (fixedV1 && fixedV2) {
    const result = rcompare(fixedV1, fixedV2);
    return result !== 0 ? result : v1.localeCompare(v2);
  }
  if (fixedV1) return -1;
  if (fixedV2) return 1;
  return v1.localeCompare(v2);
}
