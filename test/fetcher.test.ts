import path from 'path';
import fs from 'fs';
import os from 'os';
import {
  describe, it, before, after, beforeEach, afterEach,
} from 'mocha';
import 'should';
import should from 'should';
import { ModDbFetcher } from '../src/dataProviders/modDb';
import {
  CorruptCacheError, InvalidResponseError, NetworkError, ValidationError,
} from '../src/errors';
import { addLogger, removeLogger, LogLevel } from '../src/logging';
import type { Logger } from '../src/logging';
import { DummyServer, dummyAuthors, dummyMods } from './dummyData';

describe('mod database fetcher', function() {
  const server = new DummyServer();
  let cacheDir = '';
  let fetcher: ModDbFetcher;

  before(async function() {
    await server.start();
    server.routes.set('/api/mods', { status: 200, body: JSON.stringify({ statuscode: '200', mods: dummyMods }) });
    server.routes.set('/api/authors', { status: 200, body: JSON.stringify({ statuscode: '200', authors: dummyAuthors }) });
    server.routes.set('/api/broken', { status: 500, body: '<html>Internal Server Error</html>' });
  });

  after(async function() {
    await server.stop();
  });

  beforeEach(function() {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vs-mod-index-'));
    server.requests.length = 0;
    fetcher = new ModDbFetcher({
      modsUrl: server.url('/api/mods'),
      authorsUrl: server.url('/api/authors'),
      modsCacheFile: path.join(cacheDir, 'mods.json'),
      authorsCacheFile: path.join(cacheDir, 'authors.json'),
    });
  });

  afterEach(function() {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it('should return an existing cache file without a request', async function() {
    const cacheFile = path.join(cacheDir, 'x.json');
    fs.writeFileSync(cacheFile, '["a","b"]');
    const collection = await fetcher.loadCollection(server.url('/api/mods'), cacheFile, 'X');
    collection.should.deepEqual(['a', 'b']);
    server.requests.length.should.equal(0);
  });

  it('should download and cache the array under the key', async function() {
    const cacheFile = path.join(cacheDir, 'authors.json');
    const collection = await fetcher.loadCollection(server.url('/api/authors'), cacheFile, 'authors');
    collection.should.deepEqual(dummyAuthors);
    fs.readFileSync(cacheFile, 'utf8').should.equal(JSON.stringify(dummyAuthors));
    server.requests.should.deepEqual(['/api/authors']);

    await fetcher.loadCollection(server.url('/api/authors'), cacheFile, 'authors');
    server.requests.length.should.equal(1);
  });

  it('should create missing cache directories', async function() {
    const cacheFile = path.join(cacheDir, 'nested', 'authors.json');
    await fetcher.loadCollection(server.url('/api/authors'), cacheFile, 'authors');
    fs.existsSync(cacheFile).should.equal(true);
  });

  it('should not write the cache when the body is not JSON', async function() {
    const cacheFile = path.join(cacheDir, 'broken.json');
    await should(fetcher.loadCollection(server.url('/api/broken'), cacheFile, 'mods')).rejectedWith(InvalidResponseError);
    fs.existsSync(cacheFile).should.equal(false);
  });

  it('should warn about error statuses before parsing the body', async function() {
    const warnings: Array<string> = [];
    const logger: Logger = {
      write(level, message) {
        if (level === LogLevel.WARN) {
          warnings.push(message.split('\t').slice(2).join('\t'));
        }
      },
    };
    addLogger(logger);
    try {
      const url = server.url('/api/broken');
      await should(fetcher.loadCollection(url, path.join(cacheDir, 'broken.json'), 'mods')).rejectedWith(InvalidResponseError);
      warnings.should.deepEqual([`GET ${url} returned status 500`]);
    } finally {
      removeLogger(logger);
    }
  });

  it('should not write the cache when the key is missing', async function() {
    const cacheFile = path.join(cacheDir, 'mods.json');
    await should(fetcher.loadCollection(server.url('/api/authors'), cacheFile, 'mods')).rejectedWith(InvalidResponseError);
    fs.existsSync(cacheFile).should.equal(false);
  });

  it('should fail on a corrupt cache file', async function() {
    const cacheFile = path.join(cacheDir, 'mods.json');
    fs.writeFileSync(cacheFile, '[{"modid": 1');
    await should(fetcher.loadCollection(server.url('/api/mods'), cacheFile, 'mods')).rejectedWith(CorruptCacheError);
    server.requests.length.should.equal(0);
  });

  it('should fail on a cache file that holds no array', async function() {
    const cacheFile = path.join(cacheDir, 'mods.json');
    fs.writeFileSync(cacheFile, '{"mods": []}');
    await should(fetcher.loadCollection(server.url('/api/mods'), cacheFile, 'mods')).rejectedWith(CorruptCacheError);
  });

  it('should report unreachable hosts as network errors', async function() {
    const closed = new DummyServer();
    await closed.start();
    const url = closed.url('/api/mods');
    await closed.stop();
    await should(fetcher.loadCollection(url, path.join(cacheDir, 'mods.json'), 'mods')).rejectedWith(NetworkError);
  });

  it('should fetch and validate mods and authors', async function() {
    const modList = await fetcher.fetchMods();
    const authorList = await fetcher.fetchAuthors();
    modList.should.deepEqual(dummyMods);
    authorList.should.deepEqual(dummyAuthors);
    server.requests.should.deepEqual(['/api/mods', '/api/authors']);
  });

  it('should reject mods with an unknown install side', async function() {
    fs.writeFileSync(path.join(cacheDir, 'mods.json'), JSON.stringify([{ ...dummyMods[0], side: 'everywhere' }]));
    await should(fetcher.fetchMods()).rejectedWith(ValidationError);
  });
});
