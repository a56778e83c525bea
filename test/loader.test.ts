import path from 'path';
import fs from 'fs';
import os from 'os';
import Database from 'better-sqlite3';
import {
  describe, it, before, after,
} from 'mocha';
import 'should';
import should from 'should';
import { run, loadMods } from '../src/loader';
import { resolveConfig } from '../src/config';
import { ModStore } from '../src/db/store';
import { describeAuthor } from '../src/report';
import { AuthorNotFoundError } from '../src/errors';
import {
  DummyServer, dummyAuthors, dummyMods, expectedRows,
} from './dummyData';

describe('run', function() {
  const server = new DummyServer();
  let workDir = '';

  before(async function() {
    await server.start();
    server.routes.set('/api/mods', { status: 200, body: JSON.stringify({ mods: dummyMods }) });
    server.routes.set('/api/authors', { status: 200, body: JSON.stringify({ authors: dummyAuthors }) });
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vs-mod-index-'));
  });

  after(async function() {
    await server.stop();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  const config = () => resolveConfig({
    modsUrl: server.url('/api/mods'),
    authorsUrl: server.url('/api/authors'),
    modsCacheFile: path.join(workDir, 'mods.json'),
    authorsCacheFile: path.join(workDir, 'authors.json'),
    databaseFile: path.join(workDir, 'db', 'mods.sqlite3'),
  });

  it('should fetch, cache and load everything', async function() {
    const summary = await run(config());
    summary.should.deepEqual({ mods: 3, rows: expectedRows });
    server.requests.should.deepEqual(['/api/mods', '/api/authors']);
    fs.existsSync(path.join(workDir, 'mods.json')).should.equal(true);
  });

  it('should reuse the caches and keep the rows on a second run', async function() {
    const summary = await run(config());
    summary.rows.should.deepEqual(expectedRows);
    server.requests.length.should.equal(2);
  });

  it('should leave the database readable after the run', function() {
    const store = ModStore.open(config().databaseFile);
    try {
      should(store.getMod(11)?.name).equal('Map Tool');
    } finally {
      store.close();
    }
  });

  it('should fail when a mod names an unknown author', async function() {
    fs.writeFileSync(path.join(workDir, 'authors.json'), JSON.stringify([{ userid: 2, name: 'bob' }]));
    await should(run({ ...config(), databaseFile: path.join(workDir, 'other.sqlite3') })).rejectedWith(AuthorNotFoundError);
  });
});

describe('describeAuthor', function() {
  it('should describe the mods of an author', function() {
    const store = new ModStore(new Database(':memory:'));
    try {
      loadMods(store, dummyMods, dummyAuthors);
      store.addModVersion({ id: 10 }, '1.0.0');
      should(describeAuthor(store, 'alice')).deepEqual([
        'Mod(id=10, assetid=100, name=Better Chests, summary=More chest space, urlalias=betterchests, downloads=500, follows=20, trendingpoints=3, comment_count=4, logo=null, side=both, mod_type=mod, lastreleased=2023-05-01 12:00:00)',
        '  ModVersion(version=1.0.0)',
        '  Tag(tag=QoL)',
        '  Tag(tag=Storage)',
        '  ModIdStr(modid_str=bchests, mod_id=10)',
        '  ModIdStr(modid_str=betterchests, mod_id=10)',
        'Mod(id=12, assetid=102, name=Server Tweaks, summary=null, urlalias=null, downloads=7, follows=0, trendingpoints=0, comment_count=0, logo=null, side=server, mod_type=other, lastreleased=null)',
        'Author(id=1, name=alice)',
      ]);
      should(describeAuthor(store, 'mallory')).be.undefined();
    } finally {
      store.close();
    }
  });
});
