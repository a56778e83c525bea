import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { and, count, eq } from 'drizzle-orm';
import type { SQLiteTable } from 'drizzle-orm/sqlite-core';
import {
  authors, mods, modidStrs, tags, modTags, modVersions, createTables,
} from './schema';
import type {
  AuthorRow, ModRow, ModIdStrRow, TagRow, ModVersionRow, TableName,
} from './schema';
import type { NormalizedMod } from '../mapper';
import { encodeTimestamp, decodeTimestamp } from '../timestamp';
import { compareVersionsDesc } from '../utils';
import { DuplicateRecordError } from '../errors';
import { debug } from '../logging';

export interface ModRecord extends Omit<ModRow, 'lastreleased'> {
  lastreleased: Date | null;
}

export type RowCounts = Record<TableName, number>;

function toModRecord(row: ModRow): ModRecord {
  return { ...row, lastreleased: decodeTimestamp(row.lastreleased) };
}

function isUniqueViolation(e: unknown): boolean {
  return e instanceof Database.SqliteError
    && (e.code === 'SQLITE_CONSTRAINT_UNIQUE' || e.code === 'SQLITE_CONSTRAINT_PRIMARYKEY');
}

/**
 * Insert-if-missing access to the mod index database. Every write is its own
 * autocommitted statement, so whatever was inserted before a failure stays.
 */
export class ModStore {
  readonly sqlite: Database.Database;
  readonly db: BetterSQLite3Database;

  constructor(sqlite: Database.Database) {
    this.sqlite = sqlite;
    this.sqlite.pragma('foreign_keys = ON');
    createTables(this.sqlite);
    this.db = drizzle(this.sqlite);
  }

  static open(file: string): ModStore {
    debug(`Opening mod database ${file}`);
    return new ModStore(new Database(file));
  }

  close(): void {
    this.sqlite.close();
  }

  upsertAuthor(author: { id: number, name: string | null }): AuthorRow {
    const existing = this.getAuthor(author.id);
    if (existing) {
      return existing;
    }
    debug(`Adding author ${author.id} (${author.name})`);
    return this.db.insert(authors).values({ id: author.id, name: author.name }).returning().get();
  }

  upsertMod(mod: NormalizedMod, author: AuthorRow): ModRecord {
    const existing = this.db.select().from(mods).where(eq(mods.id, mod.id)).get();
    if (existing) {
      return toModRecord(existing);
    }
    debug(`Adding mod ${mod.id} (${mod.name})`);
    const row = this.db.insert(mods).values({
      ...mod,
      author_id: author.id,
      lastreleased: encodeTimestamp(mod.lastreleased),
    }).returning().get();
    return toModRecord(row);
  }

  upsertModIdStr(modidStr: string, mod: Pick<ModRecord, 'id'>): ModIdStrRow {
    const existing = this.db.select().from(modidStrs).where(eq(modidStrs.modid_str, modidStr)).get();
    if (existing) {
      return existing;
    }
    return this.db.insert(modidStrs).values({ modid_str: modidStr, mod_id: mod.id }).returning().get();
  }

  upsertTag(tag: string): TagRow {
    const existing = this.db.select().from(tags).where(eq(tags.tag, tag)).get();
    if (existing) {
      return existing;
    }
    debug(`Adding tag ${tag}`);
    return this.db.insert(tags).values({ tag }).returning().get();
  }

  /** Links a tag to a mod. Linking an already linked pair does nothing. */
  attachTag(mod: Pick<ModRecord, 'id'>, tag: TagRow): boolean {
    const existing = this.db.select().from(modTags)
      .where(and(eq(modTags.mod_id, mod.id), eq(modTags.tag_id, tag.id)))
      .get();
    if (existing) {
      return false;
    }
    this.db.insert(modTags).values({ mod_id: mod.id, tag_id: tag.id }).run();
    return true;
  }

  addModVersion(mod: Pick<ModRecord, 'id'>, version: string): ModVersionRow {
    try {
      return this.db.insert(modVersions).values({ mod_id: mod.id, version }).returning().get();
    } catch (e) {
      if (isUniqueViolation(e)) {
        throw new DuplicateRecordError(`Version ${version} is already stored`, 'mod_version', version);
      }
      throw e;
    }
  }

  getAuthor(id: number): AuthorRow | undefined {
    return this.db.select().from(authors).where(eq(authors.id, id)).get();
  }

  findAuthorByName(name: string): AuthorRow | undefined {
    return this.db.select().from(authors).where(eq(authors.name, name)).get();
  }

  getMod(id: number): ModRecord | undefined {
    const row = this.db.select().from(mods).where(eq(mods.id, id)).get();
    return row ? toModRecord(row) : undefined;
  }

  getModsByAuthor(authorId: number): Array<ModRecord> {
    return this.db.select().from(mods)
      .where(eq(mods.author_id, authorId))
      .orderBy(mods.id)
      .all()
      .map(toModRecord);
  }

  getModTags(modId: number): Array<TagRow> {
    return this.db.select({ id: tags.id, tag: tags.tag }).from(modTags)
      .innerJoin(tags, eq(modTags.tag_id, tags.id))
      .where(eq(modTags.mod_id, modId))
      .orderBy(tags.tag)
      .all();
  }

  getModsByTag(tag: string): Array<ModRecord> {
    return this.db.select({ mod: mods }).from(modTags)
      .innerJoin(tags, eq(modTags.tag_id, tags.id))
      .innerJoin(mods, eq(modTags.mod_id, mods.id))
      .where(eq(tags.tag, tag))
      .orderBy(mods.id)
      .all()
      .map((row) => toModRecord(row.mod));
  }

  getModIdStrs(modId: number): Array<string> {
    return this.db.select().from(modidStrs)
      .where(eq(modidStrs.mod_id, modId))
      .orderBy(modidStrs.modid_str)
      .all()
      .map((row) => row.modid_str);
  }

  getModVersions(modId: number): Array<string> {
    return this.db.select().from(modVersions)
      .where(eq(modVersions.mod_id, modId))
      .all()
      .map((row) => row.version)
      .sort(compareVersionsDesc);
  }

  private countTable(table: SQLiteTable): number {
    return this.db.select({ value: count() }).from(table).get()?.value ?? 0;
  }

  countRows(): RowCounts {
    return {
      author: this.countTable(authors),
      mod: this.countTable(mods),
      modid_str: this.countTable(modidStrs),
      tag: this.countTable(tags),
      mod_tag: this.countTable(modTags),
      mod_version: this.countTable(modVersions),
    };
  }
}
