import Database from 'better-sqlite3';
import { sqliteTable, integer, text } from 'drizzle-orm/sqlite-core';
import { installSides, modTypes } from '../dataProviders/types';

export const authors = sqliteTable('author', {
  id: integer('id').primaryKey(),
  name: text('name'),
});

export const mods = sqliteTable('mod', {
  id: integer('id').primaryKey(),
  assetid: integer('assetid').notNull().unique(),
  name: text('name').notNull(),
  summary: text('summary'),
  author_id: integer('author_id').notNull().references(() => authors.id),
  urlalias: text('urlalias'),
  downloads: integer('downloads').notNull(),
  follows: integer('follows').notNull(),
  trendingpoints: integer('trendingpoints').notNull(),
  comment_count: integer('comment_count').notNull(),
  logo: text('logo'),
  side: text('side', { enum: installSides }).notNull(),
  mod_type: text('mod_type', { enum: modTypes }).notNull(),
  // unix seconds
  lastreleased: integer('lastreleased'),
});

export const modidStrs = sqliteTable('modid_str', {
  modid_str: text('modid_str').primaryKey(),
  mod_id: integer('mod_id').notNull().references(() => mods.id),
});

export const tags = sqliteTable('tag', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  tag: text('tag').notNull().unique(),
});

export const modTags = sqliteTable('mod_tag', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  mod_id: integer('mod_id').notNull().references(() => mods.id),
  tag_id: integer('tag_id').notNull().references(() => tags.id),
});

export const modVersions = sqliteTable('mod_version', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  mod_id: integer('mod_id').notNull().references(() => mods.id),
  version: text('version').notNull().unique(),
});

export type AuthorRow = typeof authors.$inferSelect;
export type ModRow = typeof mods.$inferSelect;
export type NewModRow = typeof mods.$inferInsert;
export type ModIdStrRow = typeof modidStrs.$inferSelect;
export type TagRow = typeof tags.$inferSelect;
export type ModTagRow = typeof modTags.$inferSelect;
export type ModVersionRow = typeof modVersions.$inferSelect;

export const tableNames = ['author', 'mod', 'modid_str', 'tag', 'mod_tag', 'mod_version'] as const;
export type TableName = typeof tableNames[number];

const sqlList = (values: ReadonlyArray<string>): string => values.map((value) => `'${value}'`).join(', ');

const DDL = `
CREATE TABLE IF NOT EXISTS author (
  id    INTEGER PRIMARY KEY,
  name  TEXT
);

CREATE TABLE IF NOT EXISTS mod (
  id              INTEGER PRIMARY KEY,
  assetid         INTEGER NOT NULL UNIQUE,
  name            TEXT NOT NULL,
  summary         TEXT,
  author_id       INTEGER NOT NULL REFERENCES author(id),
  urlalias        TEXT,
  downloads       INTEGER NOT NULL,
  follows         INTEGER NOT NULL,
  trendingpoints  INTEGER NOT NULL,
  comment_count   INTEGER NOT NULL,
  logo            TEXT,
  side            TEXT NOT NULL CHECK (side IN (${sqlList(installSides)})),
  mod_type        TEXT NOT NULL CHECK (mod_type IN (${sqlList(modTypes)})),
  lastreleased    INTEGER
);

CREATE TABLE IF NOT EXISTS modid_str (
  modid_str  TEXT PRIMARY KEY,
  mod_id     INTEGER NOT NULL REFERENCES mod(id)
);

CREATE TABLE IF NOT EXISTS tag (
  id   INTEGER PRIMARY KEY AUTOINCREMENT,
  tag  TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS mod_tag (
  id      INTEGER PRIMARY KEY AUTOINCREMENT,
  mod_id  INTEGER NOT NULL REFERENCES mod(id),
  tag_id  INTEGER NOT NULL REFERENCES tag(id),
  UNIQUE (mod_id, tag_id)
);

CREATE TABLE IF NOT EXISTS mod_version (
  id       INTEGER PRIMARY KEY AUTOINCREMENT,
  mod_id   INTEGER NOT NULL REFERENCES mod(id),
  version  TEXT NOT NULL UNIQUE
);

CREATE INDEX IF NOT EXISTS idx_mod_author ON mod(author_id);
CREATE INDEX IF NOT EXISTS idx_modid_str_mod ON modid_str(mod_id);
CREATE INDEX IF NOT EXISTS idx_mod_version_mod ON mod_version(mod_id);
`;

export function createTables(sqlite: Database.Database): void {
  sqlite.exec(DDL);
}
