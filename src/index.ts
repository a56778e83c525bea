export {
  ModDbFetcher,
} from './dataProviders/modDb';
export {
  modDbModSchema, modDbAuthorSchema, installSides, modTypes,
} from './dataProviders/types';
export type {
  ModDbMod, ModDbAuthor, InstallSide, ModType,
} from './dataProviders/types';
export {
  mapMod, indexAuthorsByName,
} from './mapper';
export type {
  NormalizedMod, MappedMod, AuthorIndex,
} from './mapper';
export {
  encodeTimestamp, decodeTimestamp, parseReleaseDate,
} from './timestamp';
export type {
  TimestampInput,
} from './timestamp';
export {
  ModStore,
} from './db/store';
export type {
  ModRecord, RowCounts,
} from './db/store';
export {
  authors, mods, modidStrs, tags, modTags, modVersions, createTables, tableNames,
} from './db/schema';
export type {
  AuthorRow, ModRow, ModIdStrRow, TagRow, ModTagRow, ModVersionRow, TableName,
} from './db/schema';
export {
  loadMod, loadMods, run,
} from './loader';
export type {
  LoadSummary,
} from './loader';
export {
  describeAuthor, describeMod,
} from './report';
export {
  defaultConfig, resolveConfig,
} from './config';
export type {
  FetcherConfig, ModIndexConfig,
} from './config';
export * from './errors';
export {
  addLogger, removeLogger, LogLevel, consoleLogger,
} from './logging';
export type {
  Logger,
} from './logging';
export {
  setDebug, isDebug,
} from './utils';
