import { format } from 'date-fns';
import type { ModStore, ModRecord } from './db/store';
import { RELEASE_DATE_FORMAT } from './timestamp';

type Printable = string | number | Date | null;

function formatValue(value: Printable): string {
  if (value instanceof Date) {
    return format(value, RELEASE_DATE_FORMAT);
  }
  return String(value);
}

export function describeRecord(kind: string, attrs: Array<[string, Printable]>): string {
  return `${kind}(${attrs.map(([key, value]) => `${key}=${formatValue(value)}`).join(', ')})`;
}

export function describeMod(mod: ModRecord): string {
  return describeRecord('Mod', [
    ['id', mod.id],
    ['assetid', mod.assetid],
    ['name', mod.name],
    ['summary', mod.summary],
    ['urlalias', mod.urlalias],
    ['downloads', mod.downloads],
    ['follows', mod.follows],
    ['trendingpoints', mod.trendingpoints],
    ['comment_count', mod.comment_count],
    ['logo', mod.logo],
    ['side', mod.side],
    ['mod_type', mod.mod_type],
    ['lastreleased', mod.lastreleased],
  ]);
}

/**
 * Lines describing every stored mod of the named author, with the author
 * itself last. Undefined when no author has that name.
 */
export function describeAuthor(store: ModStore, name: string): Array<string> | undefined {
  const author = store.findAuthorByName(name);
  if (!author) {
    return undefined;
  }
  const lines: Array<string> = [];
  store.getModsByAuthor(author.id).forEach((mod) => {
    lines.push(describeMod(mod));
    store.getModVersions(mod.id).forEach((version) => lines.push(`  ${describeRecord('ModVersion', [['version', version]])}`));
    store.getModTags(mod.id).forEach((tag) => lines.push(`  ${describeRecord('Tag', [['tag', tag.tag]])}`));
    store.getModIdStrs(mod.id).forEach((modidStr) => lines.push(`  ${describeRecord('ModIdStr', [['modid_str', modidStr], ['mod_id', mod.id]])}`));
  });
  lines.push(describeRecord('Author', [['id', author.id], ['name', author.name]]));
  return lines;
}
