import { AuthorNotFoundError } from './errors';
import type {
  ModDbMod, ModDbAuthor, InstallSide, ModType,
} from './dataProviders/types';
import type { TimestampInput } from './timestamp';

export interface NormalizedMod {
  id: number;
  assetid: number;
  name: string;
  summary: string | null;
  urlalias: string | null;
  downloads: number;
  follows: number;
  trendingpoints: number;
  comment_count: number;
  logo: string | null;
  side: InstallSide;
  mod_type: ModType;
  lastreleased: TimestampInput;
}

export interface MappedMod {
  mod: NormalizedMod;
  author: ModDbAuthor;
  modidStrs: Array<string>;
  tags: Array<string>;
}

export type AuthorIndex = Map<string, ModDbAuthor>;

export function indexAuthorsByName(authors: Array<ModDbAuthor>): AuthorIndex {
  const index: AuthorIndex = new Map();
  authors.forEach((author) => {
    if (author.name !== null) {
      index.set(author.name, author);
    }
  });
  return index;
}

export function mapMod(raw: ModDbMod, authorsByName: AuthorIndex): MappedMod {
  const {
    modidstrs = [], tags = [], author: authorName, modid, comments, type, ...fields
  } = raw;
  const author = authorsByName.get(authorName);
  if (!author) {
    throw new AuthorNotFoundError(`Author "${authorName}" of mod ${modid} is not in the authors collection`, authorName, modid);
  }
  return {
    mod: {
      id: modid,
      assetid: fields.assetid,
      name: fields.name,
      summary: fields.summary ?? null,
      urlalias: fields.urlalias ?? null,
      downloads: fields.downloads,
      follows: fields.follows,
      trendingpoints: fields.trendingpoints,
      comment_count: comments,
      logo: fields.logo ?? null,
      side: fields.side,
      mod_type: type,
      lastreleased: fields.lastreleased,
    },
    author,
    modidStrs: modidstrs,
    tags,
  };
}
