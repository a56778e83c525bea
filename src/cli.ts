#!/usr/bin/env node
import fs from 'fs';
import { addLogger, consoleLogger, info, error } from './logging';
import { resolveConfig } from './config';
import type { ModIndexConfig } from './config';
import { run } from './loader';
import { ModStore } from './db/store';
import { describeAuthor } from './report';

function showAuthor(databaseFile: string, name: string): number {
  if (!fs.existsSync(databaseFile)) {
    error(`Database ${databaseFile} does not exist yet. Run without arguments first.`);
    return 1;
  }
  const store = ModStore.open(databaseFile);
  try {
    const lines = describeAuthor(store, name);
    if (!lines) {
      error(`No author named ${name}`);
      return 1;
    }
    lines.forEach((line) => info(line));
    return 0;
  } finally {
    store.close();
  }
}

export async function main(argv: Array<string>, config: ModIndexConfig = resolveConfig()): Promise<number> {
  const [command, ...args] = argv;
  if (command === undefined) {
    const summary = await run(config);
    info(`Done. ${summary.mods} mods processed.`);
    return 0;
  }
  if (command === 'author' && args.length === 1) {
    return showAuthor(config.databaseFile, args[0]);
  }
  error('Usage: vs-mod-index [author <name>]');
  return 1;
}

if (require.main === module) {
  addLogger(consoleLogger);
  main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  }, (e) => {
    error(e);
    process.exitCode = 1;
  });
}
