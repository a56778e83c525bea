import path from 'path';
import fs from 'fs';

export function ensureExists(folder: string): void {
  fs.mkdirSync(folder, { recursive: true });
}

// src/ and dist/ both sit one level below the package root
export const packageDir = path.resolve(__dirname, '..');

export const modsCacheFile = path.join(packageDir, 'mods.json');
export const authorsCacheFile = path.join(packageDir, 'authors.json');
export const databaseFile = path.join(packageDir, 'vintage_story_mods.sqlite3');
