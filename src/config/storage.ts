import fs from 'fs';
import path from 'path';

export interface StorageLayout {
  root: string;
  uploads: string;
  converted: string;
  temp: string;
  settingsFile: string;
}

export function resolveStorageLayout(root = 'storage'): StorageLayout {
  const base = path.resolve(process.cwd(), root);
  return {
    root: base,
    uploads: path.join(base, 'uploads'),
    converted: path.join(base, 'converted'),
    temp: path.join(base, 'temp'),
    settingsFile: path.join(base, 'settings.json')
  };
}

export async function ensureStorageDirectories(layout: StorageLayout): Promise<void> {
  await Promise.all([
    fs.promises.mkdir(layout.root, { recursive: true }),
    fs.promises.mkdir(layout.uploads, { recursive: true }),
    fs.promises.mkdir(layout.converted, { recursive: true }),
    fs.promises.mkdir(layout.temp, { recursive: true })
  ]);
}
