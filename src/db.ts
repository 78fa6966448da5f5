import { LowSync, MemorySync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { dirname, resolve } from 'path';
import { existsSync, mkdirSync } from 'fs';
import type { DBSchema } from './models';

export type Database = LowSync<DBSchema>;

export function emptySchema(): DBSchema {
  return { users: [], tokens: [], posts: [], oauthStates: [] };
}

// store JSON at `file` (relative paths resolve against the working directory)
export function openDatabase(file: string): Database {
  const path = resolve(process.cwd(), file);
  const dataDir = dirname(path);
  if (!existsSync(dataDir)) mkdirSync(dataDir, { recursive: true });

  const db = new LowSync<DBSchema>(new JSONFileSync<DBSchema>(path), emptySchema());
  db.read();
  // older files may predate a collection
  db.data = { ...emptySchema(), ...db.data };
  db.write();
  return db;
}

export function openMemoryDatabase(): Database {
  const db = new LowSync<DBSchema>(new MemorySync<DBSchema>(), emptySchema());
  db.read();
  return db;
}
