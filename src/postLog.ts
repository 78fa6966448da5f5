import { nanoid } from 'nanoid';
import type { Database } from './db';
import type { PostRecord } from './models';
import { StorageUnavailableError, toError } from './errors';

export type PostEntry = Omit<PostRecord, 'id' | 'createdAt'>;

export interface PostLog {
  record(entry: PostEntry): PostRecord;
  list(userId?: string): PostRecord[];
}

// Append-only: rows are never updated once written.
export function createPostLog(db: Database, now: () => number = Date.now): PostLog {
  return {
    record(entry) {
      const rec: PostRecord = { id: nanoid(), ...entry, createdAt: now() };
      try {
        db.read();
        db.data.posts.push(rec);
        db.write();
      } catch (err) {
        const cause = toError(err);
        throw new StorageUnavailableError(`could not write post log: ${cause.message}`, cause);
      }
      return rec;
    },

    list(userId) {
      db.read();
      return db.data.posts
        .filter((p) => userId === undefined || p.userId === userId)
        .sort((a, b) => b.createdAt - a.createdAt);
    },
  };
}
