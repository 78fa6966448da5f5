import { nanoid } from 'nanoid';
import type { Database } from './db';
import { InvalidInputError } from './errors';
import type { OAuthStateRecord, UserRecord } from './models';

export const OAUTH_STATE_TTL_MS = 10 * 60 * 1000;

export interface UserRepository {
  // Throws InvalidInputError when the name is taken.
  create(username: string, passwordHash: string): UserRecord;
  findByUsername(username: string): UserRecord | undefined;
  findById(id: string): UserRecord | undefined;
}

export function createUserRepository(db: Database, now: () => number = Date.now): UserRepository {
  return {
    create(username, passwordHash) {
      db.read();
      if (db.data.users.some((u) => u.username === username)) {
        throw new InvalidInputError('Username already exists');
      }
      const user: UserRecord = { id: nanoid(), username, passwordHash, createdAt: now() };
      db.data.users.push(user);
      db.write();
      return user;
    },

    findByUsername(username) {
      db.read();
      return db.data.users.find((u) => u.username === username);
    },

    findById(id) {
      db.read();
      return db.data.users.find((u) => u.id === id);
    },
  };
}

export interface OAuthStateRepository {
  issue(userId: string): string;
  // Single use: a state is removed on lookup, whether or not it was still valid.
  consume(state: string): OAuthStateRecord | undefined;
}

export function createOAuthStateRepository(db: Database, now: () => number = Date.now): OAuthStateRepository {
  return {
    issue(userId) {
      const state = nanoid(32);
      db.read();
      const cutoff = now() - OAUTH_STATE_TTL_MS;
      db.data.oauthStates = db.data.oauthStates.filter((s) => s.createdAt > cutoff);
      db.data.oauthStates.push({ state, userId, createdAt: now() });
      db.write();
      return state;
    },

    consume(state) {
      db.read();
      const idx = db.data.oauthStates.findIndex((s) => s.state === state);
      if (idx === -1) return undefined;
      const [rec] = db.data.oauthStates.splice(idx, 1);
      db.write();
      if (now() - rec.createdAt > OAUTH_STATE_TTL_MS) return undefined;
      return rec;
    },
  };
}
