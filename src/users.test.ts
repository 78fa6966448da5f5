import { describe, expect, it } from 'vitest';
import { openMemoryDatabase } from './db';
import { InvalidInputError } from './errors';
import { OAUTH_STATE_TTL_MS, createOAuthStateRepository, createUserRepository } from './users';

describe('UserRepository', () => {
  it('creates users and finds them by name or id', () => {
    const users = createUserRepository(openMemoryDatabase(), () => 5);

    const alice = users.create('alice', 'hash');

    expect(alice).toEqual({ id: expect.any(String), username: 'alice', passwordHash: 'hash', createdAt: 5 });
    expect(users.findByUsername('alice')).toEqual(alice);
    expect(users.findById(alice.id)).toEqual(alice);
    expect(users.findByUsername('Alice')).toBeUndefined();
  });

  it('refuses a second user with the same name', () => {
    const db = openMemoryDatabase();
    const users = createUserRepository(db);
    users.create('alice', 'hash-1');

    expect(() => users.create('alice', 'hash-2')).toThrow(InvalidInputError);
    expect(() => users.create('alice', 'hash-2')).toThrow('Username already exists');
    expect(db.data.users).toHaveLength(1);
    expect(users.findByUsername('alice')?.passwordHash).toBe('hash-1');
  });
});

describe('OAuthStateRepository', () => {
  it('returns an issued state once', () => {
    const states = createOAuthStateRepository(openMemoryDatabase(), () => 1000);

    const state = states.issue('u1');

    expect(states.consume(state)).toEqual({ state, userId: 'u1', createdAt: 1000 });
    expect(states.consume(state)).toBeUndefined();
  });

  it('does not honour a state past its lifetime', () => {
    let clock = 1000;
    const db = openMemoryDatabase();
    const states = createOAuthStateRepository(db, () => clock);

    const state = states.issue('u1');
    clock += OAUTH_STATE_TTL_MS + 1;

    expect(states.consume(state)).toBeUndefined();
    expect(db.data.oauthStates).toHaveLength(0);
  });

  it('drops stale states when issuing new ones', () => {
    let clock = 1000;
    const db = openMemoryDatabase();
    const states = createOAuthStateRepository(db, () => clock);

    states.issue('u1');
    clock += OAUTH_STATE_TTL_MS + 1;
    const fresh = states.issue('u2');

    expect(db.data.oauthStates.map((s) => s.state)).toEqual([fresh]);
  });
});
