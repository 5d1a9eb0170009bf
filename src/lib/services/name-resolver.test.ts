import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { NameResolver } from './name-resolver.js';
import { normalizeUser } from './record-normalizer.js';
import type { UserRecord } from '../../types/index.js';

function user(uid: number, userId: string, name: string): UserRecord {
  return { ...normalizeUser({}), uid, userId, name };
}

describe('NameResolver', () => {
  it('resolves by uid first, then by user id', () => {
    const resolver = NameResolver.build([user(1, '1001', 'Alice'), user(2, '1002', 'Bob')]);

    expect(resolver.resolve(1, 'unknown')).toBe('Alice');
    expect(resolver.resolve(0, '1002')).toBe('Bob');
    expect(resolver.resolve('2', '')).toBe('Bob');
    expect(resolver.resolve(99, 'nobody')).toBe('');
  });

  it('skips the uid key when the punch carries no uid', () => {
    const resolver = NameResolver.build([user(0, '1003', 'Carol'), user(2, '1002', 'Bob')]);

    expect(resolver.resolve(null, '1002')).toBe('Bob');
    expect(resolver.resolve(null, '1009')).toBe('');
    expect(resolver.resolve(0, '1009')).toBe('Carol');
  });

  it('attributes a punch by filling a missing uid from the roster', () => {
    const resolver = NameResolver.build([user(0, '1003', 'Carol'), user(2, '1002', 'Bob')]);
    const punch = { uid: null, userId: '1002', timestamp: '2024-03-01 08:00:00', status: 0, punch: 0 };

    expect(resolver.attribute(punch)).toEqual({ ...punch, uid: 2, name: 'Bob' });
    expect(resolver.attribute({ ...punch, userId: '1009' })).toEqual({ ...punch, userId: '1009', uid: 0, name: '' });
    expect(resolver.attribute({ ...punch, uid: 7 })).toEqual({ ...punch, uid: 7, name: 'Bob' });
    expect(resolver.uidFor('1003')).toBe(0);
  });

  it('falls back to the user id when the uid maps to an empty name', () => {
    const resolver = NameResolver.build([user(5, '', ''), user(6, 'E6', 'Dana')]);
    expect(resolver.resolve(5, 'E6')).toBe('Dana');
  });

  it('lets the later user win a key collision', () => {
    // uid 1 of the second user collides with user id "1" of the first
    const resolver = NameResolver.build([user(7, '1', 'First'), user(1, '2001', 'Second')]);
    expect(resolver.resolve(1, '')).toBe('Second');
    expect(resolver.size).toBe(3);
  });

  it('skips empty keys', () => {
    expect(NameResolver.build([user(3, '', 'Eve')]).size).toBe(1);
  });

  it('succeeds whenever either key is registered', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 1000 }),
        fc.stringMatching(/^[A-Z][0-9]{1,5}$/),
        fc.string({ minLength: 1, maxLength: 10 }),
        fc.boolean(),
        (uid, userId, name, viaUid) => {
          const resolver = NameResolver.build([user(uid, userId, name)]);
          const resolved = viaUid ? resolver.resolve(uid, 'missing') : resolver.resolve(-1, userId);
          expect(resolved).toBe(name);
        }
      )
    );
  });
});
