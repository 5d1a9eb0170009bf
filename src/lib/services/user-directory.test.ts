import { describe, it, expect } from 'vitest';
import { findUsersByUserId, listAdmins, searchUsersByName } from './user-directory.js';
import type { UserRecord } from '../../types/index.js';

function user(uid: number, userId: string, name: string, privilege: UserRecord['privilege'] = 'Default'): UserRecord {
  return { uid, userId, name, privilege, password: '', groupId: '', card: 0 };
}

const users = [
  user(1, '1001', 'Alice Nguyen', 'Admin'),
  user(2, '1002', 'Bob Stone'),
  user(3, '10021', 'alicia keys'),
  user(4, '1004', ''),
];

describe('user directory', () => {
  it('finds users by exact user id', () => {
    expect(findUsersByUserId(users, ' 1002 ').map((u) => u.uid)).toEqual([2]);
    expect(findUsersByUserId(users, '100')).toEqual([]);
    expect(findUsersByUserId(users, '')).toEqual([]);
  });

  it('searches names case-insensitively by keyword', () => {
    expect(searchUsersByName(users, 'ALIC').map((u) => u.uid)).toEqual([1, 3]);
    expect(searchUsersByName(users, 'stone').map((u) => u.uid)).toEqual([2]);
    expect(searchUsersByName(users, '   ')).toEqual([]);
  });

  it('lists administrators', () => {
    expect(listAdmins(users).map((u) => u.uid)).toEqual([1]);
  });
});
