/**
 * Lookups over a fetched user roster
 */

import type { UserRecord } from '../../types/index.js';

/**
 * Users whose enrollment id equals `userId` exactly (after trimming the query)
 */
export function findUsersByUserId(users: UserRecord[], userId: string): UserRecord[] {
  const query = userId.trim();
  if (!query) return [];
  return users.filter((user) => user.userId === query);
}

/**
 * Case-insensitive substring match on the display name
 */
export function searchUsersByName(users: UserRecord[], keyword: string): UserRecord[] {
  const query = keyword.trim().toLowerCase();
  if (!query) return [];
  return users.filter((user) => user.name.toLowerCase().includes(query));
}

export function listAdmins(users: UserRecord[]): UserRecord[] {
  return users.filter((user) => user.privilege === 'Admin');
}
