/**
 * Name Resolver
 *
 * Attendance events may carry either the device's numeric uid or the
 * enrollment user id, so every user is indexed under both.
 */

import type { AttendanceEvent, AttributedEvent, UserRecord } from '../../types/index.js';

export class NameResolver {
  private readonly names = new Map<string, string>();
  private readonly uids = new Map<string, number>();

  /**
   * Build an index from normalized users. On key collisions the later user wins.
   */
  static build(users: Iterable<UserRecord>): NameResolver {
    const resolver = new NameResolver();
    for (const user of users) {
      resolver.register(String(user.uid), user.name);
      resolver.register(user.userId, user.name);
      if (user.userId) {
        resolver.uids.set(user.userId, user.uid);
      }
    }
    return resolver;
  }

  private register(key: string, name: string): void {
    if (key) {
      this.names.set(key, name);
    }
  }

  /**
   * Look up a display name: uid key first, then user id. Returns '' if
   * neither yields a name. A null uid goes straight to the user id.
   */
  resolve(uid: number | string | null, userId: string): string {
    const byUid = uid === null ? undefined : this.names.get(String(uid));
    return byUid || this.names.get(userId) || '';
  }

  /**
   * Device uid of the user enrolled under `userId`
   */
  uidFor(userId: string): number | undefined {
    return this.uids.get(userId);
  }

  /**
   * Settle a punch against the roster. A uid the device did not send is
   * taken from the user enrolled under the punch's user id (0 if none) and
   * never used as a lookup key.
   */
  attribute(event: AttendanceEvent): AttributedEvent {
    return {
      ...event,
      uid: event.uid ?? this.uidFor(event.userId) ?? 0,
      name: this.resolve(event.uid, event.userId),
    };
  }

  get size(): number {
    return this.names.size;
  }
}
