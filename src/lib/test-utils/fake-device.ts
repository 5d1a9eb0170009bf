/**
 * In-process DeviceSession stand-in for engine tests
 */

import type {
  AttendanceEventRaw,
  DeviceConnector,
  DeviceDescriptor,
  DeviceSession,
  DeviceTarget,
  DeviceUserInput,
  LiveCaptureItem,
  LiveCaptureStream,
  UserRecordRaw,
} from '../../types/index.js';

export type FakeDeviceStep =
  | 'disable'
  | 'enable'
  | 'getUsers'
  | 'getAttendance'
  | 'liveCapture'
  | 'setUser'
  | 'deleteUser'
  | 'disconnect';

export interface FakeDeviceOptions {
  users?: UserRecordRaw[];
  attendance?: AttendanceEventRaw[];
  /** Items served by the live stream, after which it reports `closed` */
  liveItems?: LiveCaptureItem[];
  /** Steps that reject with the given error */
  failures?: Partial<Record<FakeDeviceStep, unknown>>;
}

/**
 * Serves a fixed script of items; `closed` once exhausted or closed
 */
export class ScriptedLiveStream implements LiveCaptureStream {
  pulls = 0;
  closeCount = 0;
  private readonly items: LiveCaptureItem[];
  private closed = false;

  constructor(items: LiveCaptureItem[]) {
    this.items = [...items];
  }

  async next(): Promise<LiveCaptureItem> {
    this.pulls++;
    if (this.closed) return { kind: 'closed' };
    return this.items.shift() ?? { kind: 'closed' };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.closeCount++;
  }
}

export class FakeDeviceSession implements DeviceSession {
  /** Every session call in order */
  readonly calls: FakeDeviceStep[] = [];
  readonly writtenUsers: DeviceUserInput[] = [];
  users: UserRecordRaw[];
  attendance: AttendanceEventRaw[];
  liveStream: ScriptedLiveStream | null = null;
  private readonly liveItems: LiveCaptureItem[];
  private readonly failures: Partial<Record<FakeDeviceStep, unknown>>;

  constructor(options: FakeDeviceOptions = {}) {
    this.users = [...(options.users ?? [])];
    this.attendance = [...(options.attendance ?? [])];
    this.liveItems = options.liveItems ?? [];
    this.failures = options.failures ?? {};
  }

  private step(name: FakeDeviceStep): void {
    this.calls.push(name);
    if (name in this.failures) {
      throw this.failures[name];
    }
  }

  async disable(): Promise<void> {
    this.step('disable');
  }

  async enable(): Promise<void> {
    this.step('enable');
  }

  async getUsers(): Promise<UserRecordRaw[]> {
    this.step('getUsers');
    return [...this.users];
  }

  async getAttendance(): Promise<AttendanceEventRaw[]> {
    this.step('getAttendance');
    return [...this.attendance];
  }

  async liveCapture(_readTimeoutMs: number): Promise<LiveCaptureStream> {
    this.step('liveCapture');
    this.liveStream = new ScriptedLiveStream(this.liveItems);
    return this.liveStream;
  }

  async setUser(user: DeviceUserInput): Promise<void> {
    this.step('setUser');
    this.writtenUsers.push(user);
    this.users = this.users.filter((existing) => existing.uid !== user.uid);
    this.users.push({
      uid: user.uid,
      userId: user.userId,
      name: user.name,
      privilege: user.privilege === 'Admin' ? 14 : 0,
      password: user.password ?? '',
      groupId: user.groupId ?? '',
      card: user.card ?? 0,
    });
  }

  async deleteUser(uid: number): Promise<void> {
    this.step('deleteUser');
    this.users = this.users.filter((existing) => existing.uid !== uid);
  }

  async disconnect(): Promise<void> {
    this.step('disconnect');
  }
}

export interface FakeFleet {
  connect: DeviceConnector;
  /** Targets in the order connections were attempted */
  targets: DeviceTarget[];
}

/**
 * Connector over a map of ip → session. An ip mapped to anything other
 * than a session (or missing) fails to connect with that value.
 */
export function createFakeFleet(devices: Record<string, unknown>): FakeFleet {
  const targets: DeviceTarget[] = [];
  const connect: DeviceConnector = async (target) => {
    targets.push(target);
    const entry = devices[target.ip];
    if (entry instanceof FakeDeviceSession) {
      return entry;
    }
    throw entry ?? new Error(`connect ECONNREFUSED ${target.ip}:${target.port}`);
  };
  return { connect, targets };
}

export function fakeDescriptor(ip: string, name = `Device ${ip}`): DeviceDescriptor {
  return { ip, name, location: '', status: 'active', dateInstalled: '', dateExpired: '', notes: '' };
}
