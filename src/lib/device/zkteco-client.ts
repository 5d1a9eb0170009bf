/**
 * ZKTeco device client
 * DeviceSession over node-zklib for ZKTeco-family terminals (port 4370)
 */

import ZKLib from 'node-zklib';
import type {
  AttendanceEventRaw,
  DeviceSession,
  DeviceTarget,
  DeviceUserInput,
  LiveCaptureStream,
  UserRecordRaw,
} from '../../types/index.js';
import { ADMIN_PRIVILEGE_LEVEL } from '../services/record-normalizer.js';
import { PushLiveCaptureStream } from './live-capture-stream.js';

// Protocol command ids not wrapped by node-zklib
export const ZKCommands = {
  CMD_USER_WRQ: 8,
  CMD_DELETE_USER: 18,
  CMD_ENABLEDEVICE: 1002,
  CMD_DISABLEDEVICE: 1003,
  CMD_REFRESHDATA: 1013,
  CMD_AUTH: 1102,
} as const;

export const USER_PACKET_SIZE = 72;

/**
 * Scramble the numeric comm key with the session id, as the device expects
 * in CMD_AUTH
 */
export function makeCommKey(key: number, sessionId: number, ticks = 50): number {
  let k = 0;
  for (let i = 0; i < 32; i++) {
    k = key & (1 << i) ? (k << 1) | 1 : k << 1;
  }
  k = (k + sessionId) >>> 0;

  const buf = Buffer.alloc(4);
  buf.writeUInt32LE(k, 0);

  const b0 = buf.readUInt8(0) ^ 'Z'.charCodeAt(0);
  const b1 = buf.readUInt8(1) ^ 'K'.charCodeAt(0);
  const b2 = buf.readUInt8(2) ^ 'S'.charCodeAt(0);
  const b3 = buf.readUInt8(3) ^ 'O'.charCodeAt(0);

  // swap the two 16-bit halves, then mix in the tick byte
  const B = ticks & 0xff;
  buf.writeUInt8(b2 ^ B, 0);
  buf.writeUInt8(b3 ^ B, 1);
  buf.writeUInt8(B, 2);
  buf.writeUInt8(b1 ^ B, 3);

  return buf.readUInt32LE(0);
}

function writeFixedString(packet: Buffer, value: string, offset: number, length: number): void {
  packet.write(value.slice(0, length), offset, length, 'utf8');
}

/**
 * Encode a user for CMD_USER_WRQ (72-byte layout)
 */
export function encodeUserPacket(user: DeviceUserInput): Buffer {
  const packet = Buffer.alloc(USER_PACKET_SIZE);
  const userId = user.userId || String(user.uid);

  packet.writeUInt16LE(user.uid, 0);
  packet.writeUInt8(user.privilege === 'Admin' ? ADMIN_PRIVILEGE_LEVEL : 0, 2);
  writeFixedString(packet, user.password ?? '', 3, 8);
  writeFixedString(packet, user.name, 11, 24);
  packet.writeUInt32LE(user.card ?? 0, 35);
  writeFixedString(packet, user.groupId ?? '', 40, 7);
  writeFixedString(packet, userId, 48, 24);

  return packet;
}

export class ZKTecoClient implements DeviceSession {
  private liveStream: PushLiveCaptureStream | null = null;

  private constructor(
    private readonly zk: ZKLib,
    private readonly target: DeviceTarget
  ) {}

  /**
   * Open a socket to the device and authenticate when a comm key is set.
   * Matches the DeviceConnector signature.
   */
  static async connect(target: DeviceTarget): Promise<ZKTecoClient> {
    const zk = new ZKLib(target.ip, target.port, target.timeoutMs, target.inport);
    let client: ZKTecoClient | null = null;

    await zk.createSocket(
      (error) => {
        console.warn(`[ZKTecoClient] Socket error on ${target.ip}:`, error);
      },
      () => {
        client?.liveStream?.end();
      }
    );
    client = new ZKTecoClient(zk, target);

    if (target.password !== 0) {
      try {
        await client.authenticate();
      } catch (error) {
        await zk.disconnect().catch((disconnectError: unknown) => {
          console.warn(`[ZKTecoClient] Disconnect after failed auth on ${target.ip}:`, disconnectError);
        });
        throw error;
      }
    }

    console.log(`[ZKTecoClient] Connected to ${target.ip}:${target.port} via ${zk.connectionType ?? 'unknown'}`);
    return client;
  }

  private sessionId(): number {
    const transport = this.zk.connectionType === 'udp' ? this.zk.zklibUdp : this.zk.zklibTcp;
    return transport.sessionId ?? 0;
  }

  private async authenticate(): Promise<void> {
    const key = Buffer.alloc(4);
    key.writeUInt32LE(makeCommKey(this.target.password, this.sessionId()), 0);
    try {
      await this.zk.executeCmd(ZKCommands.CMD_AUTH, key);
    } catch (error) {
      throw new Error(`Authentication failed: ${error instanceof Error ? error.message : JSON.stringify(error)}`);
    }
  }

  async disable(): Promise<void> {
    await this.zk.executeCmd(ZKCommands.CMD_DISABLEDEVICE, Buffer.from([0, 0, 0, 0]));
  }

  async enable(): Promise<void> {
    await this.zk.executeCmd(ZKCommands.CMD_ENABLEDEVICE, '');
  }

  async getUsers(): Promise<UserRecordRaw[]> {
    const result = await this.zk.getUsers();
    return (result.data ?? []).map((user) => ({
      uid: user.uid,
      userId: user.userId,
      name: user.name,
      privilege: user.role,
      password: user.password,
      card: user.cardno,
    }));
  }

  /**
   * node-zklib's 40-byte decoder yields no uid or state; `userSn` is a
   * record counter, so names resolve through the user id.
   */
  async getAttendance(): Promise<AttendanceEventRaw[]> {
    const result = await this.zk.getAttendances();
    if (result.err) {
      throw result.err;
    }
    return (result.data ?? []).map((log) => ({
      userId: log.deviceUserId,
      timestamp: log.recordTime,
    }));
  }

  async liveCapture(readTimeoutMs: number): Promise<LiveCaptureStream> {
    if (this.liveStream) {
      throw new Error(`Live capture already running on ${this.target.ip}`);
    }

    const stream = new PushLiveCaptureStream(readTimeoutMs, async () => {
      this.liveStream = null;
    });
    this.liveStream = stream;

    await this.zk.getRealTimeLogs((log) => {
      stream.push({ userId: log.userId, timestamp: log.attTime });
    });
    return stream;
  }

  async setUser(user: DeviceUserInput): Promise<void> {
    await this.zk.executeCmd(ZKCommands.CMD_USER_WRQ, encodeUserPacket(user));
    await this.refresh();
  }

  async deleteUser(uid: number): Promise<void> {
    const data = Buffer.alloc(2);
    data.writeUInt16LE(uid, 0);
    await this.zk.executeCmd(ZKCommands.CMD_DELETE_USER, data);
    await this.refresh();
  }

  private async refresh(): Promise<void> {
    await this.zk.executeCmd(ZKCommands.CMD_REFRESHDATA, '');
  }

  async disconnect(): Promise<void> {
    this.liveStream?.end();
    this.liveStream = null;
    await this.zk.disconnect();
  }
}
