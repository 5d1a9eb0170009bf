declare module 'node-zklib' {
  interface User {
    uid: number;
    role: number;
    password: string;
    name: string;
    cardno: number;
    userId: string;
  }

  interface Attendance {
    userSn: number;
    deviceUserId: string;
    recordTime: Date;
    ip?: string;
  }

  interface RealTimeLog {
    userId: string;
    attTime: Date;
  }

  interface ZKLibTransport {
    sessionId: number | null;
  }

  class ZKLib {
    constructor(ip: string, port: number, timeout?: number, inport?: number);
    connectionType: 'tcp' | 'udp' | null;
    zklibTcp: ZKLibTransport;
    zklibUdp: ZKLibTransport;
    createSocket(cbErr?: (error: unknown) => void, cbClose?: (type: string) => void): Promise<boolean>;
    getUsers(): Promise<{ data: User[] }>;
    getAttendances(cb?: (percent: number, total: number) => void): Promise<{ data: Attendance[]; err?: unknown }>;
    getRealTimeLogs(cb: (log: RealTimeLog) => void): Promise<void>;
    executeCmd(command: number, data?: Buffer | string): Promise<Buffer>;
    disconnect(): Promise<void>;
  }

  export = ZKLib;
}
