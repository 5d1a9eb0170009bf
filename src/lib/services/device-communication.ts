/**
 * Device Communication
 *
 * Error taxonomy for talking to devices, plus the session lifecycle shared by
 * every device operation: connect, lock the device, do the work, then unlock
 * and disconnect no matter how the work ended.
 */

import type { DeviceConnector, DeviceSession, DeviceTarget } from '../../types/index.js';

// Error codes for device communication
export const DeviceErrorCodes = {
  CONNECTION_TIMEOUT: 'DEVICE_CONNECTION_TIMEOUT',
  AUTH_FAILED: 'DEVICE_AUTH_FAILED',
  UNREACHABLE: 'DEVICE_UNREACHABLE',
  PROTOCOL_ERROR: 'DEVICE_PROTOCOL_ERROR',
} as const;

export type DeviceErrorCode = typeof DeviceErrorCodes[keyof typeof DeviceErrorCodes];

export interface DeviceError {
  code: DeviceErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type DeviceResult<T> =
  | { success: true; value: T }
  | { success: false; error: DeviceError };

/**
 * Parse error message to determine error code
 */
export function parseErrorCode(message: string): DeviceErrorCode {
  const lowerMessage = message.toLowerCase();

  if (lowerMessage.includes('timeout') || lowerMessage.includes('etimedout')) {
    return DeviceErrorCodes.CONNECTION_TIMEOUT;
  }
  if (lowerMessage.includes('auth') || lowerMessage.includes('password')) {
    return DeviceErrorCodes.AUTH_FAILED;
  }
  if (
    lowerMessage.includes('unreachable') ||
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('ehostunreach') ||
    lowerMessage.includes('enetunreach')
  ) {
    return DeviceErrorCodes.UNREACHABLE;
  }

  return DeviceErrorCodes.PROTOCOL_ERROR;
}

const FRIENDLY_MESSAGES: Record<DeviceErrorCode, string> = {
  [DeviceErrorCodes.CONNECTION_TIMEOUT]: 'Connection timed out. Check that the device is powered on and the IP address is correct.',
  [DeviceErrorCodes.AUTH_FAILED]: 'Authentication failed. Verify the communication key.',
  [DeviceErrorCodes.UNREACHABLE]: 'Device is unreachable. Check the network connection and IP address.',
  [DeviceErrorCodes.PROTOCOL_ERROR]: 'Communication error with the device.',
};

/**
 * Render anything thrown by a protocol client as text. node-zklib often
 * rejects with plain objects rather than Error instances.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error && typeof error === 'object') {
    try {
      return JSON.stringify(error);
    } catch {
      return Object.prototype.toString.call(error);
    }
  }
  return String(error);
}

/**
 * Create a DeviceError from anything thrown during a device operation
 */
export function createDeviceError(error: unknown): DeviceError {
  const original = describeError(error);
  const code = parseErrorCode(original);

  return {
    code,
    message: FRIENDLY_MESSAGES[code],
    details: { originalError: original },
  };
}

/**
 * One-line form of a DeviceError for reports and logs
 */
export function formatDeviceError(error: DeviceError): string {
  const original = error.details?.['originalError'];
  return typeof original === 'string' && original !== '' ? `${error.message} (${original})` : error.message;
}

export interface SessionOptions {
  /**
   * Disable the device for the duration of `work` (default true). Live
   * capture runs unlocked, since a disabled terminal takes no punches.
   */
  lockDevice?: boolean;
}

/**
 * Open a session, lock the device, run `work`, then always unlock and
 * disconnect. Release steps are best-effort: their failures are logged and
 * never replace the outcome of `work`.
 */
export async function withDeviceSession<T>(
  connect: DeviceConnector,
  target: DeviceTarget,
  work: (session: DeviceSession) => Promise<T>,
  options: SessionOptions = {}
): Promise<DeviceResult<T>> {
  const lockDevice = options.lockDevice ?? true;

  let session: DeviceSession;
  try {
    session = await connect(target);
  } catch (error) {
    return { success: false, error: createDeviceError(error) };
  }

  try {
    if (lockDevice) {
      await session.disable();
    }
    const value = await work(session);
    return { success: true, value };
  } catch (error) {
    return { success: false, error: createDeviceError(error) };
  } finally {
    await releaseSession(session, target.ip, lockDevice);
  }
}

async function releaseSession(session: DeviceSession, ip: string, unlock: boolean): Promise<void> {
  if (unlock) {
    try {
      await session.enable();
    } catch (error) {
      console.warn(`[DeviceCommunication] Could not re-enable ${ip}: ${describeError(error)}`);
    }
  }
  try {
    await session.disconnect();
  } catch (error) {
    console.warn(`[DeviceCommunication] Could not disconnect ${ip}: ${describeError(error)}`);
  }
}
