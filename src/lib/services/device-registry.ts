/**
 * Device Registry
 *
 * Loads the static fleet list from `devices.json`. Accepts either
 * `{ "devices": [...] }` or a bare array. Any invalid input is fatal for
 * the run and raised as RegistryError.
 */

import { readFile } from 'node:fs/promises';
import type { DeviceDescriptor } from '../../types/index.js';

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textField(entry: Record<string, unknown>, key: string): string {
  const value = entry[key];
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : String(value);
}

function optionalInteger(entry: Record<string, unknown>, key: string, index: number): number | undefined {
  const value = entry[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return parseInt(value, 10);
  throw new RegistryError(`Device #${index + 1}: "${key}" must be a non-negative integer`);
}

function parseEntry(entry: unknown, index: number): DeviceDescriptor {
  if (!isRecord(entry)) {
    throw new RegistryError(`Device #${index + 1} is not an object`);
  }

  const ip = entry['ip'];
  if (typeof ip !== 'string' || ip.trim() === '') {
    throw new RegistryError(`Device #${index + 1} has no ip`);
  }

  const device: DeviceDescriptor = {
    ip: ip.trim(),
    name: textField(entry, 'name'),
    location: textField(entry, 'location'),
    status: textField(entry, 'status'),
    dateInstalled: textField(entry, 'date_installed'),
    dateExpired: textField(entry, 'date_expired'),
    notes: textField(entry, 'notes'),
  };

  const port = optionalInteger(entry, 'port', index);
  if (port !== undefined) device.port = port;
  const password = optionalInteger(entry, 'password', index);
  if (password !== undefined) device.password = password;

  return device;
}

/**
 * Validate parsed registry JSON
 */
export function parseDeviceRegistry(json: unknown): DeviceDescriptor[] {
  let entries: unknown;
  if (Array.isArray(json)) {
    entries = json;
  } else if (isRecord(json)) {
    entries = json['devices'];
  }

  if (!Array.isArray(entries)) {
    throw new RegistryError('Registry has no "devices" list');
  }

  const devices: DeviceDescriptor[] = [];
  const seen = new Set<string>();
  entries.forEach((entry: unknown, index) => {
    const device = parseEntry(entry, index);
    if (seen.has(device.ip)) {
      throw new RegistryError(`Duplicate device ip ${device.ip}`);
    }
    seen.add(device.ip);
    devices.push(device);
  });

  return devices;
}

export async function loadDeviceRegistry(filePath: string): Promise<DeviceDescriptor[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new RegistryError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new RegistryError(`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const devices = parseDeviceRegistry(json);
  console.log(`[registry] Loaded ${devices.length} devices from ${filePath}`);
  return devices;
}

export function findDevice(devices: DeviceDescriptor[], ip: string): DeviceDescriptor | undefined {
  return devices.find((device) => device.ip === ip);
}
