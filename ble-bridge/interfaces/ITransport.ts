/**
 * BLE Transport Interface
 * Platform-agnostic abstraction for the BLE operations the bridge needs
 */

import { EventEmitter } from 'events';

// ─────────────────────────────────────────────────────────────────────────────
// Characteristic Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface CharacteristicProperties {
  read: boolean;
  write: boolean;
  writeWithoutResponse: boolean;
  notify: boolean;
  indicate: boolean;
}

export interface ICharacteristic extends EventEmitter {
  readonly uuid: string;
  readonly properties: CharacteristicProperties;

  write(data: Buffer, withResponse: boolean): Promise<void>;
  subscribe(): Promise<void>;
  unsubscribe(): Promise<void>;

  // Events: 'data' (Buffer)
}

// ─────────────────────────────────────────────────────────────────────────────
// Service Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface IService {
  readonly uuid: string;

  discoverCharacteristics(): Promise<ICharacteristic[]>;
  getCharacteristic(uuid: string): Promise<ICharacteristic | null>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Peripheral Interface
// ─────────────────────────────────────────────────────────────────────────────

export type PeripheralState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting' | 'error';

export interface IPeripheral extends EventEmitter {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  readonly rssi: number;
  readonly state: PeripheralState;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  getService(uuid: string): Promise<IService | null>;

  // Events: 'disconnect'
}

// ─────────────────────────────────────────────────────────────────────────────
// Discovered Device Info
// ─────────────────────────────────────────────────────────────────────────────

export interface DiscoveredDevice {
  id: string;
  name: string;
  address: string;
  rssi: number;
  serviceUuids: string[];
}

/** Decides whether an advertisement belongs to the device being looked for. */
export type DeviceFilter = (device: DiscoveredDevice) => boolean;

// ─────────────────────────────────────────────────────────────────────────────
// Transport Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface ITransport extends EventEmitter {
  readonly isInitialized: boolean;
  readonly isScanning: boolean;

  // Lifecycle
  initialize(): Promise<void>;
  cleanup(): Promise<void>;

  // Discovery
  findDevice(filter: DeviceFilter, timeoutMs: number): Promise<IPeripheral | null>;
  scan(durationMs: number): Promise<DiscoveredDevice[]>;

  // Events:
  // 'deviceDiscovered' (DiscoveredDevice)
  // 'scanStarted'
  // 'scanStopped'
}

/** Noble reports UUIDs lower-case without dashes. */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}
