/**
 * In-memory BLE peripheral for tests
 * Records writes and lets callers push notifications.
 */

import { EventEmitter } from 'events';
import {
  CharacteristicProperties,
  ICharacteristic,
  IPeripheral,
  IService,
  PeripheralState,
  normalizeUuid,
} from './interfaces/ITransport';

const NO_PROPERTIES: CharacteristicProperties = {
  read: false,
  write: false,
  writeWithoutResponse: false,
  notify: false,
  indicate: false,
};

export interface MockWrite {
  data: Buffer;
  withResponse: boolean;
}

export class MockCharacteristic extends EventEmitter implements ICharacteristic {
  readonly properties: CharacteristicProperties;
  readonly writes: MockWrite[] = [];
  subscribed = false;
  failWrites: Error | null = null;

  constructor(readonly uuid: string, properties: Partial<CharacteristicProperties> = {}) {
    super();
    this.properties = { ...NO_PROPERTIES, ...properties };
  }

  async write(data: Buffer, withResponse: boolean): Promise<void> {
    if (this.failWrites) throw this.failWrites;
    this.writes.push({ data, withResponse });
  }

  async subscribe(): Promise<void> {
    this.subscribed = true;
  }

  async unsubscribe(): Promise<void> {
    this.subscribed = false;
  }

  /** Simulates a notification from the device. */
  notify(data: Buffer): void {
    this.emit('data', data);
  }
}

export class MockService implements IService {
  constructor(readonly uuid: string, private readonly characteristics: MockCharacteristic[]) {}

  async discoverCharacteristics(): Promise<ICharacteristic[]> {
    return [...this.characteristics];
  }

  async getCharacteristic(uuid: string): Promise<ICharacteristic | null> {
    return this.characteristics.find(c => normalizeUuid(c.uuid) === normalizeUuid(uuid)) ?? null;
  }
}

export class MockPeripheral extends EventEmitter implements IPeripheral {
  readonly address: string;
  readonly rssi = -50;
  private _state: PeripheralState = 'disconnected';

  constructor(readonly id: string, readonly name: string, private readonly services: MockService[]) {
    super();
    this.address = `mock:${id}`;
  }

  get state(): PeripheralState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connected';
  }

  async disconnect(): Promise<void> {
    this._state = 'disconnected';
  }

  async getService(uuid: string): Promise<IService | null> {
    return this.services.find(s => normalizeUuid(s.uuid) === normalizeUuid(uuid)) ?? null;
  }

  /** Simulates the link dropping. */
  drop(): void {
    this._state = 'disconnected';
    this.emit('disconnect');
  }
}
