/**
 * Noble Transport Implementation
 * Wraps @abandonware/noble behind the ITransport / IPeripheral / IService /
 * ICharacteristic interfaces so the sensor and UART adapters never touch
 * Noble directly.
 */

import { EventEmitter } from 'events';
import type { Characteristic, Peripheral, Service } from '@abandonware/noble';
import {
  ITransport,
  IPeripheral,
  IService,
  ICharacteristic,
  PeripheralState,
  DiscoveredDevice,
  DeviceFilter,
  CharacteristicProperties,
  normalizeUuid,
} from '../interfaces/ITransport';
import { BLE_CONFIG } from '../BleBridgeConstants';
import { BridgeError, BridgeErrorCode } from '../../signalProcessing/errors';
import { bridgeLogger } from '../../shared/BridgeLogger';

type NobleModule = typeof import('@abandonware/noble');

// Noble will be dynamically loaded (its native bindings probe the adapter on import)
let noble: NobleModule | null = null;

// ─────────────────────────────────────────────────────────────────────────────
// Noble Characteristic Adapter
// ─────────────────────────────────────────────────────────────────────────────

class NobleCharacteristic extends EventEmitter implements ICharacteristic {
  readonly uuid: string;
  readonly properties: CharacteristicProperties;

  constructor(private nobleChar: Characteristic) {
    super();
    this.uuid = nobleChar.uuid;
    const props = nobleChar.properties ?? [];
    this.properties = {
      read: props.includes('read'),
      write: props.includes('write'),
      writeWithoutResponse: props.includes('writeWithoutResponse'),
      notify: props.includes('notify'),
      indicate: props.includes('indicate'),
    };

    // Forward notifications from the native characteristic
    this.nobleChar.on('data', (data: Buffer) => {
      this.emit('data', data);
    });
  }

  async write(data: Buffer, withResponse: boolean): Promise<void> {
    // Noble's second argument is withoutResponse
    await this.nobleChar.writeAsync(data, !withResponse);
  }

  async subscribe(): Promise<void> {
    await this.nobleChar.subscribeAsync();
  }

  async unsubscribe(): Promise<void> {
    await this.nobleChar.unsubscribeAsync();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Service Adapter
// ─────────────────────────────────────────────────────────────────────────────

class NobleService implements IService {
  readonly uuid: string;
  private characteristics: Map<string, NobleCharacteristic> = new Map();

  constructor(private nobleService: Service) {
    this.uuid = nobleService.uuid;
  }

  async discoverCharacteristics(): Promise<ICharacteristic[]> {
    if (this.characteristics.size > 0) {
      return Array.from(this.characteristics.values());
    }

    const chars = await this.nobleService.discoverCharacteristicsAsync([]);
    return chars.map(c => {
      const wrapper = new NobleCharacteristic(c);
      this.characteristics.set(normalizeUuid(c.uuid), wrapper);
      return wrapper;
    });
  }

  async getCharacteristic(uuid: string): Promise<ICharacteristic | null> {
    const normalizedUuid = normalizeUuid(uuid);
    const cached = this.characteristics.get(normalizedUuid);
    if (cached) return cached;

    await this.discoverCharacteristics();
    return this.characteristics.get(normalizedUuid) ?? null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Peripheral Adapter
// ─────────────────────────────────────────────────────────────────────────────

class NoblePeripheral extends EventEmitter implements IPeripheral {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  private services: Map<string, NobleService> = new Map();

  constructor(private noblePeripheral: Peripheral) {
    super();
    this.id = noblePeripheral.id;
    this.name = noblePeripheral.advertisement?.localName || 'Unknown';
    this.address = noblePeripheral.address || noblePeripheral.id;

    this.noblePeripheral.on('disconnect', () => {
      bridgeLogger.warn(`${this.name}: disconnect event received`, undefined, 'BLE');
      this.services.clear();
      this.emit('disconnect');
    });
  }

  get rssi(): number {
    return this.noblePeripheral.rssi;
  }

  get state(): PeripheralState {
    return toPeripheralState(this.noblePeripheral.state);
  }

  async connect(): Promise<void> {
    if (this.state === 'connected') return;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Connection timeout (${BLE_CONFIG.CONNECTION_TIMEOUT / 1000}s), state: ${this.state}`)),
        BLE_CONFIG.CONNECTION_TIMEOUT
      );
    });

    try {
      await Promise.race([this.noblePeripheral.connectAsync(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async disconnect(): Promise<void> {
    if (this.state === 'disconnected') return;
    await this.noblePeripheral.disconnectAsync();
  }

  async getService(uuid: string): Promise<IService | null> {
    const normalizedUuid = normalizeUuid(uuid);
    const cached = this.services.get(normalizedUuid);
    if (cached) return cached;

    const services = await this.noblePeripheral.discoverServicesAsync([normalizedUuid]);
    for (const service of services) {
      this.services.set(normalizeUuid(service.uuid), new NobleService(service));
    }
    return this.services.get(normalizedUuid) ?? null;
  }
}

function toPeripheralState(state: string): PeripheralState {
  switch (state) {
    case 'connecting':
    case 'connected':
    case 'disconnecting':
    case 'disconnected':
    case 'error':
      return state;
    default:
      return 'disconnected';
  }
}

function describePeripheral(peripheral: Peripheral): DiscoveredDevice {
  return {
    id: peripheral.id,
    name: peripheral.advertisement?.localName ?? '',
    address: peripheral.address || peripheral.id,
    rssi: peripheral.rssi,
    serviceUuids: (peripheral.advertisement?.serviceUuids ?? []).map(normalizeUuid),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NobleTransport extends EventEmitter implements ITransport {
  private _isInitialized = false;
  private _isScanning = false;
  private peripherals: Map<string, NoblePeripheral> = new Map();

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  get isScanning(): boolean {
    return this._isScanning;
  }

  async initialize(): Promise<void> {
    if (this._isInitialized) return;

    try {
      noble = require('@abandonware/noble');
    } catch (error) {
      throw new BridgeError(
        BridgeErrorCode.BLUETOOTH_UNAVAILABLE,
        `Noble not available: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const lib = this.requireNoble();
    lib.on('stateChange', (state: string) => {
      bridgeLogger.info(`Bluetooth state: ${state}`, undefined, 'BLE');
    });

    await this.waitForBluetoothReady(lib);
    this._isInitialized = true;
    bridgeLogger.info('Noble transport initialized', undefined, 'BLE');
  }

  async cleanup(): Promise<void> {
    if (this._isScanning) {
      await this.stopScan();
    }

    for (const peripheral of this.peripherals.values()) {
      try {
        await peripheral.disconnect();
      } catch (error) {
        bridgeLogger.warn(`Error disconnecting ${peripheral.name}`, { error: String(error) }, 'BLE');
      }
    }

    this.peripherals.clear();
    bridgeLogger.info('Noble transport cleaned up', undefined, 'BLE');
  }

  /**
   * Scans until the first advertisement accepted by the filter, or until the
   * timeout. Resolves null when nothing matched.
   */
  async findDevice(filter: DeviceFilter, timeoutMs: number): Promise<IPeripheral | null> {
    const lib = this.requireNoble();

    return new Promise<IPeripheral | null>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (result: IPeripheral | null) => {
        clearTimeout(timer);
        lib.removeListener('discover', onDiscover);
        this.stopScan().then(() => resolve(result), reject);
      };

      const onDiscover = (peripheral: Peripheral) => {
        const device = describePeripheral(peripheral);
        this.emit('deviceDiscovered', device);
        if (filter(device)) {
          finish(this.wrap(peripheral));
        }
      };

      lib.on('discover', onDiscover);
      timer = setTimeout(() => finish(null), timeoutMs);
      this.startScan().catch(error => {
        clearTimeout(timer);
        lib.removeListener('discover', onDiscover);
        reject(error);
      });
    });
  }

  /** Lists every device advertising during the scan window. */
  async scan(durationMs: number): Promise<DiscoveredDevice[]> {
    const lib = this.requireNoble();
    const found = new Map<string, DiscoveredDevice>();

    const onDiscover = (peripheral: Peripheral) => {
      if (found.has(peripheral.id)) return;
      const device = describePeripheral(peripheral);
      found.set(peripheral.id, device);
      this.emit('deviceDiscovered', device);
    };

    lib.on('discover', onDiscover);
    try {
      await this.startScan();
      await new Promise<void>(resolve => setTimeout(resolve, durationMs));
    } finally {
      lib.removeListener('discover', onDiscover);
      await this.stopScan();
    }

    return Array.from(found.values());
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private requireNoble(): NobleModule {
    if (!noble) {
      throw new BridgeError(BridgeErrorCode.BLUETOOTH_UNAVAILABLE, 'Transport not initialized');
    }
    return noble;
  }

  private wrap(peripheral: Peripheral): NoblePeripheral {
    const existing = this.peripherals.get(peripheral.id);
    if (existing) return existing;

    const wrapped = new NoblePeripheral(peripheral);
    this.peripherals.set(peripheral.id, wrapped);
    return wrapped;
  }

  private async startScan(): Promise<void> {
    if (this._isScanning) return;

    this._isScanning = true;
    await this.requireNoble().startScanningAsync([], false);
    this.emit('scanStarted');
  }

  private async stopScan(): Promise<void> {
    if (!this._isScanning || !noble) return;

    try {
      await noble.stopScanningAsync();
    } catch (error) {
      bridgeLogger.warn('Error stopping scan', { error: String(error) }, 'BLE');
    }

    this._isScanning = false;
    this.emit('scanStopped');
  }

  private waitForBluetoothReady(lib: NobleModule): Promise<void> {
    return new Promise((resolve, reject) => {
      if (lib.state === 'poweredOn') {
        resolve();
        return;
      }

      const stateChangeHandler = (state: string) => {
        if (state === 'poweredOn') {
          clearTimeout(timeout);
          lib.removeListener('stateChange', stateChangeHandler);
          resolve();
        }
      };

      const timeout = setTimeout(() => {
        lib.removeListener('stateChange', stateChangeHandler);
        reject(new BridgeError(
          BridgeErrorCode.BLUETOOTH_UNAVAILABLE,
          `Bluetooth adapter timeout (${BLE_CONFIG.ADAPTER_READY_TIMEOUT / 1000}s)`
        ));
      }, BLE_CONFIG.ADAPTER_READY_TIMEOUT);

      lib.on('stateChange', stateChangeHandler);
    });
  }
}
