/**
 * micro:bit Nordic UART line sink
 * Writes UTF-8 lines to the first writable NUS characteristic.
 */

import { IPeripheral, ICharacteristic } from './interfaces/ITransport';
import { MICROBIT_CONFIG } from './BleBridgeConstants';
import { LineSink } from '../signalProcessing/types';
import { BridgeError, BridgeErrorCode } from '../signalProcessing/errors';
import { bridgeLogger } from '../shared/BridgeLogger';

/** Picks the characteristic to write lines to; null when none is writable. */
export function selectWritableCharacteristic(characteristics: ICharacteristic[]): ICharacteristic | null {
  return characteristics.find(c => c.properties.writeWithoutResponse || c.properties.write) ?? null;
}

export class MicrobitUart implements LineSink {
  private rxCharacteristic: ICharacteristic | null = null;
  private writeWithResponse = false;
  private connected = false;

  constructor(private readonly peripheral: IPeripheral) {}

  get name(): string {
    return this.peripheral.name;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    bridgeLogger.logConnection(this.peripheral.name, this.peripheral.address, 'Connecting UART');
    await this.peripheral.connect();

    const nus = await this.peripheral.getService(MICROBIT_CONFIG.NUS_SERVICE_UUID);
    if (!nus) {
      throw new BridgeError(BridgeErrorCode.SERVICE_NOT_FOUND, 'NUS service not found on micro:bit');
    }

    const writable = selectWritableCharacteristic(await nus.discoverCharacteristics());
    if (!writable) {
      throw new BridgeError(BridgeErrorCode.SERVICE_NOT_FOUND, 'No writable NUS characteristic found on micro:bit');
    }

    this.rxCharacteristic = writable;
    this.writeWithResponse = writable.properties.write;
    this.connected = true;

    this.peripheral.once('disconnect', () => {
      this.connected = false;
      bridgeLogger.warn('micro:bit disconnected; frames will fail until it returns', undefined, 'UART');
    });

    bridgeLogger.info('Using NUS write characteristic', {
      uuid: writable.uuid,
      withResponse: this.writeWithResponse,
    }, 'UART');
  }

  async writeLine(line: string): Promise<void> {
    if (!this.connected || !this.rxCharacteristic) {
      throw new Error('micro:bit is not connected');
    }
    await this.rxCharacteristic.write(Buffer.from(line, 'utf8'), this.writeWithResponse);
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.rxCharacteristic = null;
    await this.peripheral.disconnect();
  }
}
