/**
 * LEGO Mario tilt sensor
 *
 * Subscribes to the hub characteristic, enables the IMU port and turns each
 * IMU notification into a RawSample for the bridge's sample source contract.
 */

import { IPeripheral, ICharacteristic } from './interfaces/ITransport';
import { MARIO_CONFIG, IMU_PACKET, TIMING } from './BleBridgeConstants';
import { RawSample, SampleListener, SampleSource } from '../signalProcessing/types';
import { BridgeError, BridgeErrorCode } from '../signalProcessing/errors';
import { bridgeLogger } from '../shared/BridgeLogger';
import { delay, toSigned8 } from '../shared/utils';

/**
 * Decodes an IMU notification. Tilt bytes are signed: [4]=x, [5]=y, [6]=z.
 * Forward tilt is negative z on the figure, so pitch is reported as -z
 * (forward tilt → positive throttle). Returns null for non-IMU packets.
 */
export function decodeImuPacket(data: Buffer): RawSample | null {
  if (data.length < IMU_PACKET.MIN_LENGTH || data[0] !== IMU_PACKET.HEADER) {
    return null;
  }

  const x = toSigned8(data[IMU_PACKET.X_OFFSET]);
  const z = toSigned8(data[IMU_PACKET.Z_OFFSET]);
  return { roll: x, pitch: z === 0 ? 0 : -z };
}

export class MarioSensor implements SampleSource {
  private characteristic: ICharacteristic | null = null;
  private listeners = new Set<SampleListener>();
  private packetsReceived = 0;
  private packetsIgnored = 0;

  constructor(private readonly peripheral: IPeripheral) {}

  get name(): string {
    return this.peripheral.name;
  }

  get isConnected(): boolean {
    return this.peripheral.state === 'connected' && this.characteristic !== null;
  }

  async connect(): Promise<void> {
    bridgeLogger.logConnection(this.peripheral.name, this.peripheral.address, 'Connecting sensor');
    await this.peripheral.connect();

    const service = await this.peripheral.getService(MARIO_CONFIG.SERVICE_UUID);
    if (!service) {
      throw new BridgeError(BridgeErrorCode.SERVICE_NOT_FOUND, 'LEGO hub service not found on sensor');
    }

    const characteristic = await service.getCharacteristic(MARIO_CONFIG.CHARACTERISTIC_UUID);
    if (!characteristic) {
      throw new BridgeError(BridgeErrorCode.SERVICE_NOT_FOUND, 'LEGO hub characteristic not found on sensor');
    }

    characteristic.on('data', (data: Buffer) => this.handleNotification(data));
    await characteristic.subscribe();
    this.characteristic = characteristic;

    const withResponse = characteristic.properties.write;
    await delay(TIMING.SUBSCRIBE_SETTLE_DELAY);
    await characteristic.write(Buffer.from(MARIO_CONFIG.SUBSCRIBE_IMU), withResponse);
    await delay(TIMING.SUBSCRIBE_SETTLE_DELAY);
    await characteristic.write(Buffer.from(MARIO_CONFIG.SUBSCRIBE_RGB), withResponse);
    bridgeLogger.info('Sensor subscribed for IMU', undefined, 'SENSOR');

    this.peripheral.once('disconnect', () => {
      bridgeLogger.warn('Sensor disconnected; holding last conditioned value', undefined, 'SENSOR');
      this.characteristic = null;
    });

    await delay(TIMING.POST_SUBSCRIBE_DELAY);
  }

  subscribe(listener: SampleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async disconnect(): Promise<void> {
    this.listeners.clear();
    if (this.characteristic) {
      try {
        await this.characteristic.unsubscribe();
      } catch (error) {
        bridgeLogger.warn('Unsubscribe failed', { error: String(error) }, 'SENSOR');
      }
      this.characteristic = null;
    }
    await this.peripheral.disconnect();
  }

  getStats(): { packetsReceived: number; packetsIgnored: number } {
    return { packetsReceived: this.packetsReceived, packetsIgnored: this.packetsIgnored };
  }

  private handleNotification(data: Buffer): void {
    this.packetsReceived++;
    const sample = decodeImuPacket(data);
    if (!sample) {
      this.packetsIgnored++;
      return;
    }

    this.listeners.forEach(listener => {
      try {
        listener(sample);
      } catch (error) {
        bridgeLogger.error('Sample listener threw', { error: String(error) }, 'SENSOR');
      }
    });
  }
}
