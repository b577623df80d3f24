import { MarioSensor, decodeImuPacket } from './MarioSensor';
import { MockCharacteristic, MockPeripheral, MockService } from './MockPeripheral';
import { MARIO_CONFIG } from './BleBridgeConstants';
import { BridgeErrorCode, isBridgeError } from '../signalProcessing/errors';
import { RawSample } from '../signalProcessing/types';

function imuPacket(x: number, y: number, z: number): Buffer {
  return Buffer.from([0x07, 0x00, 0x45, 0x00, x & 0xff, y & 0xff, z & 0xff]);
}

describe('decodeImuPacket', () => {
  it('reads roll from x and negates z for pitch', () => {
    expect(decodeImuPacket(imuPacket(12, 3, -20))).toEqual({ roll: 12, pitch: 20 });
    expect(decodeImuPacket(imuPacket(-5, 0, 7))).toEqual({ roll: -5, pitch: -7 });
  });

  it('treats bytes above 127 as negative', () => {
    expect(decodeImuPacket(Buffer.from([0x07, 0, 0, 0, 0xff, 0, 0x80]))).toEqual({ roll: -1, pitch: 128 });
  });

  it('reports a level sensor as exactly zero', () => {
    expect(decodeImuPacket(imuPacket(0, 0, 0))).toEqual({ roll: 0, pitch: 0 });
  });

  it('ignores short and non-IMU packets', () => {
    expect(decodeImuPacket(Buffer.from([0x07, 0, 0, 0, 1, 2]))).toBeNull();
    expect(decodeImuPacket(Buffer.from([0x08, 0, 0, 0, 1, 2, 3]))).toBeNull();
  });
});

describe('MarioSensor', () => {
  let hub: MockCharacteristic;
  let peripheral: MockPeripheral;

  beforeEach(() => {
    jest.useFakeTimers();
    hub = new MockCharacteristic(MARIO_CONFIG.CHARACTERISTIC_UUID, { write: true, notify: true });
    peripheral = new MockPeripheral('mario-1', 'LEGO Mario_j_r', [
      new MockService(MARIO_CONFIG.SERVICE_UUID, [hub]),
    ]);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  async function connect(sensor: MarioSensor): Promise<void> {
    const connecting = sensor.connect();
    await jest.advanceTimersByTimeAsync(1000);
    await connecting;
  }

  it('subscribes and enables the IMU and RGB ports', async () => {
    const sensor = new MarioSensor(peripheral);
    await connect(sensor);

    expect(hub.subscribed).toBe(true);
    expect(hub.writes.map(w => [...w.data])).toEqual([
      [...MARIO_CONFIG.SUBSCRIBE_IMU],
      [...MARIO_CONFIG.SUBSCRIBE_RGB],
    ]);
    expect(hub.writes.every(w => w.withResponse)).toBe(true);
    expect(sensor.isConnected).toBe(true);
  });

  it('delivers decoded samples to every subscriber until unsubscribed', async () => {
    const sensor = new MarioSensor(peripheral);
    await connect(sensor);

    const received: RawSample[] = [];
    const unsubscribe = sensor.subscribe(sample => received.push(sample));

    hub.notify(imuPacket(4, 0, -6));
    hub.notify(Buffer.from([0x45, 0x01]));
    unsubscribe();
    hub.notify(imuPacket(1, 0, 1));

    expect(received).toEqual([{ roll: 4, pitch: 6 }]);
    expect(sensor.getStats()).toEqual({ packetsReceived: 3, packetsIgnored: 1 });
  });

  it('fails with SERVICE_NOT_FOUND when the hub service is missing', async () => {
    const sensor = new MarioSensor(new MockPeripheral('other', 'Other', []));

    const error = await sensor.connect().then(() => null, (e: unknown) => e);

    expect(isBridgeError(error, BridgeErrorCode.SERVICE_NOT_FOUND)).toBe(true);
  });

  it('marks itself disconnected when the link drops', async () => {
    const sensor = new MarioSensor(peripheral);
    await connect(sensor);

    peripheral.drop();

    expect(sensor.isConnected).toBe(false);
  });
});
