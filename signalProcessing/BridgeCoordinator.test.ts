import { BridgeCoordinator } from './BridgeCoordinator';
import { createBridgeConfig } from './config';
import { CALIBRATION_WINDOW_MS } from './constants';
import { BridgeErrorCode, isBridgeError } from './errors';
import { Bias, LineSink, RawSample, SampleListener, SampleSource } from './types';

class FakeSensor implements SampleSource {
  listeners = new Set<SampleListener>();

  subscribe(listener: SampleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  push(sample: RawSample): void {
    this.listeners.forEach(listener => listener(sample));
  }
}

class FakeSink implements LineSink {
  lines: string[] = [];
  calls = 0;
  failingCalls = new Set<number>();

  async writeLine(line: string): Promise<void> {
    this.calls++;
    if (this.failingCalls.has(this.calls)) {
      throw new Error('link lost');
    }
    this.lines.push(line);
  }
}

describe('BridgeCoordinator', () => {
  let sensor: FakeSensor;
  let sink: FakeSink;
  let errorSpy: jest.SpyInstance;

  async function calibrate(coordinator: BridgeCoordinator, sample: RawSample, count = 5): Promise<Bias> {
    const calibration = coordinator.calibrate();
    for (let i = 0; i < count; i++) {
      sensor.push(sample);
    }
    await jest.advanceTimersByTimeAsync(CALIBRATION_WINDOW_MS);
    return calibration;
  }

  beforeEach(() => {
    jest.useFakeTimers();
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    sensor = new FakeSensor();
    sink = new FakeSink();
  });

  afterEach(() => {
    errorSpy.mockRestore();
    jest.useRealTimers();
  });

  it('calibrates to the mean and then conditions toward neutral', async () => {
    const coordinator = new BridgeCoordinator(createBridgeConfig(), sensor);
    const onCalibrated = jest.fn();
    coordinator.on('calibrated', onCalibrated);

    const bias = await calibrate(coordinator, { roll: 10, pitch: -5 });

    expect(bias).toEqual({ roll: 10, pitch: -5 });
    expect(onCalibrated).toHaveBeenCalledWith({ roll: 10, pitch: -5 });
    expect(coordinator.phase).toBe('active');

    sensor.push({ roll: 10, pitch: -5 });
    coordinator.startStreaming(sink);
    await jest.advanceTimersByTimeAsync(100);

    expect(sink.lines).toEqual(['0.00,0.00:\n']);
    coordinator.stop();
  });

  it('emits exactly one frame per period under a faster sample stream', async () => {
    const coordinator = new BridgeCoordinator(createBridgeConfig(), sensor);
    await calibrate(coordinator, { roll: 0, pitch: 0 });

    let n = 0;
    const feeder = setInterval(() => sensor.push({ roll: (n++ % 3) * 2, pitch: -1 }), 20);
    coordinator.startStreaming(sink);
    await jest.advanceTimersByTimeAsync(1000);
    clearInterval(feeder);

    expect(sink.calls).toBe(10);
    expect(coordinator.getStats().ticks).toBe(10);
    expect(coordinator.getStats().ingestor.conditionedSamples).toBe(50);
    coordinator.stop();
  });

  it('sends only the latest conditioned value at each tick', async () => {
    const config = createBridgeConfig({ xScale: 10, zScale: 10, deadzone: 0, expo: 1 });
    const coordinator = new BridgeCoordinator(config, sensor);
    await calibrate(coordinator, { roll: 0, pitch: 0 });

    coordinator.startStreaming(sink);
    sensor.push({ roll: 5, pitch: 0 });
    sensor.push({ roll: 5, pitch: 0 });
    await jest.advanceTimersByTimeAsync(100);

    // ema: 1.0 then 1.8 → steer 0.18
    expect(sink.lines).toEqual(['0.00,0.18:\n']);
    coordinator.stop();
  });

  it('keeps ticking through a failed write and recovers', async () => {
    const coordinator = new BridgeCoordinator(createBridgeConfig(), sensor);
    const onFrame = jest.fn();
    const onWriteFailed = jest.fn();
    coordinator.on('frame', onFrame);
    coordinator.on('writeFailed', onWriteFailed);
    await calibrate(coordinator, { roll: 0, pitch: 0 });

    sink.failingCalls.add(3);
    coordinator.startStreaming(sink);
    await jest.advanceTimersByTimeAsync(500);
    await jest.advanceTimersByTimeAsync(1);

    expect(sink.calls).toBe(5);
    expect(sink.lines).toHaveLength(4);
    expect(onFrame).toHaveBeenCalledTimes(4);
    expect(onWriteFailed).toHaveBeenCalledTimes(1);
    expect(isBridgeError(onWriteFailed.mock.calls[0][0], BridgeErrorCode.TRANSPORT_WRITE_FAILED)).toBe(true);
    expect(coordinator.getStats().emitter).toEqual({ framesSent: 4, writeFailures: 1, lastError: 'link lost' });
    expect(coordinator.phase).toBe('active');
    coordinator.stop();
  });

  it('fails fast when the sensor stays silent and never sends a frame', async () => {
    const coordinator = new BridgeCoordinator(createBridgeConfig(), sensor);

    const outcome = coordinator.calibrate().then(() => null, (error: unknown) => error);
    await jest.advanceTimersByTimeAsync(CALIBRATION_WINDOW_MS);
    const error = await outcome;

    expect(isBridgeError(error, BridgeErrorCode.INSUFFICIENT_DATA)).toBe(true);
    expect(() => coordinator.startStreaming(sink)).toThrow('Cannot stream before calibration completes (phase: calibrating)');
    await jest.advanceTimersByTimeAsync(1000);
    expect(sink.calls).toBe(0);
    expect(sensor.listeners.size).toBe(0);
  });

  it('tears the pipeline down as a unit', async () => {
    const coordinator = new BridgeCoordinator(createBridgeConfig(), sensor);
    await calibrate(coordinator, { roll: 0, pitch: 0 });
    coordinator.startStreaming(sink);
    await jest.advanceTimersByTimeAsync(200);

    coordinator.stop();
    await jest.advanceTimersByTimeAsync(1000);

    expect(sink.calls).toBe(2);
    expect(coordinator.isStreaming).toBe(false);
    expect(sensor.listeners.size).toBe(0);
  });

  it('aborts a calibration in progress on stop', async () => {
    const coordinator = new BridgeCoordinator(createBridgeConfig(), sensor);

    const calibration = coordinator.calibrate();
    coordinator.stop();

    await expect(calibration).rejects.toMatchObject({
      code: BridgeErrorCode.INVALID_TRANSITION,
      message: 'Bridge stopped during calibration',
    });
  });
});
