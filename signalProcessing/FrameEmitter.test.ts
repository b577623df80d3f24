import { FrameEmitter } from './FrameEmitter';
import { BridgeErrorCode } from './errors';
import { LineSink } from './types';

const PAIR = { throttle: 0.5, steer: -0.25 };

describe('FrameEmitter', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    jest.useRealTimers();
  });

  it('writes the encoded frame to the sink', async () => {
    const writeLine = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
    const emitter = new FrameEmitter({ writeLine });

    const outcome = await emitter.emit(PAIR);

    expect(outcome).toEqual({ ok: true, line: '0.50,-0.25:\n' });
    expect(writeLine).toHaveBeenCalledWith('0.50,-0.25:\n');
    expect(emitter.getStats()).toEqual({ framesSent: 1, writeFailures: 0, lastError: null });
  });

  it('reports a failed write without rejecting or retrying', async () => {
    const writeLine = jest.fn<Promise<void>, [string]>().mockRejectedValue(new Error('link lost'));
    const emitter = new FrameEmitter({ writeLine });

    const outcome = await emitter.emit(PAIR);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.code).toBe(BridgeErrorCode.TRANSPORT_WRITE_FAILED);
      expect(outcome.error.recoverable).toBe(true);
      expect(outcome.error.message).toBe('Write error: link lost');
    }
    expect(writeLine).toHaveBeenCalledTimes(1);
    expect(emitter.getStats()).toEqual({ framesSent: 0, writeFailures: 1, lastError: 'link lost' });
  });

  it('gives up on a write that outlives the tick period', async () => {
    jest.useFakeTimers();
    const sink: LineSink = { writeLine: () => new Promise<void>(() => undefined) };
    const emitter = new FrameEmitter(sink, 100);

    const pending = emitter.emit(PAIR);
    await jest.advanceTimersByTimeAsync(100);
    const outcome = await pending;

    expect(outcome.ok).toBe(false);
    expect(emitter.getStats().lastError).toBe('Write timed out after 100ms');
  });

  it('recovers from a sink that throws before returning a promise', async () => {
    jest.useFakeTimers();
    const lines: string[] = [];
    const writeLine = jest.fn<Promise<void>, [string]>()
      .mockImplementationOnce(() => {
        throw new Error('adapter reset');
      })
      .mockImplementation(async line => {
        lines.push(line);
      });
    const emitter = new FrameEmitter({ writeLine }, 100);

    const first = await emitter.emit(PAIR);
    const second = await emitter.emit(PAIR);
    const third = await emitter.emit(PAIR);
    await jest.advanceTimersByTimeAsync(500);

    expect(first).toMatchObject({ ok: false, error: { code: BridgeErrorCode.TRANSPORT_WRITE_FAILED } });
    expect(second.ok).toBe(true);
    expect(third.ok).toBe(true);
    expect(lines).toEqual(['0.50,-0.25:\n', '0.50,-0.25:\n']);
    expect(emitter.getStats()).toEqual({ framesSent: 2, writeFailures: 1, lastError: 'adapter reset' });
    expect(jest.getTimerCount()).toBe(0);
  });

  it('skips a tick while the previous write is still pending', async () => {
    jest.useFakeTimers();
    let release: () => void = () => undefined;
    const writeLine = jest.fn<Promise<void>, [string]>(() => new Promise<void>(resolve => {
      release = resolve;
    }));
    const emitter = new FrameEmitter({ writeLine }, 100);

    const first = emitter.emit(PAIR);
    const second = await emitter.emit(PAIR);

    expect(second.ok).toBe(false);
    expect(emitter.getStats().lastError).toBe('Previous write still pending');
    expect(writeLine).toHaveBeenCalledTimes(1);

    release();
    await expect(first).resolves.toEqual({ ok: true, line: '0.50,-0.25:\n' });

    writeLine.mockResolvedValueOnce(undefined);
    const third = await emitter.emit(PAIR);
    expect(third.ok).toBe(true);
    expect(writeLine).toHaveBeenCalledTimes(2);
  });
});
