import { EventEmitter } from 'events';
import { Bias, BridgeConfig, LineSink, SampleSource } from './types';
import { CALIBRATION_WINDOW_MS, TICK_PERIOD_MS } from './constants';
import { SignalConditioner, ConditionerStats } from './SignalConditioner';
import { Calibrator } from './Calibrator';
import { NotificationIngestor, IngestorStats } from './NotificationIngestor';
import { TickScheduler } from './TickScheduler';
import { FrameEmitter, EmitOutcome, EmitterStats } from './FrameEmitter';
import { BridgeError, BridgeErrorCode, describeError } from './errors';
import { bridgeLogger } from '../shared/BridgeLogger';

export interface CoordinatorOptions {
    calibrationWindowMs?: number;
    tickPeriodMs?: number;
}

export interface BridgeStats {
    conditioner: ConditionerStats;
    ingestor: IngestorStats;
    emitter: EmitterStats | null;
    ticks: number;
}

export interface BridgeCoordinatorEvents {
    calibrated: (bias: Bias) => void;
    frame: (line: string) => void;
    writeFailed: (error: BridgeError) => void;
}

export declare interface BridgeCoordinator {
    on<E extends keyof BridgeCoordinatorEvents>(event: E, listener: BridgeCoordinatorEvents[E]): this;
    once<E extends keyof BridgeCoordinatorEvents>(event: E, listener: BridgeCoordinatorEvents[E]): this;
    emit<E extends keyof BridgeCoordinatorEvents>(event: E, ...args: Parameters<BridgeCoordinatorEvents[E]>): boolean;
}

/**
 * Owns one bridge session.
 *
 * Flow:
 * SampleSource → NotificationIngestor → Calibrator (window) → SignalConditioner
 * TickScheduler (100ms) → SignalConditioner.read() → FrameEmitter → LineSink
 *
 * Streaming can only start once calibration has produced a bias, so a failed
 * calibration never sends a frame.
 */
export class BridgeCoordinator extends EventEmitter {
    private readonly conditioner: SignalConditioner;
    private readonly calibrator = new Calibrator();
    private readonly ingestor: NotificationIngestor;
    private readonly calibrationWindowMs: number;
    private readonly tickPeriodMs: number;

    private emitter: FrameEmitter | null = null;
    private scheduler: TickScheduler | null = null;
    private calibrationTimer: NodeJS.Timeout | null = null;
    private cancelCalibrationWait: (() => void) | null = null;
    private stopped = false;

    constructor(
        config: Readonly<BridgeConfig>,
        source: SampleSource,
        options: CoordinatorOptions = {}
    ) {
        super();
        this.conditioner = new SignalConditioner(config);
        this.ingestor = new NotificationIngestor(source, this.conditioner, this.calibrator);
        this.calibrationWindowMs = options.calibrationWindowMs ?? CALIBRATION_WINDOW_MS;
        this.tickPeriodMs = options.tickPeriodMs ?? TICK_PERIOD_MS;
    }

    get phase(): SignalConditioner['phase'] {
        return this.conditioner.phase;
    }

    get isStreaming(): boolean {
        return this.scheduler?.isRunning ?? false;
    }

    /**
     * Collects samples for the calibration window, then activates the
     * conditioner. Throws INSUFFICIENT_DATA when the sensor stayed silent.
     */
    async calibrate(): Promise<Bias> {
        if (this.stopped) {
            throw new BridgeError(BridgeErrorCode.INVALID_TRANSITION, 'Bridge has been stopped');
        }

        if (!this.ingestor.isAttached) {
            this.ingestor.attach();
        }

        this.conditioner.beginCalibration();
        this.calibrator.begin();
        bridgeLogger.info(`Calibrating zero (hold the sensor still ~${this.calibrationWindowMs}ms)…`, undefined, 'CALIBRATION');

        await this.waitForCalibrationWindow();

        if (this.stopped) {
            throw new BridgeError(BridgeErrorCode.INVALID_TRANSITION, 'Bridge stopped during calibration');
        }

        let bias: Bias;
        try {
            bias = this.calibrator.finish();
        } catch (error) {
            this.ingestor.detach();
            bridgeLogger.error(describeError(error), undefined, 'CALIBRATION');
            throw error;
        }

        this.conditioner.activate(bias);
        this.emit('calibrated', bias);
        return bias;
    }

    /** Starts the fixed-rate frame stream. Requires a completed calibration. */
    startStreaming(sink: LineSink): void {
        if (this.conditioner.phase !== 'active') {
            throw new BridgeError(
                BridgeErrorCode.INVALID_TRANSITION,
                `Cannot stream before calibration completes (phase: ${this.conditioner.phase})`,
                { phase: this.conditioner.phase }
            );
        }
        if (this.scheduler?.isRunning) {
            bridgeLogger.warn('Streaming already started', undefined, 'SCHEDULER');
            return;
        }

        this.emitter = new FrameEmitter(sink, this.tickPeriodMs);
        this.scheduler = new TickScheduler(() => this.handleTick(), this.tickPeriodMs);
        this.scheduler.start();
        bridgeLogger.info(`Streaming analog values every ${this.tickPeriodMs}ms`, undefined, 'SCHEDULER');
    }

    async start(sink: LineSink): Promise<Bias> {
        const bias = await this.calibrate();
        this.startStreaming(sink);
        return bias;
    }

    /** Tears down the whole pipeline at once; nothing in flight is drained. */
    stop(): void {
        if (this.stopped) return;
        this.stopped = true;

        if (this.calibrationTimer) {
            clearTimeout(this.calibrationTimer);
            this.calibrationTimer = null;
        }
        this.cancelCalibrationWait?.();
        this.cancelCalibrationWait = null;

        this.scheduler?.stop();
        this.ingestor.detach();

        bridgeLogger.info('Bridge stopped', this.getStats(), 'BRIDGE');
    }

    getStats(): BridgeStats {
        return {
            conditioner: this.conditioner.getStats(),
            ingestor: this.ingestor.getStats(),
            emitter: this.emitter?.getStats() ?? null,
            ticks: this.scheduler?.ticks ?? 0
        };
    }

    private handleTick(): void {
        if (!this.emitter) return;

        const { pair } = this.conditioner.read();
        this.emitter.emit(pair)
            .then(outcome => this.recordOutcome(outcome))
            .catch(error => bridgeLogger.error('Frame emission crashed', { error: describeError(error) }, 'EMITTER'));
    }

    private recordOutcome(outcome: EmitOutcome): void {
        if (outcome.ok) {
            this.emit('frame', outcome.line);
        } else {
            this.emit('writeFailed', outcome.error);
        }
    }

    private waitForCalibrationWindow(): Promise<void> {
        return new Promise(resolve => {
            this.cancelCalibrationWait = resolve;
            this.calibrationTimer = setTimeout(() => {
                this.calibrationTimer = null;
                this.cancelCalibrationWait = null;
                resolve();
            }, this.calibrationWindowMs);
        });
    }
}
