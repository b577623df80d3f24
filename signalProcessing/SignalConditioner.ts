/**
 * Signal Conditioner
 *
 * One-way state machine (uncalibrated → calibrating → active) holding the
 * filter state. Samples mutate it through update(); ticks read the latest
 * snapshot through read(). The snapshot is an immutable object swapped in a
 * single assignment, so a reader never sees a half-written pair.
 */

import {
    Bias,
    BridgeConfig,
    CommandPair,
    CommandSnapshot,
    ConditionerPhase,
    ConditionerState,
    RawSample
} from './types';
import { RAW_SAMPLE_LIMIT, SMOOTHING_ALPHA } from './constants';
import { clamp, shapeAxis } from './AxisShaper';
import { BridgeError, BridgeErrorCode } from './errors';
import { bridgeLogger } from '../shared/BridgeLogger';

export const NEUTRAL_PAIR: CommandPair = Object.freeze({ throttle: 0, steer: 0 });

const NEUTRAL_SNAPSHOT: CommandSnapshot = Object.freeze({
    pair: NEUTRAL_PAIR,
    version: 0,
    updatedAt: 0
});

export function isFiniteSample(sample: RawSample): boolean {
    return Number.isFinite(sample.roll) && Number.isFinite(sample.pitch);
}

/** Bounds a finite sample to the raw working range shared with calibration. */
export function clampSample(sample: RawSample): RawSample {
    return {
        roll: clamp(sample.roll, -RAW_SAMPLE_LIMIT, RAW_SAMPLE_LIMIT),
        pitch: clamp(sample.pitch, -RAW_SAMPLE_LIMIT, RAW_SAMPLE_LIMIT)
    };
}

export interface ConditionerStats {
    phase: ConditionerPhase;
    acceptedSamples: number;
    droppedSamples: number;
    version: number;
}

export class SignalConditioner {
    private state: ConditionerState = { phase: 'uncalibrated' };
    private snapshot: CommandSnapshot = NEUTRAL_SNAPSHOT;
    private acceptedSamples = 0;
    private droppedSamples = 0;

    constructor(
        private readonly config: Readonly<BridgeConfig>,
        private readonly alpha: number = SMOOTHING_ALPHA,
        private readonly now: () => number = Date.now
    ) {}

    get phase(): ConditionerPhase {
        return this.state.phase;
    }

    beginCalibration(): void {
        if (this.state.phase !== 'uncalibrated') {
            throw this.invalidTransition('calibrating');
        }
        this.state = { phase: 'calibrating' };
        bridgeLogger.debug('Conditioner calibrating', undefined, 'CONDITIONER');
    }

    activate(bias: Bias): void {
        if (this.state.phase !== 'calibrating') {
            throw this.invalidTransition('active');
        }
        if (!Number.isFinite(bias.roll) || !Number.isFinite(bias.pitch)) {
            throw new BridgeError(
                BridgeErrorCode.INVALID_TRANSITION,
                'Cannot activate with a non-finite bias',
                { roll: String(bias.roll), pitch: String(bias.pitch) }
            );
        }
        this.state = {
            phase: 'active',
            bias: Object.freeze({ roll: bias.roll, pitch: bias.pitch }),
            filter: { emaX: 0, emaZ: 0 }
        };
        bridgeLogger.info(`Conditioner active, bias: roll=${bias.roll.toFixed(1)}, pitch=${bias.pitch.toFixed(1)}`,
            undefined, 'CONDITIONER');
    }

    /**
     * Feeds one raw sample through centring, smoothing and shaping.
     * Returns false when the sample was discarded as non-finite.
     */
    update(sample: RawSample): boolean {
        const state = this.state;
        if (state.phase !== 'active') {
            throw new BridgeError(
                BridgeErrorCode.INVALID_TRANSITION,
                `Cannot condition samples while ${state.phase}`,
                { phase: state.phase }
            );
        }

        if (!isFiniteSample(sample)) {
            this.droppedSamples++;
            bridgeLogger.debug('Dropped non-finite sample', {
                code: BridgeErrorCode.NON_FINITE_SAMPLE,
                roll: String(sample.roll),
                pitch: String(sample.pitch)
            }, 'CONDITIONER');
            return false;
        }

        const { roll, pitch } = clampSample(sample);

        const { bias, filter } = state;
        filter.emaX = this.smooth(filter.emaX, roll - bias.roll);
        filter.emaZ = this.smooth(filter.emaZ, pitch - bias.pitch);

        const steer = shapeAxis(filter.emaX, {
            scale: this.config.xScale,
            deadzone: this.config.deadzone,
            expo: this.config.expo,
            invert: this.config.invertX
        });
        const throttle = shapeAxis(filter.emaZ, {
            scale: this.config.zScale,
            deadzone: this.config.deadzone,
            expo: this.config.expo,
            invert: this.config.invertZ
        });

        this.acceptedSamples++;
        this.snapshot = Object.freeze({
            pair: Object.freeze({ throttle: finiteOrZero(throttle), steer: finiteOrZero(steer) }),
            version: this.snapshot.version + 1,
            updatedAt: this.now()
        });
        return true;
    }

    /** Latest snapshot; neutral until the first accepted sample. */
    read(): CommandSnapshot {
        return this.snapshot;
    }

    getFilterState(): Readonly<{ emaX: number; emaZ: number }> | null {
        return this.state.phase === 'active' ? { ...this.state.filter } : null;
    }

    getBias(): Bias | null {
        return this.state.phase === 'active' ? this.state.bias : null;
    }

    getStats(): ConditionerStats {
        return {
            phase: this.state.phase,
            acceptedSamples: this.acceptedSamples,
            droppedSamples: this.droppedSamples,
            version: this.snapshot.version
        };
    }

    private smooth(previous: number, centered: number): number {
        const next = this.alpha * centered + (1 - this.alpha) * previous;
        return Number.isFinite(next) ? next : previous;
    }

    private invalidTransition(to: ConditionerPhase): BridgeError {
        return new BridgeError(
            BridgeErrorCode.INVALID_TRANSITION,
            `Invalid conditioner transition: ${this.state.phase} → ${to}`,
            { from: this.state.phase, to }
        );
    }
}

function finiteOrZero(value: number): number {
    return Number.isFinite(value) ? value : 0;
}
