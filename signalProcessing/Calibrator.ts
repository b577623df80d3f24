/**
 * Zero-bias calibrator
 *
 * Averages the samples received while the sensor is held still. The mean is
 * per received sample, not time-weighted, so bursty notifications count once
 * each. Samples are clamped to the same raw range the conditioner uses, so a
 * reading equal to the bias always centres to zero. The window itself is
 * timed by the caller.
 */

import { Bias, RawSample } from './types';
import { BridgeError, BridgeErrorCode } from './errors';
import { clampSample, isFiniteSample } from './SignalConditioner';
import { bridgeLogger } from '../shared/BridgeLogger';

export class Calibrator {
    private meanRoll = 0;
    private meanPitch = 0;
    private accepted = 0;
    private dropped = 0;

    get sampleCount(): number {
        return this.accepted;
    }

    get droppedCount(): number {
        return this.dropped;
    }

    begin(): void {
        this.meanRoll = 0;
        this.meanPitch = 0;
        this.accepted = 0;
        this.dropped = 0;
    }

    addSample(sample: RawSample): boolean {
        if (!isFiniteSample(sample)) {
            this.dropped++;
            return false;
        }
        const { roll, pitch } = clampSample(sample);
        this.accepted++;
        // Running mean: no sum to overflow
        this.meanRoll += (roll - this.meanRoll) / this.accepted;
        this.meanPitch += (pitch - this.meanPitch) / this.accepted;
        return true;
    }

    finish(): Bias {
        if (this.accepted === 0) {
            throw new BridgeError(
                BridgeErrorCode.INSUFFICIENT_DATA,
                'Calibration failed: no samples received during the calibration window. Is the sensor streaming?',
                { dropped: this.dropped }
            );
        }

        const bias: Bias = { roll: this.meanRoll, pitch: this.meanPitch };
        if (!Number.isFinite(bias.roll) || !Number.isFinite(bias.pitch)) {
            throw new BridgeError(
                BridgeErrorCode.INSUFFICIENT_DATA,
                'Calibration failed: bias is not a finite number',
                { roll: String(bias.roll), pitch: String(bias.pitch), samples: this.accepted }
            );
        }

        bridgeLogger.info(`Calibrated from ${this.accepted} samples`, { bias, dropped: this.dropped }, 'CALIBRATION');
        return bias;
    }
}
