import { RawSample, SampleSource } from './types';
import { Calibrator } from './Calibrator';
import { SignalConditioner } from './SignalConditioner';
import { BridgeError, BridgeErrorCode } from './errors';
import { bridgeLogger } from '../shared/BridgeLogger';

export interface IngestorStats {
    received: number;
    calibrationSamples: number;
    conditionedSamples: number;
    ignoredSamples: number;
}

/**
 * Sole consumer of the sensor's notifications. Routes each sample by the
 * conditioner's phase: calibrating → calibrator, active → conditioner.
 */
export class NotificationIngestor {
    private unsubscribe: (() => void) | null = null;
    private stats: IngestorStats = {
        received: 0,
        calibrationSamples: 0,
        conditionedSamples: 0,
        ignoredSamples: 0
    };

    constructor(
        private readonly source: SampleSource,
        private readonly conditioner: SignalConditioner,
        private readonly calibrator: Calibrator
    ) {}

    get isAttached(): boolean {
        return this.unsubscribe !== null;
    }

    attach(): void {
        if (this.unsubscribe) {
            throw new BridgeError(
                BridgeErrorCode.INVALID_TRANSITION,
                'NotificationIngestor is already attached to its sample source'
            );
        }
        this.unsubscribe = this.source.subscribe(sample => this.ingest(sample));
    }

    detach(): void {
        if (!this.unsubscribe) return;
        this.unsubscribe();
        this.unsubscribe = null;
    }

    ingest(sample: RawSample): void {
        this.stats.received++;

        switch (this.conditioner.phase) {
            case 'calibrating':
                if (this.calibrator.addSample(sample)) {
                    this.stats.calibrationSamples++;
                }
                break;
            case 'active':
                if (this.conditioner.update(sample)) {
                    this.stats.conditionedSamples++;
                }
                break;
            case 'uncalibrated':
                this.stats.ignoredSamples++;
                if (this.stats.ignoredSamples === 1) {
                    bridgeLogger.debug('Ignoring samples until calibration begins', undefined, 'CONDITIONER');
                }
                break;
        }
    }

    getStats(): IngestorStats {
        return { ...this.stats };
    }
}
