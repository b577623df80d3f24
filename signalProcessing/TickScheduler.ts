/**
 * Fixed-rate tick source
 *
 * Fires independently of sample arrival. A stalled event loop does not
 * produce a burst of catch-up ticks: setInterval reschedules from the
 * current time, so each firing only ever sees the state at fire time.
 */

import { TICK_PERIOD_MS } from './constants';
import { bridgeLogger } from '../shared/BridgeLogger';

export type TickCallback = (tick: number) => void;

export class TickScheduler {
    private timer: NodeJS.Timeout | null = null;
    private tickCount = 0;

    constructor(
        private readonly onTick: TickCallback,
        private readonly periodMs: number = TICK_PERIOD_MS
    ) {}

    get isRunning(): boolean {
        return this.timer !== null;
    }

    get ticks(): number {
        return this.tickCount;
    }

    get period(): number {
        return this.periodMs;
    }

    start(): void {
        if (this.timer) return;

        bridgeLogger.debug(`Tick scheduler started (${this.periodMs}ms)`, undefined, 'SCHEDULER');
        this.timer = setInterval(() => this.fire(), this.periodMs);
    }

    stop(): void {
        if (!this.timer) return;

        clearInterval(this.timer);
        this.timer = null;
        bridgeLogger.debug(`Tick scheduler stopped after ${this.tickCount} ticks`, undefined, 'SCHEDULER');
    }

    private fire(): void {
        this.tickCount++;
        try {
            this.onTick(this.tickCount);
        } catch (error) {
            // A faulty tick must not kill the interval
            bridgeLogger.error('Tick callback threw', {
                tick: this.tickCount,
                error: error instanceof Error ? error.message : String(error)
            }, 'SCHEDULER');
        }
    }
}
