/**
 * Frame Emitter
 *
 * Hands one encoded frame per tick to the transport. Never retries and never
 * rejects: a failed, slow or overlapping write is reported as
 * TRANSPORT_WRITE_FAILED and the next tick simply tries again with fresher data.
 */

import { CommandPair, LineSink } from './types';
import { TICK_PERIOD_MS } from './constants';
import { encodeFrame } from './FrameEncoder';
import { BridgeError, BridgeErrorCode, describeError } from './errors';
import { bridgeLogger } from '../shared/BridgeLogger';

export type EmitOutcome =
    | { ok: true; line: string }
    | { ok: false; error: BridgeError };

export interface EmitterStats {
    framesSent: number;
    writeFailures: number;
    lastError: string | null;
}

export class FrameEmitter {
    private writeInFlight = false;
    private framesSent = 0;
    private writeFailures = 0;
    private lastError: string | null = null;

    constructor(
        private readonly sink: LineSink,
        private readonly writeTimeoutMs: number = TICK_PERIOD_MS
    ) {}

    async emit(pair: CommandPair): Promise<EmitOutcome> {
        const line = encodeFrame(pair);

        if (this.writeInFlight) {
            return this.fail('Previous write still pending', line);
        }

        let pending: Promise<void>;
        try {
            pending = this.sink.writeLine(line);
        } catch (error) {
            return this.fail(describeError(error), line);
        }

        // The in-flight flag follows the real write, not the timeout race
        this.writeInFlight = true;
        const write = pending.finally(() => {
            this.writeInFlight = false;
        });

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () => reject(new Error(`Write timed out after ${this.writeTimeoutMs}ms`)),
                this.writeTimeoutMs
            );
        });

        try {
            await Promise.race([write, timeout]);
            this.framesSent++;
            bridgeLogger.debug(`>> ${line.trim()}`, undefined, 'EMITTER');
            return { ok: true, line };
        } catch (error) {
            return this.fail(describeError(error), line);
        } finally {
            clearTimeout(timer);
            // A write that lost the race may still reject later
            write.catch(() => undefined);
        }
    }

    getStats(): EmitterStats {
        return {
            framesSent: this.framesSent,
            writeFailures: this.writeFailures,
            lastError: this.lastError
        };
    }

    private fail(reason: string, line: string): EmitOutcome {
        this.writeFailures++;
        this.lastError = reason;

        const error = new BridgeError(
            BridgeErrorCode.TRANSPORT_WRITE_FAILED,
            `Write error: ${reason}`,
            { line: line.trim(), failures: this.writeFailures }
        );
        bridgeLogger.warn(error.message, error.details, 'EMITTER');
        return { ok: false, error };
    }
}
