/**
 * Bridge error taxonomy
 * Recoverable errors are counted and logged; the rest abort startup.
 */

export enum BridgeErrorCode {
    // Startup
    INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
    CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',

    // Steady state
    TRANSPORT_WRITE_FAILED = 'TRANSPORT_WRITE_FAILED',
    NON_FINITE_SAMPLE = 'NON_FINITE_SAMPLE',

    // Programming / protocol errors
    INVALID_TRANSITION = 'INVALID_TRANSITION',
    FRAME_MALFORMED = 'FRAME_MALFORMED',

    // BLE edge
    DEVICE_NOT_FOUND = 'DEVICE_NOT_FOUND',
    BLUETOOTH_UNAVAILABLE = 'BLUETOOTH_UNAVAILABLE',
    SERVICE_NOT_FOUND = 'SERVICE_NOT_FOUND'
}

const RECOVERABLE_CODES: ReadonlySet<BridgeErrorCode> = new Set([
    BridgeErrorCode.TRANSPORT_WRITE_FAILED,
    BridgeErrorCode.NON_FINITE_SAMPLE
]);

export class BridgeError extends Error {
    readonly code: BridgeErrorCode;
    readonly recoverable: boolean;
    readonly details?: Record<string, unknown>;
    readonly timestamp: number;

    constructor(code: BridgeErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'BridgeError';
        this.code = code;
        this.recoverable = RECOVERABLE_CODES.has(code);
        this.details = details;
        this.timestamp = Date.now();
    }
}

export function isBridgeError(error: unknown, code?: BridgeErrorCode): error is BridgeError {
    return error instanceof BridgeError && (code === undefined || error.code === code);
}

/** Extracts a printable message from anything thrown. */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
