import { BridgeConfig } from './types';

/** EMA coefficient; settles within a few tick periods at typical notify rates. */
export const SMOOTHING_ALPHA = 0.2;

export const TICK_PERIOD_MS = 100;

export const CALIBRATION_WINDOW_MS = 500;

/** Finite raw readings beyond this magnitude are clamped before centring. */
export const RAW_SAMPLE_LIMIT = 1e6;

export const FRAME_PRECISION = 2;

export const FRAME = {
    SEPARATOR: ',',
    TERMINATOR: ':',
    LINE_END: '\n'
} as const;

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
    xScale: 30.0,
    zScale: 30.0,
    deadzone: 0.10,
    expo: 1.4,
    invertX: false,
    invertZ: false
};
