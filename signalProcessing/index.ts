/**
 * Signal processing - public API
 *
 * Raw tilt samples in, fixed-rate command frames out.
 */

export { BridgeCoordinator } from './BridgeCoordinator';
export { SignalConditioner, NEUTRAL_PAIR, isFiniteSample } from './SignalConditioner';
export { Calibrator } from './Calibrator';
export { NotificationIngestor } from './NotificationIngestor';
export { TickScheduler } from './TickScheduler';
export { FrameEmitter } from './FrameEmitter';
export { encodeFrame, decodeFrame } from './FrameEncoder';
export { clamp, normalize, applyDeadzone, applyExpo, shapeAxis } from './AxisShaper';
export { createBridgeConfig, validateBridgeConfig } from './config';
export { BridgeError, BridgeErrorCode, isBridgeError, describeError } from './errors';

export {
    SMOOTHING_ALPHA,
    TICK_PERIOD_MS,
    CALIBRATION_WINDOW_MS,
    RAW_SAMPLE_LIMIT,
    FRAME_PRECISION,
    FRAME,
    DEFAULT_BRIDGE_CONFIG
} from './constants';

export type {
    RawSample,
    Bias,
    FilterState,
    CommandPair,
    CommandSnapshot,
    BridgeConfig,
    AxisShape,
    ConditionerState,
    ConditionerPhase,
    SampleListener,
    SampleSource,
    LineSink
} from './types';

export type { BridgeStats, CoordinatorOptions, BridgeCoordinatorEvents } from './BridgeCoordinator';
export type { EmitOutcome, EmitterStats } from './FrameEmitter';
export type { ConditionerStats } from './SignalConditioner';
export type { IngestorStats } from './NotificationIngestor';
