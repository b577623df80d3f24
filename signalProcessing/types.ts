/** Two sensor-native tilt readings from one notification. */
export interface RawSample {
    roll: number;
    pitch: number;
}

/** Zero reference removed from every sample once calibration completes. */
export interface Bias {
    readonly roll: number;
    readonly pitch: number;
}

/** Exponentially smoothed, bias-centred axis values. */
export interface FilterState {
    emaX: number;
    emaZ: number;
}

/** Analog command pair, each component in [-1, 1]. */
export interface CommandPair {
    readonly throttle: number;
    readonly steer: number;
}

export interface CommandSnapshot {
    readonly pair: CommandPair;
    /** Increments once per accepted sample; 0 until the first one. */
    readonly version: number;
    readonly updatedAt: number;
}

export interface BridgeConfig {
    /** Steering sensitivity: larger means less sensitive. */
    readonly xScale: number;
    /** Throttle sensitivity: larger means less sensitive. */
    readonly zScale: number;
    readonly deadzone: number;
    /** 1.0 is linear, above 1 softens the centre. */
    readonly expo: number;
    readonly invertX: boolean;
    readonly invertZ: boolean;
}

export interface AxisShape {
    scale: number;
    deadzone: number;
    expo: number;
    invert: boolean;
}

export type ConditionerState =
    | { phase: 'uncalibrated' }
    | { phase: 'calibrating' }
    | { phase: 'active'; bias: Bias; filter: FilterState };

export type ConditionerPhase = ConditionerState['phase'];

// Transport capabilities borrowed from the BLE edge

export type SampleListener = (sample: RawSample) => void;

export interface SampleSource {
    /** Registers a listener and returns its unsubscribe function. */
    subscribe(listener: SampleListener): () => void;
}

export interface LineSink {
    writeLine(line: string): Promise<void>;
}
