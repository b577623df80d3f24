/**
 * Wire frame codec: "<throttle>,<steer>:\n"
 *
 * The actuator reads a byte stream and only treats a line as complete once
 * it sees the colon, so the terminator must always be present.
 */

import { CommandPair } from './types';
import { FRAME, FRAME_PRECISION } from './constants';
import { clamp } from './AxisShaper';
import { BridgeError, BridgeErrorCode } from './errors';

function formatValue(value: number, precision: number): string {
    const text = clamp(value).toFixed(precision);
    // (-0.001).toFixed(2) yields "-0.00"
    return Number(text) === 0 ? (0).toFixed(precision) : text;
}

export function encodeFrame(pair: CommandPair, precision: number = FRAME_PRECISION): string {
    return formatValue(pair.throttle, precision)
        + FRAME.SEPARATOR
        + formatValue(pair.steer, precision)
        + FRAME.TERMINATOR
        + FRAME.LINE_END;
}

/**
 * Decodes a frame the way the actuator does. Used for diagnostics and tests;
 * the bridge itself never reads frames.
 */
export function decodeFrame(line: string): CommandPair {
    const trimmed = line.trim();
    if (!trimmed.endsWith(FRAME.TERMINATOR)) {
        throw new BridgeError(BridgeErrorCode.FRAME_MALFORMED, `Frame is missing its terminator: ${JSON.stringify(line)}`);
    }

    const parts = trimmed.slice(0, -FRAME.TERMINATOR.length).split(FRAME.SEPARATOR);
    if (parts.length !== 2) {
        throw new BridgeError(BridgeErrorCode.FRAME_MALFORMED, `Frame must carry two values: ${JSON.stringify(line)}`);
    }

    const [throttle, steer] = parts.map(part => Number.parseFloat(part));
    if (!Number.isFinite(throttle) || !Number.isFinite(steer)) {
        throw new BridgeError(BridgeErrorCode.FRAME_MALFORMED, `Frame values are not numbers: ${JSON.stringify(line)}`);
    }

    return { throttle, steer };
}
