/**
 * Axis shaping - pure per-axis response curve
 *
 * normalise → deadzone (slope-continuous) → expo → inversion
 * Every step maps [-1, 1] into [-1, 1].
 */

import { AxisShape } from './types';

export function clamp(value: number, lo: number = -1, hi: number = 1): number {
    if (Number.isNaN(value)) return 0;
    return value > hi ? hi : value < lo ? lo : value;
}

export function normalize(value: number, scale: number): number {
    return clamp(value / scale);
}

/**
 * Zeroes the band around centre and rescales the rest so the output
 * starts from 0 at the boundary.
 */
export function applyDeadzone(value: number, deadzone: number): number {
    const magnitude = Math.abs(value);
    if (magnitude < deadzone) return 0;
    return Math.sign(value) * (magnitude - deadzone) / (1 - deadzone);
}

export function applyExpo(value: number, expo: number): number {
    if (expo === 1) return value;
    return Math.sign(value) * Math.pow(Math.abs(value), expo);
}

export function shapeAxis(value: number, shape: AxisShape): number {
    const normalized = normalize(value, shape.scale);
    const shaped = clamp(applyExpo(applyDeadzone(normalized, shape.deadzone), shape.expo));
    const output = shape.invert ? -shaped : shaped;
    // Collapse -0 so frames never carry a signed zero
    return output === 0 ? 0 : output;
}
