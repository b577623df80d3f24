import { BridgeConfig } from './types';
import { DEFAULT_BRIDGE_CONFIG } from './constants';
import { BridgeError, BridgeErrorCode } from './errors';

/**
 * Creates the process-wide bridge configuration.
 * Overrides are merged onto the defaults, validated, then frozen.
 */
export function createBridgeConfig(overrides: Partial<BridgeConfig> = {}): Readonly<BridgeConfig> {
    const config: BridgeConfig = { ...DEFAULT_BRIDGE_CONFIG, ...overrides };
    validateBridgeConfig(config);
    return Object.freeze(config);
}

export function validateBridgeConfig(config: BridgeConfig): void {
    const problems = collectConfigProblems(config);
    if (problems.length > 0) {
        throw new BridgeError(
            BridgeErrorCode.CONFIGURATION_INVALID,
            `Invalid bridge configuration: ${problems.join('; ')}`,
            { problems }
        );
    }
}

function collectConfigProblems(config: BridgeConfig): string[] {
    const problems: string[] = [];

    for (const key of ['xScale', 'zScale', 'deadzone', 'expo'] as const) {
        if (!Number.isFinite(config[key])) {
            problems.push(`${key} must be a finite number (got ${config[key]})`);
        }
    }
    if (problems.length > 0) return problems;

    if (config.xScale <= 0) problems.push(`xScale must be > 0 (got ${config.xScale})`);
    if (config.zScale <= 0) problems.push(`zScale must be > 0 (got ${config.zScale})`);
    if (config.deadzone < 0 || config.deadzone >= 1) {
        problems.push(`deadzone must be in [0, 1) (got ${config.deadzone})`);
    }
    if (config.expo < 1) problems.push(`expo must be >= 1 (got ${config.expo})`);

    return problems;
}
