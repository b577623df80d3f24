import { parseArgs } from 'util';
import { BridgeConfig } from '../signalProcessing/types';
import { BLE_CONFIG } from '../ble-bridge/BleBridgeConstants';

export interface BridgeArgs {
  config: Partial<BridgeConfig>;
  scanTimeoutMs: number;
}

const NUMERIC_FLAGS = [
  ['x-scale', 'xScale'],
  ['z-scale', 'zScale'],
  ['deadzone', 'deadzone'],
  ['expo', 'expo'],
] as const;

/**
 * Maps command-line flags onto config overrides. Only flags that were given
 * become overrides; validation happens in createBridgeConfig.
 */
export function parseBridgeArgs(argv: string[]): BridgeArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      'x-scale': { type: 'string' },
      'z-scale': { type: 'string' },
      'deadzone': { type: 'string' },
      'expo': { type: 'string' },
      'invert-x': { type: 'boolean', default: false },
      'invert-z': { type: 'boolean', default: false },
      'scan-timeout': { type: 'string' },
    },
    strict: true,
  });

  const config: { -readonly [K in keyof BridgeConfig]?: BridgeConfig[K] } = {
    invertX: values['invert-x'] === true,
    invertZ: values['invert-z'] === true,
  };

  for (const [flag, key] of NUMERIC_FLAGS) {
    const raw = values[flag];
    if (raw !== undefined) {
      config[key] = Number(raw);
    }
  }

  const scanTimeout = values['scan-timeout'];
  const scanTimeoutSeconds = scanTimeout === undefined ? NaN : Number(scanTimeout);
  const scanTimeoutMs = Number.isFinite(scanTimeoutSeconds) && scanTimeoutSeconds > 0
    ? scanTimeoutSeconds * 1000
    : BLE_CONFIG.SCAN_TIMEOUT;

  return { config, scanTimeoutMs };
}
