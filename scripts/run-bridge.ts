/**
 * Tilt bridge: LEGO Mario → micro:bit analog stream
 * Streams "<throttle>,<steer>:\n" every 100ms, each value in [-1, 1].
 *
 * Run with: npx tsx scripts/run-bridge.ts [--x-scale 30] [--z-scale 30]
 *   [--deadzone 0.1] [--expo 1.4] [--invert-x] [--invert-z] [--scan-timeout 8]
 */

import { NobleTransport, MarioSensor, MicrobitUart, isMario, isMicrobit } from '../ble-bridge';
import { BridgeCoordinator, BridgeError, BridgeErrorCode, createBridgeConfig, describeError } from '../signalProcessing';
import { bridgeLogger } from '../shared/BridgeLogger';
import { parseBridgeArgs } from './bridgeArgs';

async function connectOrLog(device: MarioSensor | MicrobitUart, phase: string): Promise<void> {
  try {
    await device.connect();
  } catch (error) {
    bridgeLogger.logConnectionError(device.name, phase, error);
    throw error;
  }
}

async function main(): Promise<void> {
  const args = parseBridgeArgs(process.argv.slice(2));
  const config = createBridgeConfig(args.config);
  bridgeLogger.info('Bridge configuration', config);

  const transport = new NobleTransport();
  let sensor: MarioSensor | null = null;
  let uart: MicrobitUart | null = null;
  let coordinator: BridgeCoordinator | null = null;

  const shutdown = async (): Promise<void> => {
    coordinator?.stop();
    for (const device of [sensor, uart]) {
      if (!device) continue;
      try {
        await device.disconnect();
      } catch (error) {
        bridgeLogger.warn(`Disconnect failed for ${device.name}`, { error: describeError(error) }, 'BLE');
      }
    }
    await transport.cleanup();
    bridgeLogger.close();
  };

  try {
    await transport.initialize();

    bridgeLogger.info(`Scanning for Mario… (≤${args.scanTimeoutMs / 1000}s)`, undefined, 'BLE');
    const marioPeripheral = await transport.findDevice(isMario, args.scanTimeoutMs);
    if (!marioPeripheral) {
      throw new BridgeError(BridgeErrorCode.DEVICE_NOT_FOUND, 'Mario not found. Press Mario’s Bluetooth button and retry.');
    }
    sensor = new MarioSensor(marioPeripheral);
    await connectOrLog(sensor, 'Sensor connect');

    coordinator = new BridgeCoordinator(config, sensor);
    coordinator.on('writeFailed', error => {
      bridgeLogger.debug(`Dropped tick: ${error.message}`, undefined, 'EMITTER');
    });
    await coordinator.calibrate();

    bridgeLogger.info(`Scanning for micro:bit… (≤${args.scanTimeoutMs / 1000}s)`, undefined, 'BLE');
    const microbitPeripheral = await transport.findDevice(isMicrobit, args.scanTimeoutMs);
    if (!microbitPeripheral) {
      throw new BridgeError(
        BridgeErrorCode.DEVICE_NOT_FOUND,
        'micro:bit not found. Make sure BLE UART is running and the board is not paired with the OS.'
      );
    }
    uart = new MicrobitUart(microbitPeripheral);
    await connectOrLog(uart, 'UART connect');

    coordinator.startStreaming(uart);
    bridgeLogger.info('Streaming analog values at 100ms. Ctrl+C to quit.');
    if (bridgeLogger.getLogPath()) {
      bridgeLogger.info(`Session log: ${bridgeLogger.getLogPath()}`);
    }
  } catch (error) {
    bridgeLogger.error(describeError(error), error instanceof BridgeError ? { code: error.code } : undefined);
    await shutdown();
    process.exitCode = 1;
    return;
  }

  const onSignal = (signal: NodeJS.Signals) => {
    bridgeLogger.info(`Received ${signal}, shutting down`);
    shutdown().catch(error => {
      console.error('Shutdown failed:', describeError(error));
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch(error => {
  console.error('Fatal:', describeError(error));
  process.exitCode = 1;
});
