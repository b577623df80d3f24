/**
 * Lists nearby BLE devices and reports whether a Mario and a micro:bit are in range.
 *
 * Run with: npx tsx scripts/scan-devices.ts
 */

import { NobleTransport, isMario, isMicrobit, BLE_CONFIG } from '../ble-bridge';
import { describeError } from '../signalProcessing';

async function main(): Promise<void> {
  const transport = new NobleTransport();
  await transport.initialize();

  console.log(`Scanning for Bluetooth LE devices (${BLE_CONFIG.DISCOVERY_SCAN_DURATION / 1000}s)…`);
  const devices = await transport.scan(BLE_CONFIG.DISCOVERY_SCAN_DURATION);

  for (const device of devices) {
    console.log(`- ${device.name || 'Unknown'} (${device.address}) UUIDs: [${device.serviceUuids.join(', ')}]`);
  }

  console.log('\nSummary:');
  console.log(devices.some(isMario) ? 'LEGO Mario found' : 'LEGO Mario not found');
  console.log(devices.some(isMicrobit) ? 'micro:bit found' : 'micro:bit not found');

  await transport.cleanup();
}

main().catch(error => {
  console.error('Scan failed:', describeError(error));
  process.exitCode = 1;
});
