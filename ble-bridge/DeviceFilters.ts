import { DeviceFilter, DiscoveredDevice, normalizeUuid } from './interfaces/ITransport';
import { MARIO_CONFIG, MICROBIT_CONFIG } from './BleBridgeConstants';

function advertises(device: DiscoveredDevice, serviceUuid: string): boolean {
  return device.serviceUuids.map(normalizeUuid).includes(normalizeUuid(serviceUuid));
}

/** Matches by advertised LEGO hub service or a name containing "mario". */
export const isMario: DeviceFilter = device =>
  advertises(device, MARIO_CONFIG.SERVICE_UUID)
  || device.name.toLowerCase().includes(MARIO_CONFIG.NAME_TAG);

/** Matches by advertised Nordic UART Service or a micro:bit name tag. */
export const isMicrobit: DeviceFilter = device =>
  advertises(device, MICROBIT_CONFIG.NUS_SERVICE_UUID)
  || MICROBIT_CONFIG.NAME_TAGS.some(tag => device.name.toLowerCase().includes(tag));
