/**
 * BLE Bridge - sensor and actuator edge of the tilt bridge
 *
 * LEGO Mario (IMU notifications) → SampleSource
 * micro:bit (Nordic UART Service) ← LineSink
 */

export { NobleTransport } from './transports/NobleTransport';
export { MarioSensor, decodeImuPacket } from './MarioSensor';
export { MicrobitUart, selectWritableCharacteristic } from './MicrobitUart';
export { isMario, isMicrobit } from './DeviceFilters';
export { normalizeUuid } from './interfaces/ITransport';

export type {
  ITransport,
  IPeripheral,
  IService,
  ICharacteristic,
  CharacteristicProperties,
  PeripheralState,
  DiscoveredDevice,
  DeviceFilter,
} from './interfaces/ITransport';

export {
  MARIO_CONFIG,
  MICROBIT_CONFIG,
  IMU_PACKET,
  BLE_CONFIG,
  TIMING,
} from './BleBridgeConstants';
