/**
 * BLE Bridge Constants - LEGO Mario (sensor) and micro:bit (actuator) protocol
 */

export const MARIO_CONFIG = {
  // LEGO Wireless Protocol hub service; IMU notifications arrive on its characteristic
  SERVICE_UUID: '00001623-1212-efde-1623-785feabcd123',
  CHARACTERISTIC_UUID: '00001624-1212-efde-1623-785feabcd123',

  NAME_TAG: 'mario',

  // Port input format setup for the IMU port (0x00) and the RGB scanner port (0x01)
  SUBSCRIBE_IMU: [0x0a, 0x00, 0x41, 0x00, 0x00, 0x05, 0x00, 0x00, 0x00, 0x01],
  SUBSCRIBE_RGB: [0x0a, 0x00, 0x41, 0x01, 0x00, 0x05, 0x00, 0x00, 0x00, 0x01],
} as const;

export const IMU_PACKET = {
  HEADER: 0x07,
  MIN_LENGTH: 7,
  X_OFFSET: 4,
  Z_OFFSET: 6,
} as const;

export const MICROBIT_CONFIG = {
  // Nordic UART Service
  NUS_SERVICE_UUID: '6e400001-b5a3-f393-e0a9-e50e24dcca9e',
  NAME_TAGS: ['bbc micro:bit', 'micro:bit'],
} as const;

export const BLE_CONFIG = {
  SCAN_TIMEOUT: 8000,         // Find-device timeout per device
  DISCOVERY_SCAN_DURATION: 5000,
  ADAPTER_READY_TIMEOUT: 15000,
  CONNECTION_TIMEOUT: 30000,
} as const;

export const TIMING = {
  SUBSCRIBE_SETTLE_DELAY: 200,  // Between notify enable and each port subscription
  POST_SUBSCRIBE_DELAY: 300,    // Let the first IMU packets arrive before calibrating
} as const;
