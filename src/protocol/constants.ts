/**
 * BLE protocol constants for Moment devices.
 */

// Device identification
export const DEVICE_NAME = 'Moment';
export const IDENTITY_SETTINGS_KEY = 'moment-peripheral';

// Haptic timeline service
export const HAPTIC_TIMELINE_SERVICE_UUID = 'a28e9217-e9b5-4c0a-9217-1c64d051d762';
export const SETTINGS_CHARACTERISTIC_UUID = 'a28efc07-e9b5-4c0a-9217-1c64d051d762';
export const ACTUATOR_CHARACTERISTIC_UUID = 'a28efc05-e9b5-4c0a-9217-1c64d051d762';
export const PATTERN_TRIGGER_CHARACTERISTIC_UUID = 'a28efc08-e9b5-4c0a-9217-1c64d051d762';

// Nordic UART service, RX carries framed bytecode
export const UART_SERVICE_UUID = '6e400001-b5a3-f393-e0a9-e50e24dcca9e';
export const UART_RX_CHARACTERISTIC_UUID = '6e400002-b5a3-f393-e0a9-e50e24dcca9e';

// Device information service
export const DEVICE_INFORMATION_SERVICE_UUID = '0000180a-0000-1000-8000-00805f9b34fb';
export const FIRMWARE_REVISION_CHARACTERISTIC_UUID = '00002a26-0000-1000-8000-00805f9b34fb';
export const SERIAL_NUMBER_CHARACTERISTIC_UUID = '00002a25-0000-1000-8000-00805f9b34fb';

export const ADVERTISED_SERVICES = [HAPTIC_TIMELINE_SERVICE_UUID];

// Chunking constants
export const PACKET_SIZE = 20; // Maximum bytes per BLE write
export const MAX_PACKET_COUNT = 0xff; // Packet count header is a single byte
export const MAX_PAYLOAD_SIZE = MAX_PACKET_COUNT * PACKET_SIZE - 1; // 5099 bytes

// Timeouts (milliseconds)
export const SCAN_TIMEOUT_MS = 5000;
export const CONNECT_TIMEOUT_MS = 3000;

// Remote JavaScript compiler
export const COMPILER_URL = 'https://firmware.wearmoment.com/compile';

// Actuator limits
export const MAX_ACTUATOR_INTENSITY = 100;
export const MAX_ACTUATOR_DURATION_MS = 0xffff;
