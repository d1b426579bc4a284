/**
 * BLE discovery of Moment devices.
 */

import { MomentDevice, type MomentDeviceOptions } from './device';
import { DiscoveryError } from './exceptions';
import { ADVERTISED_SERVICES, DEVICE_NAME, SCAN_TIMEOUT_MS } from './protocol/constants';
import type { Central, Peripheral } from './transport/transport';

export interface DiscoveryOptions extends MomentDeviceOptions {
  /** Advertised name to match (default: DEVICE_NAME) */
  deviceName?: string;

  /** Scan window in milliseconds (default: SCAN_TIMEOUT_MS) */
  scanTimeoutMs?: number;
}

/**
 * Check whether a peripheral advertises the expected device name.
 */
export function isMomentPeripheral(
  peripheral: Peripheral,
  deviceName: string = DEVICE_NAME
): boolean {
  return peripheral.name === deviceName;
}

/**
 * Find every available Moment device.
 *
 * Collects the matching peripherals already connected to the host, then
 * scans for the whole scan window and adds every matching advertiser.
 * Peripherals are de-duplicated by id and each is wrapped in its own,
 * not yet connected, MomentDevice.
 *
 * @param central - Host BLE central
 * @param options - Name, scan window and per-device options
 * @returns Devices in the order they were first seen
 * @throws {DiscoveryError} If the scan fails
 *
 * @example
 * ```typescript
 * const devices = await discoverDevices(central);
 * await Promise.all(devices.map((device) => device.connect()));
 * ```
 */
export async function discoverDevices(
  central: Central,
  options: DiscoveryOptions = {}
): Promise<MomentDevice[]> {
  const deviceName = options.deviceName ?? DEVICE_NAME;
  const found = new Map<string, Peripheral>();

  const connected = await central.retrieveConnectedPeripherals(ADVERTISED_SERVICES);
  for (const peripheral of connected) {
    if (isMomentPeripheral(peripheral, deviceName) && !found.has(peripheral.id)) {
      found.set(peripheral.id, peripheral);
    }
  }

  try {
    await central.scan(ADVERTISED_SERVICES, options.scanTimeoutMs ?? SCAN_TIMEOUT_MS, (peripheral) => {
      if (isMomentPeripheral(peripheral, deviceName) && !found.has(peripheral.id)) {
        found.set(peripheral.id, peripheral);
      }
      return false;
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DiscoveryError(`Failed to discover ${deviceName} peripherals: ${message}`, {
      cause: error,
    });
  }

  console.log(`Discovered ${found.size} ${deviceName} device(s)`);

  return [...found.values()].map((peripheral) => new MomentDevice(peripheral, options));
}
