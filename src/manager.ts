/**
 * Connection manager binding a single Moment device.
 */

import { CompilerClient } from './compiler/compiler-client';
import { MomentDevice } from './device';
import { discoverDevices, isMomentPeripheral } from './discovery';
import { DiscoveryError, NotConnectedError, UnexpectedDeviceError } from './exceptions';
import {
  ADVERTISED_SERVICES,
  CONNECT_TIMEOUT_MS,
  DEVICE_NAME,
  SCAN_TIMEOUT_MS,
} from './protocol/constants';
import { MemoryIdentityStore, type IdentityStore } from './storage/identity-store';
import type { Central, Peripheral } from './transport/transport';

/**
 * Connection manager options.
 */
export interface MomentManagerOptions {
  /** Host BLE central */
  central: Central;

  /** Where the bound device identity is persisted (default: in memory) */
  identityStore?: IdentityStore;

  /** Advertised name to match (default: DEVICE_NAME) */
  deviceName?: string;

  /** Scan window in milliseconds (default: SCAN_TIMEOUT_MS) */
  scanTimeoutMs?: number;

  /** Connection timeout in milliseconds (default: CONNECT_TIMEOUT_MS) */
  connectTimeoutMs?: number;

  /** Compiler shared by every device session */
  compiler?: CompilerClient;
}

/**
 * Resolves a Moment peripheral and binds it to a device session.
 *
 * Construct one per application and keep it for the process lifetime.
 *
 * @example
 * ```typescript
 * const manager = new MomentManager({
 *   central: await createNodeBleCentral(),
 *   identityStore: new FileIdentityStore('./moment-settings.json'),
 * });
 * const device = await manager.connect();
 * await device.triggerPattern(Trigger.CONFETTI);
 * ```
 */
export class MomentManager {
  private readonly central: Central;
  private readonly identityStore: IdentityStore;
  private readonly deviceName: string;
  private readonly scanTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly compiler: CompilerClient;
  private _device: MomentDevice | null = null;
  private operations: Promise<unknown> = Promise.resolve();

  constructor(options: MomentManagerOptions) {
    this.central = options.central;
    this.identityStore = options.identityStore ?? new MemoryIdentityStore();
    this.deviceName = options.deviceName ?? DEVICE_NAME;
    this.scanTimeoutMs = options.scanTimeoutMs ?? SCAN_TIMEOUT_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
    this.compiler = options.compiler ?? new CompilerClient();
  }

  /**
   * Currently bound device session, if any.
   */
  get device(): MomentDevice | null {
    return this._device;
  }

  /**
   * Currently bound and connected device session.
   *
   * @throws {NotConnectedError} If no device is connected
   */
  requireDevice(): MomentDevice {
    if (!this._device || !this._device.isConnected) {
      throw new NotConnectedError('Not connected to Moment peripheral');
    }
    return this._device;
  }

  /**
   * Resolve and connect a Moment device.
   *
   * Tries, in order: the persisted identity, peripherals already connected
   * to the host, then a bounded scan. The first match found by the scan
   * stops it and becomes the persisted identity.
   *
   * @returns Connected device session
   * @throws {UnexpectedDeviceError} If the resolved peripheral has another name
   * @throws {DiscoveryError} If no device is found or the scan fails
   * @throws {BLEConnectionError} If connection fails
   */
  connect(): Promise<MomentDevice> {
    return this.exclusive(() => this.resolveAndConnect());
  }

  /**
   * Disconnect the bound device, if any.
   */
  disconnect(): Promise<void> {
    return this.exclusive(async () => {
      const device = this._device;
      this._device = null;
      if (device) {
        await device.disconnect();
      }
    });
  }

  /**
   * Forget the persisted device identity so the next connect scans again.
   */
  forget(): Promise<void> {
    return this.exclusive(async () => {
      await this.identityStore.clear();
      console.log('Forgot stored Moment peripheral');
    });
  }

  /**
   * Find every available Moment device, each as an independent session.
   *
   * @throws {DiscoveryError} If the scan fails
   */
  retrieveAvailableDevices(): Promise<MomentDevice[]> {
    return discoverDevices(this.central, {
      deviceName: this.deviceName,
      scanTimeoutMs: this.scanTimeoutMs,
      connectTimeoutMs: this.connectTimeoutMs,
      compiler: this.compiler,
    });
  }

  /**
   * Run an operation after every previously started one has settled.
   */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.operations.then(operation, operation);
    this.operations = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async resolveAndConnect(): Promise<MomentDevice> {
    const storedId = await this.identityStore.load();
    if (storedId) {
      const peripheral = await this.central.retrievePeripheral(storedId);
      if (peripheral) {
        console.log(`Reconnecting to stored peripheral ${storedId}`);
        return this.bind(peripheral);
      }
      console.warn(`Stored peripheral ${storedId} is unknown to the host, searching again`);
    }

    const connected = await this.central.retrieveConnectedPeripherals(ADVERTISED_SERVICES);
    const alreadyConnected = connected.find((peripheral) =>
      isMomentPeripheral(peripheral, this.deviceName)
    );
    if (alreadyConnected) {
      console.log(`Using peripheral ${alreadyConnected.id} already connected to the host`);
      await this.storeIdentity(alreadyConnected);
      return this.bind(alreadyConnected);
    }

    const discovered = await this.scanForDevice();
    await this.storeIdentity(discovered);
    return this.bind(discovered);
  }

  private async scanForDevice(): Promise<Peripheral> {
    let match: Peripheral | null = null;

    try {
      await this.central.scan(ADVERTISED_SERVICES, this.scanTimeoutMs, (peripheral) => {
        if (isMomentPeripheral(peripheral, this.deviceName)) {
          match = peripheral;
          return true;
        }
        return false;
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DiscoveryError(`Failed to discover ${this.deviceName} peripheral: ${message}`, {
        cause: error,
      });
    }

    if (!match) {
      throw new DiscoveryError(`Failed to discover ${this.deviceName} peripheral.`);
    }
    return match;
  }

  private async storeIdentity(peripheral: Peripheral): Promise<void> {
    await this.identityStore.save(peripheral.id);
    console.log(`Stored ${peripheral.id} as known Moment peripheral`);
  }

  /**
   * Connect a peripheral, validate its name and make it the bound session.
   */
  private async bind(peripheral: Peripheral): Promise<MomentDevice> {
    if (this._device && this._device.id === peripheral.id) {
      await this._device.connect();
      return this._device;
    }

    const device = new MomentDevice(peripheral, {
      connectTimeoutMs: this.connectTimeoutMs,
      compiler: this.compiler,
    });
    await device.connect();

    if (!isMomentPeripheral(peripheral, this.deviceName)) {
      await device.disconnect();
      throw new UnexpectedDeviceError(`Unexpectedly connected to ${peripheral.name ?? 'Unknown'}.`);
    }

    if (this._device) {
      await this._device.disconnect();
    }
    this._device = device;
    return device;
  }
}
