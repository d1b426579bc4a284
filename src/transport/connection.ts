/**
 * BlueZ connection layer for Moment devices, built on node-ble.
 *
 * Provides the Central and Peripheral transport for Linux hosts:
 * - Discovery polling and known-device lookup
 * - Connection with timeout
 * - Characteristic reads and acknowledged writes
 */

import { createBluetooth } from 'node-ble';
import { BLEConnectionError, BLETimeoutError, DiscoveryError } from '../exceptions';
import type { Central, DiscoveryHandler, Peripheral } from './transport';

// The parts of the node-ble object model this layer calls. node-ble's own
// Adapter, Device and GATT types satisfy them.

export interface BleCharacteristic {
  readValue(): Promise<Buffer>;
  writeValueWithResponse(buffer: Buffer): Promise<void>;
}

export interface BleGattService {
  getCharacteristic(uuid: string): Promise<BleCharacteristic>;
}

export interface BleGattServer {
  services(): Promise<string[]>;
  getPrimaryService(uuid: string): Promise<BleGattService>;
}

export interface BleDevice {
  getName(): Promise<string>;
  isConnected(): Promise<boolean>;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  gatt(): Promise<BleGattServer>;
  on(event: 'disconnect', listener: () => void): unknown;
  removeListener(event: 'disconnect', listener: () => void): unknown;
}

export interface BleAdapter {
  devices(): Promise<string[]>;
  getDevice(uuid: string): Promise<BleDevice>;
  isDiscovering(): Promise<boolean>;
  startDiscovery(): Promise<void>;
  stopDiscovery(): Promise<void>;
}

/**
 * Central options.
 */
export interface NodeBleCentralOptions {
  /** How often the adapter's device list is polled while scanning (default: 250ms) */
  pollIntervalMs?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Read a device's name. BlueZ rejects the property read until the
 * peripheral's name has been seen in an advertisement or scan response.
 */
async function readName(device: BleDevice): Promise<string | undefined> {
  try {
    return await device.getName();
  } catch (error) {
    console.debug(`Device has no name yet: ${errorMessage(error)}`);
    return undefined;
  }
}

/**
 * A BlueZ device exposed as a transport peripheral.
 */
export class NodeBlePeripheral implements Peripheral {
  private gattServer: BleGattServer | null = null;
  private _name: string | undefined;
  // Bumped by every connect and disconnect; a late connection from an
  // older attempt is dropped.
  private attempt = 0;

  constructor(
    private readonly device: BleDevice,
    readonly id: string,
    name?: string
  ) {
    this._name = name;
  }

  /**
   * Look up a device's name and wrap it.
   */
  static async fromDevice(device: BleDevice, id: string): Promise<NodeBlePeripheral> {
    return new NodeBlePeripheral(device, id, await readName(device));
  }

  get name(): string | undefined {
    return this._name;
  }

  /**
   * Read the name again if BlueZ did not know it yet.
   */
  async refreshName(): Promise<string | undefined> {
    if (this._name === undefined) {
      this._name = await readName(this.device);
    }
    return this._name;
  }

  /**
   * Connect and resolve the GATT server.
   *
   * A connection that completes after the timeout is torn down.
   *
   * @throws {BLETimeoutError} If the timeout elapses first
   * @throws {BLEConnectionError} If BlueZ refuses the connection
   */
  async connect(timeoutMs: number): Promise<void> {
    const attempt = ++this.attempt;
    const opening = this.openGatt(attempt);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new BLETimeoutError(`Connection to ${this.id} timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });

    try {
      await Promise.race([opening, timeout]);
    } catch (error) {
      if (error instanceof BLETimeoutError) {
        const abandoned = ++this.attempt;
        void this.abandon(opening, abandoned);
        throw error;
      }
      throw new BLEConnectionError(`Failed to connect: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  async disconnect(): Promise<void> {
    this.attempt++;
    this.gattServer = null;
    try {
      await this.device.disconnect();
    } catch (error) {
      throw new BLEConnectionError(`Failed to disconnect: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Write with response.
   *
   * @throws {BLEConnectionError} If not connected or the write fails
   */
  async writeValue(serviceUuid: string, characteristicUuid: string, data: Uint8Array): Promise<void> {
    const server = this.requireGatt();
    try {
      const service = await server.getPrimaryService(serviceUuid);
      const characteristic = await service.getCharacteristic(characteristicUuid);
      await characteristic.writeValueWithResponse(Buffer.from(data));
    } catch (error) {
      throw new BLEConnectionError(
        `Failed to write ${characteristicUuid}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * @throws {BLEConnectionError} If not connected or the read fails
   */
  async readValue(serviceUuid: string, characteristicUuid: string): Promise<Uint8Array> {
    const server = this.requireGatt();
    try {
      const service = await server.getPrimaryService(serviceUuid);
      const characteristic = await service.getCharacteristic(characteristicUuid);
      return new Uint8Array(await characteristic.readValue());
    } catch (error) {
      throw new BLEConnectionError(
        `Failed to read ${characteristicUuid}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  onDisconnect(listener: () => void): () => void {
    const handler = (): void => {
      this.gattServer = null;
      listener();
    };
    this.device.on('disconnect', handler);
    return () => {
      this.device.removeListener('disconnect', handler);
    };
  }

  private async openGatt(attempt: number): Promise<void> {
    if (!(await this.device.isConnected())) {
      await this.device.connect();
    }
    const server = await this.device.gatt();
    if (attempt === this.attempt) {
      this.gattServer = server;
    }
  }

  /**
   * Wait out a timed-out connection attempt and drop the link it opened,
   * unless a newer connect or disconnect has taken over since.
   */
  private async abandon(opening: Promise<void>, abandoned: number): Promise<void> {
    try {
      await opening;
    } catch (error) {
      console.debug(`Timed out connection to ${this.id} failed: ${errorMessage(error)}`);
      return;
    }

    if (abandoned !== this.attempt) {
      return;
    }

    console.warn(`Connection to ${this.id} completed after timing out, disconnecting`);
    try {
      await this.device.disconnect();
    } catch (error) {
      console.warn(`Failed to drop late connection to ${this.id}: ${errorMessage(error)}`);
    }
  }

  private requireGatt(): BleGattServer {
    if (!this.gattServer) {
      throw new BLEConnectionError('Not connected to device');
    }
    return this.gattServer;
  }
}

/**
 * The default BlueZ adapter exposed as a transport central.
 *
 * BlueZ does not report advertised services through node-ble, so scan
 * results are filtered by the discovery handler alone; service UUIDs are
 * checked for already-connected peripherals.
 */
export class NodeBleCentral implements Central {
  private readonly pollIntervalMs: number;
  private readonly peripherals = new Map<string, NodeBlePeripheral>();

  constructor(
    private readonly adapter: BleAdapter,
    private readonly destroyBus: () => void = () => undefined,
    options: NodeBleCentralOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
  }

  async retrievePeripheral(id: string): Promise<Peripheral | null> {
    const known = await this.adapter.devices();
    if (!known.includes(id)) {
      return null;
    }
    return this.peripheralFor(id);
  }

  async retrieveConnectedPeripherals(serviceUuids: string[]): Promise<Peripheral[]> {
    const wanted = serviceUuids.map((uuid) => uuid.toLowerCase());
    const result: Peripheral[] = [];

    for (const id of await this.adapter.devices()) {
      const device = await this.adapter.getDevice(id);
      if (!(await device.isConnected())) {
        continue;
      }

      const server = await device.gatt();
      const services = (await server.services()).map((uuid) => uuid.toLowerCase());
      if (wanted.some((uuid) => services.includes(uuid))) {
        result.push(await this.peripheralFor(id));
      }
    }
    return result;
  }

  /**
   * Poll the adapter's device list while discovery runs.
   *
   * A device is reported once BlueZ knows its name; unnamed devices are
   * looked at again on every poll.
   *
   * @throws {DiscoveryError} If discovery cannot be started
   */
  async scan(_serviceUuids: string[], timeoutMs: number, onDiscover: DiscoveryHandler): Promise<void> {
    const startedHere = !(await this.adapter.isDiscovering());
    if (startedHere) {
      try {
        await this.adapter.startDiscovery();
      } catch (error) {
        throw new DiscoveryError(`Failed to start discovery: ${errorMessage(error)}`, { cause: error });
      }
    }

    const reported = new Set<string>();
    const deadline = Date.now() + timeoutMs;

    try {
      while (Date.now() < deadline) {
        for (const id of await this.adapter.devices()) {
          if (reported.has(id)) {
            continue;
          }
          const peripheral = await this.peripheralFor(id);
          if (peripheral.name === undefined) {
            continue;
          }
          reported.add(id);
          if (onDiscover(peripheral)) {
            return;
          }
        }
        await delay(Math.min(this.pollIntervalMs, Math.max(deadline - Date.now(), 0)));
      }
    } finally {
      if (startedHere) {
        await this.adapter.stopDiscovery();
      }
    }
  }

  /**
   * Release the D-Bus connection.
   */
  destroy(): void {
    this.peripherals.clear();
    this.destroyBus();
  }

  private async peripheralFor(id: string): Promise<NodeBlePeripheral> {
    const cached = this.peripherals.get(id);
    if (cached) {
      await cached.refreshName();
      return cached;
    }
    const device = await this.adapter.getDevice(id);
    const peripheral = await NodeBlePeripheral.fromDevice(device, id);
    this.peripherals.set(id, peripheral);
    return peripheral;
  }
}

/**
 * Open the system D-Bus and wrap the default BlueZ adapter.
 *
 * @throws {BLEConnectionError} If no adapter is available
 *
 * @example
 * ```typescript
 * const central = await createNodeBleCentral();
 * const manager = new MomentManager({ central });
 * ```
 */
export async function createNodeBleCentral(options: NodeBleCentralOptions = {}): Promise<NodeBleCentral> {
  const { bluetooth, destroy } = createBluetooth();
  try {
    const adapter = await bluetooth.defaultAdapter();
    return new NodeBleCentral(adapter, destroy, options);
  } catch (error) {
    destroy();
    throw new BLEConnectionError(`No Bluetooth adapter available: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
