import { describe, expect, it } from 'vitest';
import { BLEConnectionError, BLETimeoutError } from '../exceptions';
import type { Peripheral } from './transport';
import {
  NodeBleCentral,
  type BleAdapter,
  type BleCharacteristic,
  type BleDevice,
  type BleGattServer,
  type BleGattService,
} from './connection';

const SERVICE = '6e400001-b5a3-f393-e0a9-e50e24dcca9e';
const RX = '6e400002-b5a3-f393-e0a9-e50e24dcca9e';

function flush(): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, 0));
}

class FakeCharacteristic implements BleCharacteristic {
  readonly written: Buffer[] = [];
  value = Buffer.alloc(0);
  writeError: Error | null = null;

  async readValue(): Promise<Buffer> {
    return this.value;
  }

  async writeValueWithResponse(buffer: Buffer): Promise<void> {
    if (this.writeError) {
      throw this.writeError;
    }
    this.written.push(buffer);
  }
}

class FakeGattServer implements BleGattServer, BleGattService {
  readonly rx = new FakeCharacteristic();

  constructor(private readonly serviceUuids: string[]) {}

  async services(): Promise<string[]> {
    return this.serviceUuids;
  }

  async getPrimaryService(uuid: string): Promise<BleGattService> {
    if (!this.serviceUuids.includes(uuid)) {
      throw new Error(`No service ${uuid}`);
    }
    return this;
  }

  async getCharacteristic(uuid: string): Promise<BleCharacteristic> {
    if (uuid !== RX) {
      throw new Error(`No characteristic ${uuid}`);
    }
    return this.rx;
  }
}

class FakeDevice implements BleDevice {
  name: string | undefined;
  connected = false;
  getNameCalls = 0;
  disconnectCalls = 0;
  holdConnect = false;
  readonly server: FakeGattServer;

  private releaseConnect: (() => void) | null = null;
  private listeners = new Set<() => void>();

  constructor(name: string | undefined, services: string[] = [SERVICE]) {
    this.name = name;
    this.server = new FakeGattServer(services);
  }

  async getName(): Promise<string> {
    this.getNameCalls++;
    if (this.name === undefined) {
      throw new Error('No such property Name');
    }
    return this.name;
  }

  async isConnected(): Promise<boolean> {
    return this.connected;
  }

  async connect(): Promise<void> {
    if (this.holdConnect) {
      await new Promise<void>((resolve) => {
        this.releaseConnect = resolve;
      });
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.connected = false;
  }

  async gatt(): Promise<BleGattServer> {
    return this.server;
  }

  on(_event: 'disconnect', listener: () => void): this {
    this.listeners.add(listener);
    return this;
  }

  removeListener(_event: 'disconnect', listener: () => void): this {
    this.listeners.delete(listener);
    return this;
  }

  finishConnect(): void {
    this.releaseConnect?.();
  }

  dropLink(): void {
    this.connected = false;
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}

class FakeAdapter implements BleAdapter {
  readonly byId = new Map<string, FakeDevice>();
  discovering = false;
  startCalls = 0;
  stopCalls = 0;

  async devices(): Promise<string[]> {
    return [...this.byId.keys()];
  }

  async getDevice(uuid: string): Promise<BleDevice> {
    const device = this.byId.get(uuid);
    if (!device) {
      throw new Error(`Unknown device ${uuid}`);
    }
    return device;
  }

  async isDiscovering(): Promise<boolean> {
    return this.discovering;
  }

  async startDiscovery(): Promise<void> {
    this.startCalls++;
    this.discovering = true;
  }

  async stopDiscovery(): Promise<void> {
    this.stopCalls++;
    this.discovering = false;
  }
}

async function connectedPeripheral(
  adapter: FakeAdapter,
  central: NodeBleCentral,
  id: string
): Promise<Peripheral> {
  const peripheral = await central.retrievePeripheral(id);
  if (!peripheral) {
    throw new Error(`Peripheral ${id} not found`);
  }
  await peripheral.connect(1000);
  expect(adapter.byId.get(id)?.connected).toBe(true);
  return peripheral;
}

describe('NodeBleCentral', () => {
  describe('scan', () => {
    it('reports a device once BlueZ knows its name', async () => {
      const adapter = new FakeAdapter();
      const device = new FakeDevice(undefined);
      adapter.byId.set('AA:01', device);
      const central = new NodeBleCentral(adapter, undefined, { pollIntervalMs: 5 });
      const seen: Array<string | undefined> = [];

      const scanning = central.scan([SERVICE], 1000, (peripheral) => {
        seen.push(peripheral.name);
        return peripheral.name === 'Moment';
      });
      await new Promise<void>((resolve) => setTimeout(resolve, 20));
      device.name = 'Moment';
      await scanning;

      expect(seen).toEqual(['Moment']);
      expect(device.getNameCalls).toBeGreaterThan(1);
      expect(adapter.startCalls).toBe(1);
      expect(adapter.stopCalls).toBe(1);
    });

    it('names a device left unnamed by an earlier scan', async () => {
      const adapter = new FakeAdapter();
      const device = new FakeDevice(undefined);
      adapter.byId.set('AA:01', device);
      const central = new NodeBleCentral(adapter, undefined, { pollIntervalMs: 5 });
      const seen: string[] = [];

      await central.scan([SERVICE], 15, (peripheral) => {
        seen.push(peripheral.id);
        return false;
      });
      expect(seen).toEqual([]);

      device.name = 'Moment';
      const peripheral = await central.retrievePeripheral('AA:01');

      expect(peripheral?.name).toBe('Moment');
    });

    it('leaves discovery running when it was already on', async () => {
      const adapter = new FakeAdapter();
      adapter.discovering = true;
      adapter.byId.set('AA:01', new FakeDevice('Moment'));
      const central = new NodeBleCentral(adapter);

      await central.scan([SERVICE], 1000, () => true);

      expect(adapter.startCalls).toBe(0);
      expect(adapter.stopCalls).toBe(0);
    });
  });

  it('returns null for a device the adapter does not know', async () => {
    const central = new NodeBleCentral(new FakeAdapter());

    await expect(central.retrievePeripheral('AA:99')).resolves.toBeNull();
  });

  it('lists connected devices exposing a wanted service', async () => {
    const adapter = new FakeAdapter();
    const moment = new FakeDevice('Moment');
    const speaker = new FakeDevice('Speaker', ['0000110b-0000-1000-8000-00805f9b34fb']);
    const idle = new FakeDevice('Moment');
    moment.connected = true;
    speaker.connected = true;
    adapter.byId.set('AA:01', moment);
    adapter.byId.set('AA:02', speaker);
    adapter.byId.set('AA:03', idle);
    const central = new NodeBleCentral(adapter);

    const peripherals = await central.retrieveConnectedPeripherals([SERVICE.toUpperCase()]);

    expect(peripherals.map((peripheral) => peripheral.id)).toEqual(['AA:01']);
  });
});

describe('NodeBlePeripheral', () => {
  it('writes and reads through the GATT server', async () => {
    const adapter = new FakeAdapter();
    const device = new FakeDevice('Moment');
    device.server.rx.value = Buffer.from([1, 2, 3]);
    adapter.byId.set('AA:01', device);
    const peripheral = await connectedPeripheral(adapter, new NodeBleCentral(adapter), 'AA:01');

    await peripheral.writeValue(SERVICE, RX, Uint8Array.of(9, 8));

    expect(device.server.rx.written).toEqual([Buffer.from([9, 8])]);
    await expect(peripheral.readValue(SERVICE, RX)).resolves.toEqual(Uint8Array.of(1, 2, 3));
  });

  it('wraps write failures', async () => {
    const adapter = new FakeAdapter();
    const device = new FakeDevice('Moment');
    device.server.rx.writeError = new Error('Operation failed with ATT error: 0x0e');
    adapter.byId.set('AA:01', device);
    const peripheral = await connectedPeripheral(adapter, new NodeBleCentral(adapter), 'AA:01');

    const error = await peripheral.writeValue(SERVICE, RX, Uint8Array.of(1)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BLEConnectionError);
    expect(error).toHaveProperty(
      'message',
      `Failed to write ${RX}: Operation failed with ATT error: 0x0e`
    );
  });

  it('stops writing after the link drops', async () => {
    const adapter = new FakeAdapter();
    const device = new FakeDevice('Moment');
    adapter.byId.set('AA:01', device);
    const peripheral = await connectedPeripheral(adapter, new NodeBleCentral(adapter), 'AA:01');
    let dropped = 0;
    const detach = peripheral.onDisconnect(() => {
      dropped++;
    });

    device.dropLink();
    detach();
    device.dropLink();

    expect(dropped).toBe(1);
    await expect(peripheral.writeValue(SERVICE, RX, Uint8Array.of(1))).rejects.toThrow(
      'Not connected to device'
    );
  });

  it('tears down a connection that completes after the timeout', async () => {
    const adapter = new FakeAdapter();
    const device = new FakeDevice('Moment');
    device.holdConnect = true;
    adapter.byId.set('AA:01', device);
    const peripheral = await new NodeBleCentral(adapter).retrievePeripheral('AA:01');
    if (!peripheral) {
      throw new Error('Peripheral AA:01 not found');
    }

    const error = await peripheral.connect(10).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BLETimeoutError);
    expect(error).toHaveProperty('message', 'Connection to AA:01 timed out after 10ms');

    device.finishConnect();
    await flush();

    expect(device.disconnectCalls).toBe(1);
    expect(device.connected).toBe(false);
    await expect(peripheral.writeValue(SERVICE, RX, Uint8Array.of(1))).rejects.toThrow(
      'Not connected to device'
    );
  });
});
