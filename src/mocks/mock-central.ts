import type { Central, DiscoveryHandler, Peripheral } from '../transport/transport';

export interface MockWrite {
  serviceUuid: string;
  characteristicUuid: string;
  data: Uint8Array;
}

interface HeldWrite {
  resolve: () => void;
  reject: (error: Error) => void;
}

function valueKey(serviceUuid: string, characteristicUuid: string): string {
  return `${serviceUuid}/${characteristicUuid}`;
}

/**
 * In-memory peripheral recording every write.
 *
 * With `autoAck` off, writes stay in flight until `ackWrite()` or
 * `failWrite()` is called, which lets tests observe the single-flight
 * discipline.
 */
export class MockPeripheral implements Peripheral {
  readonly writes: MockWrite[] = [];
  autoAck = true;
  connectError: Error | null = null;
  connectCalls = 0;
  disconnectCalls = 0;
  /** Fail the write with this zero-based index when auto-acknowledging */
  failWriteIndex: number | null = null;

  private connected = false;
  private held: HeldWrite[] = [];
  private values = new Map<string, Uint8Array>();
  private listeners = new Set<() => void>();

  constructor(
    readonly id: string,
    readonly name: string | undefined
  ) {}

  get isConnected(): boolean {
    return this.connected;
  }

  get inFlightWrites(): number {
    return this.held.length;
  }

  setValue(serviceUuid: string, characteristicUuid: string, data: Uint8Array): void {
    this.values.set(valueKey(serviceUuid, characteristicUuid), data);
  }

  writesTo(characteristicUuid: string): Uint8Array[] {
    return this.writes
      .filter((write) => write.characteristicUuid === characteristicUuid)
      .map((write) => write.data);
  }

  async connect(_timeoutMs: number): Promise<void> {
    this.connectCalls++;
    if (this.connectError) {
      throw this.connectError;
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.connected = false;
  }

  writeValue(serviceUuid: string, characteristicUuid: string, data: Uint8Array): Promise<void> {
    const index = this.writes.length;
    this.writes.push({ serviceUuid, characteristicUuid, data: Uint8Array.from(data) });

    if (!this.autoAck) {
      return new Promise<void>((resolve, reject) => {
        this.held.push({ resolve, reject });
      });
    }
    if (index === this.failWriteIndex) {
      return Promise.reject(new Error(`Write ${index} failed`));
    }
    return Promise.resolve();
  }

  async readValue(serviceUuid: string, characteristicUuid: string): Promise<Uint8Array> {
    const value = this.values.get(valueKey(serviceUuid, characteristicUuid));
    if (!value) {
      throw new Error(`No value for ${characteristicUuid}`);
    }
    return value;
  }

  onDisconnect(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Acknowledge the oldest in-flight write.
   */
  ackWrite(): void {
    const write = this.held.shift();
    if (!write) {
      throw new Error('No write in flight');
    }
    write.resolve();
  }

  /**
   * Fail the oldest in-flight write.
   */
  failWrite(error: Error): void {
    const write = this.held.shift();
    if (!write) {
      throw new Error('No write in flight');
    }
    write.reject(error);
  }

  /**
   * Drop the link: notify listeners, then fail every in-flight write.
   */
  simulateDisconnect(): void {
    this.connected = false;
    for (const listener of [...this.listeners]) {
      listener();
    }
    const held = this.held;
    this.held = [];
    for (const write of held) {
      write.reject(new Error('Peripheral disconnected'));
    }
  }
}

/**
 * In-memory central serving a fixed set of peripherals.
 */
export class MockCentral implements Central {
  /** Peripherals the host has seen before, by id */
  readonly known = new Map<string, MockPeripheral>();
  /** Peripherals already connected to the host */
  connected: MockPeripheral[] = [];
  /** Peripherals reported, in order, by the next scan */
  advertising: MockPeripheral[] = [];
  scanError: Error | null = null;
  scanCalls = 0;
  /** Peripherals handed to the discovery handler during the last scan */
  lastScanReported: MockPeripheral[] = [];

  async retrievePeripheral(id: string): Promise<Peripheral | null> {
    return this.known.get(id) ?? null;
  }

  async retrieveConnectedPeripherals(_serviceUuids: string[]): Promise<Peripheral[]> {
    return [...this.connected];
  }

  async scan(_serviceUuids: string[], _timeoutMs: number, onDiscover: DiscoveryHandler): Promise<void> {
    this.scanCalls++;
    this.lastScanReported = [];

    if (this.scanError) {
      throw this.scanError;
    }

    for (const peripheral of this.advertising) {
      this.lastScanReported.push(peripheral);
      if (onDiscover(peripheral)) {
        return;
      }
    }
  }
}
