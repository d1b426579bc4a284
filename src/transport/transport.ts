/**
 * Transport boundary consumed by the SDK.
 *
 * Any BLE stack can drive a Moment device by implementing these two
 * interfaces. Every operation is asynchronous and callers keep at most one
 * outstanding write or read per peripheral.
 */

/**
 * A single BLE peripheral.
 */
export interface Peripheral {
  /** Stable identity, persisted to prefer reconnecting to the same device */
  readonly id: string;

  /** Advertised name, if the peripheral advertised one */
  readonly name: string | undefined;

  connect(timeoutMs: number): Promise<void>;

  disconnect(): Promise<void>;

  writeValue(serviceUuid: string, characteristicUuid: string, data: Uint8Array): Promise<void>;

  readValue(serviceUuid: string, characteristicUuid: string): Promise<Uint8Array>;

  /**
   * Register a listener for link loss.
   *
   * @returns Function removing the listener
   */
  onDisconnect(listener: () => void): () => void;
}

/**
 * Called for every peripheral seen during a scan.
 *
 * @returns true to stop scanning
 */
export type DiscoveryHandler = (peripheral: Peripheral) => boolean;

/**
 * The host's BLE central role.
 */
export interface Central {
  /** Look up a previously seen peripheral by identity, or null */
  retrievePeripheral(id: string): Promise<Peripheral | null>;

  /** Peripherals already connected to the host exposing any of the services */
  retrieveConnectedPeripherals(serviceUuids: string[]): Promise<Peripheral[]>;

  /**
   * Scan for advertising peripherals.
   *
   * Resolves when the handler stops the scan or the timeout elapses,
   * rejects if the scan fails.
   */
  scan(serviceUuids: string[], timeoutMs: number, onDiscover: DiscoveryHandler): Promise<void>;
}

/**
 * Destination of framed packets. Each call completes once the transport
 * has acknowledged the write.
 */
export interface PacketSink {
  writePacket(packet: Uint8Array): Promise<void>;
}
