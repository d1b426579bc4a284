/**
 * moment-ble-sdk - TypeScript library for Moment BLE haptic devices
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { MomentDevice } from './device';
export type { MomentDeviceOptions } from './device';
export { MomentManager } from './manager';
export type { MomentManagerOptions } from './manager';
export { discoverDevices, isMomentPeripheral } from './discovery';
export type { DiscoveryOptions } from './discovery';

// Transport
export type { Central, DiscoveryHandler, PacketSink, Peripheral } from './transport/transport';
export { ChunkedWriter } from './transport/chunked-writer';
export { PacketQueue } from './transport/packet-queue';
export type { PendingSet, QueuedPacket } from './transport/packet-queue';
export { NodeBleCentral, NodeBlePeripheral, createNodeBleCentral } from './transport/connection';
export type {
  BleAdapter,
  BleCharacteristic,
  BleDevice,
  BleGattServer,
  BleGattService,
  NodeBleCentralOptions,
} from './transport/connection';

// Remote compiler and identity persistence
export { CompilerClient, parseCompilerResponse } from './compiler/compiler-client';
export type { CompilerClientOptions, FetchLike } from './compiler/compiler-client';
export { FileIdentityStore, MemoryIdentityStore } from './storage/identity-store';
export type { IdentityStore } from './storage/identity-store';

// Models and protocol
export * from './models';
export * from './protocol';

// Exceptions
export * from './exceptions';
