/**
 * Moment BLE device session.
 */

import { CompilerClient } from './compiler/compiler-client';
import { BLEConnectionError, NotConnectedError, ProtocolError } from './exceptions';
import { ConnectionState, Intensity, Orientation, Trigger } from './models/enums';
import type { TimelineMessage } from './models/timeline';
import {
  buildActuatorPayload,
  buildSettingsPayload,
  buildTriggerPayload,
} from './protocol/commands';
import {
  ACTUATOR_CHARACTERISTIC_UUID,
  CONNECT_TIMEOUT_MS,
  DEVICE_INFORMATION_SERVICE_UUID,
  FIRMWARE_REVISION_CHARACTERISTIC_UUID,
  HAPTIC_TIMELINE_SERVICE_UUID,
  PATTERN_TRIGGER_CHARACTERISTIC_UUID,
  SERIAL_NUMBER_CHARACTERISTIC_UUID,
  SETTINGS_CHARACTERISTIC_UUID,
  UART_RX_CHARACTERISTIC_UUID,
  UART_SERVICE_UUID,
} from './protocol/constants';
import { decodeBase64Bytecode, decodeTextValue } from './protocol/responses';
import { ChunkedWriter } from './transport/chunked-writer';
import type { Peripheral } from './transport/transport';

/**
 * Device session options.
 */
export interface MomentDeviceOptions {
  /** Connection timeout in milliseconds (default: CONNECT_TIMEOUT_MS) */
  connectTimeoutMs?: number;

  /** Compiler used by writeJavascript (default: a CompilerClient on COMPILER_URL) */
  compiler?: CompilerClient;
}

/**
 * Let one macrotask turn pass.
 */
function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/**
 * Moment haptic device.
 *
 * One session per peripheral. Each session owns its own chunked writer and
 * packet queue, so several devices can be driven independently.
 *
 * @example
 * ```typescript
 * const device = new MomentDevice(peripheral);
 * await device.connect();
 * await device.writeSettings(Orientation.RIGHT, Orientation.LEFT, Intensity.HIGH);
 * await device.writeBytecodeString(base64Bytecode);
 * await device.disconnect();
 * ```
 */
export class MomentDevice {
  private _state = ConnectionState.DISCONNECTED;
  private readonly writer: ChunkedWriter;
  private readonly connectTimeoutMs: number;
  private compiler: CompilerClient | null;
  private detachDisconnect: (() => void) | null = null;

  /**
   * Wrap a peripheral in a device session.
   *
   * @param peripheral - Transport handle of the device
   * @param options - Session options
   */
  constructor(
    private readonly peripheral: Peripheral,
    options: MomentDeviceOptions = {}
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
    this.compiler = options.compiler ?? null;
    this.writer = new ChunkedWriter({
      writePacket: (packet) =>
        this.peripheral.writeValue(UART_SERVICE_UUID, UART_RX_CHARACTERISTIC_UUID, packet),
    });
  }

  /**
   * Peripheral identity.
   */
  get id(): string {
    return this.peripheral.id;
  }

  /**
   * Advertised device name, if known.
   */
  get name(): string | undefined {
    return this.peripheral.name;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Check if currently connected to the device.
   */
  get isConnected(): boolean {
    return this._state === ConnectionState.CONNECTED;
  }

  /**
   * Connect to the device.
   *
   * @throws {BLEConnectionError} If connection fails
   * @throws {BLETimeoutError} If the connection timeout elapses
   */
  async connect(): Promise<void> {
    if (this._state === ConnectionState.CONNECTED) {
      return;
    }

    this._state = ConnectionState.CONNECTING;
    try {
      await this.peripheral.connect(this.connectTimeoutMs);
    } catch (error) {
      this._state = ConnectionState.FAILED;
      throw error;
    }

    this.detachDisconnect?.();
    this.detachDisconnect = this.peripheral.onDisconnect(() => this.handleDisconnect());
    this._state = ConnectionState.CONNECTED;

    console.log(`Connected to ${this.name ?? 'Moment device'} (${this.id})`);
  }

  /**
   * Disconnect from the device.
   *
   * Pending writes are rejected and their queued packets dropped.
   */
  async disconnect(): Promise<void> {
    this.release(new BLEConnectionError('Disconnected by request'));
    await this.peripheral.disconnect();
    console.log(`Disconnected from ${this.name ?? 'Moment device'}`);
  }

  /**
   * Reset the device's JavaScript virtual machine.
   *
   * Sends the empty frame ([0x00]). The firmware acknowledges the write
   * before the reset has actually taken effect, so settling is delayed by
   * one event loop turn. This is a workaround for that firmware race only.
   */
  async reset(): Promise<void> {
    this.ensureConnected();

    console.log('Resetting device virtual machine');

    try {
      await this.writer.write(new Uint8Array(0));
    } finally {
      await yieldToEventLoop();
    }
  }

  /**
   * Write user settings.
   *
   * @param wristOrientation - Wrist the device is worn on
   * @param buttonOrientation - Side the pair button faces
   * @param intensityLevel - Global haptic intensity
   * @throws {InvalidParameterError} If a value is not a member of its enum
   */
  async writeSettings(
    wristOrientation: Orientation,
    buttonOrientation: Orientation,
    intensityLevel: Intensity
  ): Promise<void> {
    this.ensureConnected();

    const payload = buildSettingsPayload(wristOrientation, buttonOrientation, intensityLevel);
    await this.peripheral.writeValue(
      HAPTIC_TIMELINE_SERVICE_UUID,
      SETTINGS_CHARACTERISTIC_UUID,
      payload
    );
  }

  /**
   * Drive the four actuators directly.
   *
   * @param duration - Vibration duration in milliseconds (0-65535)
   * @param topLeft - Intensity 0-100
   * @param topRight - Intensity 0-100
   * @param bottomLeft - Intensity 0-100
   * @param bottomRight - Intensity 0-100
   * @throws {InvalidParameterError} If a value is out of range
   *
   * @example
   * ```typescript
   * await device.writeActuators(100, 0, 0, 25, 25);
   * ```
   */
  async writeActuators(
    duration: number,
    topLeft: number,
    topRight: number,
    bottomLeft: number,
    bottomRight: number
  ): Promise<void> {
    this.ensureConnected();

    const payload = buildActuatorPayload(duration, topLeft, topRight, bottomLeft, bottomRight);
    await this.peripheral.writeValue(
      HAPTIC_TIMELINE_SERVICE_UUID,
      ACTUATOR_CHARACTERISTIC_UUID,
      payload
    );
  }

  /**
   * Write compiled bytecode to the device.
   *
   * @param bytes - Bytecode image
   * @throws {PayloadTooLargeError} If the image does not fit in 255 packets
   * @throws {WriteAbortedError} If an earlier queued write failed first
   */
  async writeBytecode(bytes: Uint8Array): Promise<void> {
    this.ensureConnected();
    await this.writer.write(bytes);
  }

  /**
   * Write base64 encoded bytecode to the device.
   *
   * @param bytecode - Base64 representation of compiled bytecode
   * @throws {DecodeError} If the string is not valid base64
   */
  async writeBytecodeString(bytecode: string): Promise<void> {
    this.ensureConnected();
    await this.writer.write(decodeBase64Bytecode(bytecode));
  }

  /**
   * Write a protocol-buffer timeline to the device.
   *
   * @param timeline - Message exposing its binary encoding
   * @throws {ProtocolError} If the message cannot be serialised
   */
  async writeTimeline(timeline: TimelineMessage): Promise<void> {
    this.ensureConnected();

    let bytes: Uint8Array;
    try {
      bytes = timeline.toBinary();
    } catch (error) {
      throw new ProtocolError('Failed to serialise timeline', { cause: error });
    }
    await this.writer.write(bytes);
  }

  /**
   * Compile JavaScript with the remote compiler and write the result.
   *
   * Requires network access.
   *
   * @param source - JavaScript source text
   * @throws {RemoteCompileError} If compilation fails
   */
  async writeJavascript(source: string): Promise<void> {
    this.ensureConnected();
    const bytecode = await this.getCompiler().compileSource(source);
    await this.writeBytecode(bytecode);
  }

  /**
   * Compile the JavaScript hosted at a URL and write the result.
   *
   * @param url - Location of the script
   * @throws {RemoteCompileError} If compilation fails
   */
  async writeJavascriptFromUrl(url: string): Promise<void> {
    this.ensureConnected();
    const bytecode = await this.getCompiler().compileUrl(url);
    await this.writeBytecode(bytecode);
  }

  /**
   * Trigger a pre-loaded pattern.
   */
  async triggerPattern(trigger: Trigger): Promise<void> {
    this.ensureConnected();

    const payload = buildTriggerPayload(trigger);
    await this.peripheral.writeValue(
      HAPTIC_TIMELINE_SERVICE_UUID,
      PATTERN_TRIGGER_CHARACTERISTIC_UUID,
      payload
    );
  }

  /**
   * Read firmware revision string.
   *
   * @throws {DecodeError} If the value is not valid UTF-8
   */
  async readVersion(): Promise<string> {
    this.ensureConnected();

    const data = await this.peripheral.readValue(
      DEVICE_INFORMATION_SERVICE_UUID,
      FIRMWARE_REVISION_CHARACTERISTIC_UUID
    );
    return decodeTextValue(data, 'firmware revision string');
  }

  /**
   * Read serial number string.
   *
   * @throws {DecodeError} If the value is not valid UTF-8
   */
  async readSerial(): Promise<string> {
    this.ensureConnected();

    const data = await this.peripheral.readValue(
      DEVICE_INFORMATION_SERVICE_UUID,
      SERIAL_NUMBER_CHARACTERISTIC_UUID
    );
    return decodeTextValue(data, 'serial number string');
  }

  private getCompiler(): CompilerClient {
    if (!this.compiler) {
      this.compiler = new CompilerClient();
    }
    return this.compiler;
  }

  private handleDisconnect(): void {
    console.log(`Device ${this.name ?? this.id} disconnected`);
    this.release(new BLEConnectionError('Device disconnected'));
  }

  /**
   * Detach from the peripheral and drop queued packets so nothing stale is
   * sent after a reconnect.
   */
  private release(reason: Error): void {
    this.detachDisconnect?.();
    this.detachDisconnect = null;
    this._state = ConnectionState.DISCONNECTED;
    this.writer.cancel(reason);
  }

  /**
   * Ensure device is connected.
   */
  private ensureConnected(): void {
    if (this._state !== ConnectionState.CONNECTED) {
      throw new NotConnectedError();
    }
  }
}
