/**
 * Chunked writer: frames payloads and drains them one packet at a time.
 */

import { WriteAbortedError } from '../exceptions';
import { framePayload } from '../protocol/framing';
import { PacketQueue } from './packet-queue';
import type { PacketSink } from './transport';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Sends framed payloads through a packet sink.
 *
 * The transport has no flow control of its own, so exactly one packet is in
 * flight at a time: the next packet is only written once the previous write
 * has been acknowledged. Payloads written while an earlier one is still
 * draining are appended behind it, and every write completes when the queue
 * next runs empty, in submission order.
 *
 * @example
 * ```typescript
 * const writer = new ChunkedWriter({
 *   writePacket: (packet) => peripheral.writeValue(UART_SERVICE_UUID, UART_RX_CHARACTERISTIC_UUID, packet),
 * });
 * await writer.write(bytecode);
 * ```
 */
export class ChunkedWriter {
  private draining = false;
  private nextSetId = 1;

  constructor(
    private readonly sink: PacketSink,
    private readonly queue: PacketQueue = new PacketQueue()
  ) {}

  /**
   * Whether the drain loop is currently sending packets.
   */
  get isDraining(): boolean {
    return this.draining;
  }

  /**
   * Number of packets waiting to be sent.
   */
  get queuedPackets(): number {
    return this.queue.count;
  }

  /**
   * Number of logical writes not yet completed.
   */
  get pendingWrites(): number {
    return this.queue.pendingSets;
  }

  /**
   * Frame a payload, queue its packets and wait for them to be sent.
   *
   * @param payload - Complete logical message (empty sends the reset signal)
   * @throws {PayloadTooLargeError} If the payload cannot be framed
   * @throws {WriteAbortedError} If an earlier queued write failed first
   */
  write(payload: Uint8Array): Promise<void> {
    const packets = framePayload(payload);

    return new Promise<void>((resolve, reject) => {
      const setId = this.nextSetId++;

      for (const data of packets) {
        this.queue.enqueue({ setId, data });
      }
      this.queue.incrementPendingSets({ id: setId, resolve, reject });

      console.debug(
        `Queued write #${setId}: ${payload.length} bytes in ${packets.length} packet(s)`
      );

      if (!this.draining) {
        this.draining = true;
        void this.drain();
      }
    });
  }

  /**
   * Drop every queued packet and reject every pending write.
   *
   * A packet already handed to the sink is not recalled; its outcome is
   * ignored.
   *
   * @param error - Reason delivered to every pending write
   */
  cancel(error: Error): void {
    const sets = this.queue.clear();
    if (sets.length > 0) {
      console.debug(`Cancelling ${sets.length} pending write(s): ${error.message}`);
    }
    for (const set of sets) {
      set.reject(error);
    }
  }

  /**
   * Send queued packets until the queue is empty or a write fails.
   */
  private async drain(): Promise<void> {
    try {
      for (;;) {
        const packet = this.queue.dequeue();

        if (!packet) {
          this.completePendingSets();
          return;
        }

        try {
          await this.sink.writePacket(packet.data);
        } catch (error) {
          if (!this.queue.hasPendingSet(packet.setId)) {
            // Write was cancelled while this packet was in flight
            console.debug(`Ignoring failure of cancelled write #${packet.setId}`);
            continue;
          }
          this.abort(packet.setId, toError(error));
          return;
        }
      }
    } finally {
      this.draining = false;
    }
  }

  /**
   * Queue reached empty: every pending set has had all of its packets sent.
   */
  private completePendingSets(): void {
    let set = this.queue.decrementPendingSets();
    while (set) {
      console.debug(`Write #${set.id} complete`);
      set.resolve();
      set = this.queue.decrementPendingSets();
    }
  }

  /**
   * Stop after a failed packet write.
   *
   * Sets queued before the failed one were fully sent and resolve. The set
   * owning the packet receives the transport error. Later sets are dropped
   * unsent and rejected with WriteAbortedError.
   */
  private abort(failedSetId: number, error: Error): void {
    console.warn(`Write #${failedSetId} failed: ${error.message}`);

    for (const set of this.queue.clear()) {
      if (set.id < failedSetId) {
        set.resolve();
      } else if (set.id === failedSetId) {
        set.reject(error);
      } else {
        set.reject(
          new WriteAbortedError(
            `Write #${set.id} aborted after write #${failedSetId} failed: ${error.message}`,
            { cause: error }
          )
        );
      }
    }
  }
}
