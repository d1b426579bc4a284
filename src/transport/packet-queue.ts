/**
 * Packet queue for framed bytecode writes.
 *
 * Holds packets waiting to be written to the UART characteristic together
 * with the logical writes (sets) waiting for them. Node.js delivers transport
 * completions on the same event loop as callers, and no method here awaits,
 * so every call observes the packets and the pending-set counter together.
 */

/**
 * A packet tagged with the logical write it belongs to.
 */
export interface QueuedPacket {
  readonly setId: number;
  readonly data: Uint8Array;
}

/**
 * A logical write whose caller is waiting for every packet to be sent.
 */
export interface PendingSet {
  readonly id: number;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * FIFO queue of packets plus the pending-set counter.
 */
export class PacketQueue {
  private packets: QueuedPacket[] = [];
  private sets: PendingSet[] = [];

  /**
   * Append a packet to the tail.
   */
  enqueue(packet: QueuedPacket): void {
    this.packets.push(packet);
  }

  /**
   * Remove and return the head packet, or undefined if the queue is empty.
   */
  dequeue(): QueuedPacket | undefined {
    return this.packets.shift();
  }

  get isEmpty(): boolean {
    return this.packets.length === 0;
  }

  get count(): number {
    return this.packets.length;
  }

  /**
   * Register one more logical write waiting on the queue.
   */
  incrementPendingSets(set: PendingSet): void {
    this.sets.push(set);
  }

  /**
   * Remove the oldest pending set.
   *
   * @returns The set to complete, or undefined if none are pending
   */
  decrementPendingSets(): PendingSet | undefined {
    return this.sets.shift();
  }

  /**
   * Whether the logical write is still waiting for completion.
   */
  hasPendingSet(id: number): boolean {
    return this.sets.some((set) => set.id === id);
  }

  /**
   * Number of logical writes not yet completed.
   */
  get pendingSets(): number {
    return this.sets.length;
  }

  /**
   * Drop every queued packet.
   *
   * @returns The pending sets, oldest first, which the caller must settle
   */
  clear(): PendingSet[] {
    const sets = this.sets;
    this.packets = [];
    this.sets = [];
    return sets;
  }
}
