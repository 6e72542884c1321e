/**
 * K-way merge of per-stream event queues
 */

import { LogEvent, compareEvents } from '../../types';

export class MinHeap<T> {
  private readonly data: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  push(item: T): void {
    this.data.push(item);
    this.bubbleUp(this.data.length - 1);
  }

  peek(): T | undefined {
    return this.data[0];
  }

  pop(): T | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (this.data.length > 0 && last !== undefined) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  /** Restores the heap property after items changed priority in place */
  heapify(): void {
    for (let index = Math.floor(this.data.length / 2) - 1; index >= 0; index--) {
      this.bubbleDown(index);
    }
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.compare(this.data[parent], this.data[index]) <= 0) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.compare(this.data[left], this.data[smallest]) < 0) {
        smallest = left;
      }
      if (right < length && this.compare(this.data[right], this.data[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      [this.data[index], this.data[smallest]] = [this.data[smallest], this.data[index]];
      index = smallest;
    }
  }
}

interface HeldEvent {
  event: LogEvent;
  /** Clock reading when the event was offered */
  arrivedAt: number;
}

export interface MergerOptions {
  /** Events buffered per stream before the merger forces releases */
  capacity: number;
  /** Longest time an event waits for slower streams */
  holdBackMs: number;
}

/**
 * Buffers events in one ordered queue per stream and releases them in
 * (timestamp, streamId) order. The head of the queues is released when every
 * other known stream has already reached its timestamp, when it has waited
 * `holdBackMs`, or while some queue is at capacity.
 */
export class KWayMerger {
  private readonly queues = new Map<string, HeldEvent[]>();
  /** Highest timestamp offered per stream; -Infinity for registered but silent streams */
  private readonly watermarks = new Map<string, number>();
  private readonly heads: MinHeap<string>;

  constructor(private readonly options: MergerOptions) {
    this.heads = new MinHeap<string>((a, b) => {
      const headA = this.queues.get(a)?.[0];
      const headB = this.queues.get(b)?.[0];
      if (!headA || !headB) {
        return headA ? -1 : headB ? 1 : 0;
      }
      return compareEvents(headA.event, headB.event);
    });
  }

  /** Makes a stream known before it has delivered anything */
  registerStream(streamId: string): void {
    if (!this.watermarks.has(streamId)) {
      this.watermarks.set(streamId, -Infinity);
    }
  }

  /** True while some stream queue is at capacity */
  isFull(): boolean {
    for (const queue of this.queues.values()) {
      if (queue.length >= this.options.capacity) {
        return true;
      }
    }
    return false;
  }

  offer(event: LogEvent, now: number): void {
    const { streamId } = event;
    this.watermarks.set(streamId, Math.max(this.watermarks.get(streamId) ?? -Infinity, event.timestamp));

    let queue = this.queues.get(streamId);
    if (!queue) {
      queue = [];
      this.queues.set(streamId, queue);
    }

    const held: HeldEvent = { event, arrivedAt: now };
    const wasEmpty = queue.length === 0;
    const index = insertionIndex(queue, event);
    queue.splice(index, 0, held);

    if (wasEmpty) {
      this.heads.push(streamId);
    } else if (index === 0) {
      this.heads.heapify();
    }
  }

  /** Removes and returns every event that may be released at `now` */
  release(now: number): LogEvent[] {
    const released: LogEvent[] = [];
    for (;;) {
      const streamId = this.heads.peek();
      const head = streamId === undefined ? undefined : this.queues.get(streamId)?.[0];
      if (streamId === undefined || !head || !this.canRelease(streamId, head, now)) {
        break;
      }
      released.push(this.take(streamId));
    }
    return released;
  }

  /** Removes and returns everything, in order */
  flush(): LogEvent[] {
    const released: LogEvent[] = [];
    for (let streamId = this.heads.peek(); streamId !== undefined; streamId = this.heads.peek()) {
      released.push(this.take(streamId));
    }
    return released;
  }

  /**
   * Clock reading at which the current head becomes releasable by age, or
   * undefined when nothing is buffered
   */
  nextDeadline(): number | undefined {
    const streamId = this.heads.peek();
    const head = streamId === undefined ? undefined : this.queues.get(streamId)?.[0];
    return head ? head.arrivedAt + this.options.holdBackMs : undefined;
  }

  private canRelease(streamId: string, head: HeldEvent, now: number): boolean {
    if (now - head.arrivedAt >= this.options.holdBackMs || this.isFull()) {
      return true;
    }
    for (const [other, watermark] of this.watermarks) {
      if (other !== streamId && watermark < head.event.timestamp) {
        return false;
      }
    }
    return true;
  }

  private take(streamId: string): LogEvent {
    this.heads.pop();
    const queue = this.queues.get(streamId) ?? [];
    const held = queue.shift();
    if (queue.length > 0) {
      this.heads.push(streamId);
    }
    if (!held) {
      throw new Error(`Merge queue for stream '${streamId}' is empty`);
    }
    return held.event;
  }
}

function insertionIndex(queue: HeldEvent[], event: LogEvent): number {
  let low = 0;
  let high = queue.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if (compareEvents(queue[middle].event, event) <= 0) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low;
}
