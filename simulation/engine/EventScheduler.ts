import { SchedulingError } from './errors.js';

export interface EventHandle {
  readonly id: number;
  readonly at: number;
}

interface ScheduledEvent extends EventHandle {
  readonly order: number;
  readonly callback: () => void;
}

function runsBefore(a: ScheduledEvent, b: ScheduledEvent): boolean {
  return a.at < b.at || (a.at === b.at && a.order < b.order);
}

// Virtual-time event loop. Events fire in (time, insertion order) order, one at a time.
// Nothing here touches the host timers: time only moves when run() pops the next event.
export class EventScheduler {
  private readonly heap: ScheduledEvent[] = [];

  private readonly pending = new Map<number, ScheduledEvent>();

  private simTime = 0;

  private nextOrder = 0;

  private stopRequested = false;

  private running = false;

  now(): number {
    return this.simTime;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  isRunning(): boolean {
    return this.running;
  }

  scheduleAt(at: number, callback: () => void): EventHandle {
    if (!Number.isFinite(at)) {
      throw new SchedulingError(`Cannot schedule an event at ${String(at)}`);
    }
    if (at < this.simTime) {
      throw new SchedulingError(`Cannot schedule an event at ${at}s, virtual time is already ${this.simTime}s`);
    }

    const order = this.nextOrder;
    this.nextOrder += 1;
    const event: ScheduledEvent = { id: order, at, order, callback };
    this.pending.set(event.id, event);
    this.push(event);
    return { id: event.id, at: event.at };
  }

  scheduleIn(delay: number, callback: () => void): EventHandle {
    return this.scheduleAt(this.simTime + Math.max(0, delay), callback);
  }

  // Cancelled events stay in the heap and are skipped when popped.
  cancel(handle: EventHandle): boolean {
    return this.pending.delete(handle.id);
  }

  isPending(handle: EventHandle): boolean {
    return this.pending.has(handle.id);
  }

  /**
   * Processes events until the queue drains, stop() is called, or the next event lies beyond `until`.
   * When a horizon is given, the clock ends on it. Returns the number of callbacks fired.
   */
  run(until = Number.POSITIVE_INFINITY): number {
    if (this.running) {
      throw new SchedulingError('Scheduler is already running');
    }

    this.running = true;
    this.stopRequested = false;
    let fired = 0;

    try {
      while (!this.stopRequested) {
        const next = this.heap[0];
        if (!next) {
          break;
        }
        if (next.at > until) {
          break;
        }

        this.pop();
        if (!this.pending.delete(next.id)) {
          continue;
        }

        this.simTime = next.at;
        next.callback();
        fired += 1;
      }
    } finally {
      this.running = false;
    }

    if (!this.stopRequested && Number.isFinite(until) && until > this.simTime) {
      this.simTime = until;
    }

    return fired;
  }

  stop(): void {
    this.stopRequested = true;
  }

  // Drops every pending event without firing it. Returns how many were cancelled.
  cancelAll(): number {
    const cancelled = this.pending.size;
    this.pending.clear();
    this.heap.length = 0;
    return cancelled;
  }

  private push(event: ScheduledEvent): void {
    this.heap.push(event);
    let index = this.heap.length - 1;
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const parent = this.heap[parentIndex];
      if (!parent || !runsBefore(event, parent)) {
        break;
      }
      this.heap[index] = parent;
      this.heap[parentIndex] = event;
      index = parentIndex;
    }
  }

  private pop(): ScheduledEvent | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (!top || !last || this.heap.length === 0) {
      return top;
    }

    this.heap[0] = last;
    let index = 0;
    for (;;) {
      const left = index * 2 + 1;
      const right = left + 1;
      let smallest = index;

      const leftEvent = this.heap[left];
      const smallestEvent = this.heap[smallest];
      if (leftEvent && smallestEvent && runsBefore(leftEvent, smallestEvent)) {
        smallest = left;
      }
      const rightEvent = this.heap[right];
      const candidate = this.heap[smallest];
      if (rightEvent && candidate && runsBefore(rightEvent, candidate)) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }

      const current = this.heap[index];
      const swap = this.heap[smallest];
      if (!current || !swap) {
        break;
      }
      this.heap[index] = swap;
      this.heap[smallest] = current;
      index = smallest;
    }

    return top;
  }
}
