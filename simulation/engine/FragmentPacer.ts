import type { Fragment, PacingPlan } from '../types/simulation.js';
import { ConfigurationError } from './errors.js';

export interface PacingOptions {
  fragmentSizeBytes: number;
  targetRateBps: number;
}

export function assertPacingOptions(options: PacingOptions): void {
  const { fragmentSizeBytes, targetRateBps } = options;
  if (!Number.isInteger(fragmentSizeBytes) || fragmentSizeBytes <= 0) {
    throw new ConfigurationError(`Fragment size must be a positive integer, got ${fragmentSizeBytes}`);
  }
  if (!Number.isFinite(targetRateBps) || targetRateBps <= 0) {
    throw new ConfigurationError(`Target rate must be a positive number of bits/s, got ${targetRateBps}`);
  }
}

export function fragmentCount(payloadLength: number, fragmentSizeBytes: number): number {
  return Math.ceil(payloadLength / fragmentSizeBytes);
}

// Serialisation time of `bytes` at the pacing rate.
export function pacingInterval(bytes: number, targetRateBps: number): number {
  return (bytes * 8) / targetRateBps;
}

/**
 * Splits a payload into fixed-size fragments and assigns each an open-loop send time.
 *
 * Fragment i is scheduled once the bits of every earlier fragment have been paced out, so
 * full-size fragments sit `fragmentSize * 8 / rate` apart. `endsAt` is where a following
 * fragment would go, which for a short last fragment uses that fragment's own smaller interval.
 */
export function planFragments(payloadLength: number, options: PacingOptions, startAt = 0): PacingPlan {
  assertPacingOptions(options);
  if (!Number.isInteger(payloadLength) || payloadLength < 0) {
    throw new ConfigurationError(`Payload length must be a non-negative integer, got ${payloadLength}`);
  }

  const { fragmentSizeBytes, targetRateBps } = options;
  const count = fragmentCount(payloadLength, fragmentSizeBytes);
  const fragments: Fragment[] = [];

  for (let sequence = 0; sequence < count; sequence += 1) {
    const offset = sequence * fragmentSizeBytes;
    const length = Math.min(fragmentSizeBytes, payloadLength - offset);
    fragments.push({
      sequence,
      offset,
      length,
      scheduledAt: startAt + pacingInterval(offset, targetRateBps),
    });
  }

  return {
    fragments,
    startAt,
    endsAt: startAt + pacingInterval(payloadLength, targetRateBps),
    totalBytes: payloadLength,
  };
}

// Walks a plan one fragment at a time. It only moves on once the transport accepted the
// current fragment, so a backpressured send is retried with the same sequence number.
export class FragmentCursor {
  private index = 0;

  constructor(private readonly plan: PacingPlan) {}

  get total(): number {
    return this.plan.fragments.length;
  }

  get sentCount(): number {
    return this.index;
  }

  isDone(): boolean {
    return this.index >= this.plan.fragments.length;
  }

  current(): Fragment | undefined {
    return this.plan.fragments[this.index];
  }

  advance(): Fragment | undefined {
    if (!this.isDone()) {
      this.index += 1;
    }
    return this.current();
  }
}
