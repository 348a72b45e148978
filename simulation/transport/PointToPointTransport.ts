import type { EventScheduler } from '../engine/EventScheduler.js';
import { ConfigurationError } from '../engine/errors.js';
import type { Endpoint, LinkConfig, SimLogger } from '../types/simulation.js';
import { endpointId } from '../utils/endpoint.js';
import { createRng, type RNG } from '../utils/rng.js';
import type { ReceiveHandler, SendResult, Transport } from './Transport.js';

export interface LinkStats {
  destination: string;
  framesAccepted: number;
  framesDelivered: number;
  framesLost: number;
  framesUnclaimed: number;
  backpressureEvents: number;
}

interface Link {
  stats: LinkStats;
  // serialisation end times of frames still occupying the device queue, oldest first
  occupancy: number[];
  busyUntil: number;
}

export function validateLinkConfig(link: LinkConfig): void {
  if (!Number.isFinite(link.bandwidthBps) || link.bandwidthBps <= 0) {
    throw new ConfigurationError(`Link bandwidth must be positive, got ${link.bandwidthBps}`);
  }
  if (!Number.isFinite(link.propagationDelaySec) || link.propagationDelaySec < 0) {
    throw new ConfigurationError(`Link delay must be non-negative, got ${link.propagationDelaySec}`);
  }
  if (!Number.isInteger(link.queueCapacity) || link.queueCapacity < 1) {
    throw new ConfigurationError(`Link queue capacity must be a positive integer, got ${link.queueCapacity}`);
  }
  if (!Number.isInteger(link.frameOverheadBytes) || link.frameOverheadBytes < 0) {
    throw new ConfigurationError(`Frame overhead must be a non-negative integer, got ${link.frameOverheadBytes}`);
  }
  if (!Number.isFinite(link.lossRate) || link.lossRate < 0 || link.lossRate > 1) {
    throw new ConfigurationError(`Loss rate must be between 0 and 1, got ${link.lossRate}`);
  }
}

// Star of point-to-point links from one sender to each destination. Each link serialises frames
// one after another at its bandwidth, then adds the propagation delay. Arrivals are scheduler
// events, so stopping the scheduler also discards frames still on the wire.
export class PointToPointTransport implements Transport {
  private readonly links = new Map<string, Link>();

  private readonly handlers = new Map<string, ReceiveHandler>();

  private readonly rng: RNG;

  constructor(
    private readonly scheduler: EventScheduler,
    private readonly config: LinkConfig,
    private readonly logger: SimLogger = console,
  ) {
    validateLinkConfig(config);
    this.rng = createRng(config.seed);
  }

  connect(destination: Endpoint): void {
    const id = endpointId(destination);
    if (this.links.has(id)) {
      return;
    }
    this.links.set(id, {
      stats: {
        destination: id,
        framesAccepted: 0,
        framesDelivered: 0,
        framesLost: 0,
        framesUnclaimed: 0,
        backpressureEvents: 0,
      },
      occupancy: [],
      busyUntil: 0,
    });
  }

  onReceive(destination: Endpoint, handler: ReceiveHandler): void {
    this.handlers.set(endpointId(destination), handler);
  }

  send(source: Endpoint, destination: Endpoint, bytes: Uint8Array): SendResult {
    const id = endpointId(destination);
    const link = this.links.get(id);
    if (!link) {
      throw new ConfigurationError(`No link from the sender to ${id}`);
    }

    const now = this.scheduler.now();
    while (link.occupancy.length > 0 && (link.occupancy[0] ?? Number.POSITIVE_INFINITY) <= now) {
      link.occupancy.shift();
    }

    if (link.occupancy.length >= this.config.queueCapacity) {
      link.stats.backpressureEvents += 1;
      return { status: 'backpressure', retryAt: link.occupancy[0] };
    }

    const frameBits = (bytes.length + this.config.frameOverheadBytes) * 8;
    const txStart = Math.max(now, link.busyUntil);
    const txEnd = txStart + frameBits / this.config.bandwidthBps;
    link.busyUntil = txEnd;
    link.occupancy.push(txEnd);
    link.stats.framesAccepted += 1;

    if (this.config.lossRate > 0 && this.rng.next() < this.config.lossRate) {
      link.stats.framesLost += 1;
      return { status: 'sent' };
    }

    const arrivedAt = txEnd + this.config.propagationDelaySec;
    this.scheduler.scheduleAt(arrivedAt, () => this.deliver(link, id, bytes, arrivedAt, source));
    return { status: 'sent' };
  }

  getLinkStats(): LinkStats[] {
    return [...this.links.values()].map((link) => ({ ...link.stats }));
  }

  private deliver(link: Link, destinationId: string, bytes: Uint8Array, arrivedAt: number, from: Endpoint): void {
    const handler = this.handlers.get(destinationId);
    if (!handler) {
      link.stats.framesUnclaimed += 1;
      this.logger.warn(`[transport] no receiver bound on ${destinationId}, frame discarded`);
      return;
    }

    link.stats.framesDelivered += 1;
    handler(bytes, arrivedAt, from);
  }
}
