import type { Classifier } from '../classifier/Classifier.js';
import { validateSimulationConfig } from '../config/simulationConfig.js';
import { decodeFragment, encodeFragment, MAX_WIRE_SEQUENCE } from '../transport/FragmentCodec.js';
import { PointToPointTransport } from '../transport/PointToPointTransport.js';
import type { Transport } from '../transport/Transport.js';
import type {
  BindingDecision,
  ClassStatistics,
  Destination,
  Endpoint,
  FlowKey,
  FlowStatistics,
  Payload,
  PayloadState,
  PayloadSummary,
  SimLogger,
  SimulationConfig,
  SimulationReport,
} from '../types/simulation.js';
import { flowIdOf } from '../utils/endpoint.js';
import { generateId } from '../utils/id.js';
import { ClassifierBinding } from './ClassifierBinding.js';
import { DeliveryTracker } from './DeliveryTracker.js';
import { ConfigurationError, InvalidTransitionError, SchedulingError } from './errors.js';
import { EventScheduler } from './EventScheduler.js';
import { FragmentCursor, fragmentCount, pacingInterval, planFragments } from './FragmentPacer.js';
import { MetricsAggregator } from './MetricsAggregator.js';

export const SENDER_ADDRESS = '10.1.0.1';
export const RECEIVER_PORT = 9;
export const FIRST_EPHEMERAL_PORT = 49153;
export const LAST_EPHEMERAL_PORT = 65535;
// Every payload may need its own source port, so one run holds at most this many payloads.
export const MAX_PAYLOADS_PER_RUN = LAST_EPHEMERAL_PORT - FIRST_EPHEMERAL_PORT + 1;

const TRANSITIONS: Record<PayloadState, readonly PayloadState[]> = {
  classifying: ['fragmenting', 'completed'],
  fragmenting: ['sending'],
  sending: ['completed'],
  completed: [],
};

// Class i listens on the far side of the sender's i-th point-to-point link.
export function buildDestinations<C extends string>(classes: readonly C[]): Destination<C>[] {
  return classes.map((classId, index) => ({
    classId,
    endpoint: { address: `10.1.${index + 1}.2`, port: RECEIVER_PORT },
  }));
}

export interface OrchestratorOptions {
  classifier: Classifier;
  scheduler?: EventScheduler;
  // When supplied, the caller owns link setup; otherwise one PointToPointTransport is built from config.link.
  transport?: Transport;
  tracker?: DeliveryTracker;
  destinations?: Destination[];
  logger?: SimLogger;
  runId?: string;
  scenario?: string;
}

interface PayloadRun {
  payload: Payload;
  state: PayloadState;
  history: PayloadState[];
  decision: BindingDecision | null;
  classIndex: number;
  flowKey: FlowKey | null;
  destination: Endpoint | null;
  cursor: FragmentCursor | null;
  backpressureRetries: number;
}

export interface PayloadInput {
  tag: string;
  bytes: Uint8Array;
}

/**
 * Drives payloads through classifying → fragmenting → sending → completed on a virtual clock.
 *
 * Each payload gets its own flow (sender address plus an ephemeral port) so per-payload
 * statistics stay separate even when several payloads share a destination. Only one send
 * event per payload is outstanding at any time, which keeps fragments in sequence order.
 */
export class SimulationOrchestrator {
  readonly runId: string;

  readonly config: SimulationConfig;

  private readonly scheduler: EventScheduler;

  private readonly transport: Transport;

  private readonly tracker: DeliveryTracker;

  private readonly binding: ClassifierBinding;

  private readonly aggregator = new MetricsAggregator();

  private readonly classifier: Classifier;

  private readonly logger: SimLogger;

  private readonly scenario: string | null;

  private readonly classIndexById = new Map<string, number>();

  private readonly payloads = new Map<string, PayloadRun>();

  private readonly flowsByClass = new Map<string, FlowKey[]>();

  private nextEphemeralPort = FIRST_EPHEMERAL_PORT;

  private droppedPayloads = 0;

  private stopped = false;

  private stoppedEarly = false;

  constructor(config: SimulationConfig, options: OrchestratorOptions) {
    validateSimulationConfig(config);

    this.config = config;
    this.runId = options.runId ?? generateId();
    this.scenario = options.scenario ?? null;
    this.logger = options.logger ?? console;
    this.classifier = options.classifier;
    this.scheduler = options.scheduler ?? new EventScheduler();
    this.tracker = options.tracker ?? new DeliveryTracker(this.logger);

    config.classes.forEach((classId, index) => this.classIndexById.set(classId, index));

    const destinations = options.destinations ?? buildDestinations(config.classes);
    for (const destination of destinations) {
      if (!this.classIndexById.has(destination.classId)) {
        throw new ConfigurationError(`Destination bound to unknown class ${destination.classId}`);
      }
    }
    this.binding = new ClassifierBinding({
      destinations,
      confidenceThreshold: config.confidenceThreshold,
      fallbackClass: config.fallbackClass,
    });

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const transport = new PointToPointTransport(this.scheduler, config.link, this.logger);
      for (const destination of destinations) {
        transport.connect(destination.endpoint);
      }
      this.transport = transport;
    }

    for (const destination of destinations) {
      this.transport.onReceive(destination.endpoint, (bytes, arrivedAt, from) =>
        this.handleArrival(destination.endpoint, bytes, arrivedAt, from),
      );
    }
  }

  now(): number {
    return this.scheduler.now();
  }

  /** Queues a payload; classification and sending begin at `startAt` (or now, if that is later). */
  submit(input: PayloadInput, startAt = this.scheduler.now()): string {
    if (this.stopped) {
      throw new SchedulingError(`Run ${this.runId} has been stopped`);
    }
    if (this.payloads.size >= MAX_PAYLOADS_PER_RUN) {
      throw new ConfigurationError(
        `Run ${this.runId} already holds ${MAX_PAYLOADS_PER_RUN} payloads, the number of source ports available`,
      );
    }
    const count = fragmentCount(input.bytes.length, this.config.fragmentSizeBytes);
    if (count > MAX_WIRE_SEQUENCE + 1) {
      throw new ConfigurationError(
        `Payload ${input.tag} needs ${count} fragments, more than the ${MAX_WIRE_SEQUENCE + 1} the fragment header can number`,
      );
    }

    const payload: Payload = { id: generateId(), tag: input.tag, bytes: input.bytes };
    const run: PayloadRun = {
      payload,
      state: 'classifying',
      history: ['classifying'],
      decision: null,
      classIndex: -1,
      flowKey: null,
      destination: null,
      cursor: null,
      backpressureRetries: 0,
    };
    this.payloads.set(payload.id, run);

    const at = Math.max(startAt, this.scheduler.now());
    this.scheduler.scheduleAt(at, () => this.startPayload(run));
    return payload.id;
  }

  /** Runs the event loop up to `until` (the configured duration by default), then stops. */
  run(until = this.config.durationSec): SimulationReport {
    if (this.stopped) {
      throw new SchedulingError(`Run ${this.runId} has already finished`);
    }

    this.logger.info(`[orchestrator] run ${this.runId} started, ${this.payloads.size} payload(s) queued`);
    this.scheduler.run(until);
    this.stop();
    const report = this.getReport();
    this.logger.info(
      `[orchestrator] run ${this.runId} finished at t=${report.finishedAt}s, flows=${report.flows.length} dropped=${report.droppedPayloads}`,
    );
    return report;
  }

  // Cancels every scheduled send and in-flight arrival. Partially sent payloads keep their counts.
  stop(): number {
    const outstanding = [...this.payloads.values()].some((run) => run.state !== 'completed');
    if (this.scheduler.isRunning()) {
      this.scheduler.stop();
    }
    const cancelled = this.scheduler.cancelAll();

    if (!this.stopped) {
      this.stopped = true;
      this.stoppedEarly = outstanding || cancelled > 0;
      if (cancelled > 0) {
        this.logger.info(`[orchestrator] run ${this.runId} stopped, ${cancelled} pending event(s) cancelled`);
      }
    }
    return cancelled;
  }

  getPayloadState(payloadId: string): PayloadState | undefined {
    return this.payloads.get(payloadId)?.state;
  }

  getDroppedCount(): number {
    return this.droppedPayloads;
  }

  getAssignedCounts(): Record<string, number> {
    return this.binding.getAssignedCounts();
  }

  getTracker(): DeliveryTracker {
    return this.tracker;
  }

  getFlowStatistics(): FlowStatistics[] {
    return this.tracker.finalizeAll();
  }

  getClassStatistics(classId: string): ClassStatistics {
    const flows = (this.flowsByClass.get(classId) ?? []).map((key) => this.tracker.finalize(key));
    return this.aggregator.computeClassStatistics(classId, flows);
  }

  getReport(): SimulationReport {
    return {
      runId: this.runId,
      scenario: this.scenario,
      config: this.config,
      finishedAt: this.scheduler.now(),
      stoppedEarly: this.stoppedEarly,
      flows: this.getFlowStatistics(),
      classes: this.config.classes.map((classId) => this.getClassStatistics(classId)),
      droppedPayloads: this.droppedPayloads,
      assigned: this.getAssignedCounts(),
      payloads: [...this.payloads.values()].map((run) => this.summarize(run)),
      inconsistencies: [...this.tracker.getInconsistencies()],
    };
  }

  private startPayload(run: PayloadRun): void {
    const { payload } = run;
    const result = this.classifier.classify(payload.bytes, payload.tag);
    const decision = this.binding.bind(result);
    run.decision = decision;

    if (decision.outcome === 'dropped') {
      this.droppedPayloads += 1;
      this.transition(run, 'completed');
      this.logger.warn(`[orchestrator] payload ${payload.tag} dropped (${decision.reason}), no fallback class configured`);
      return;
    }

    this.transition(run, 'fragmenting');
    const now = this.scheduler.now();
    const plan = planFragments(payload.bytes.length, this.config, now);
    const flowKey: FlowKey = {
      source: { address: SENDER_ADDRESS, port: this.allocatePort() },
      destination: decision.destination.endpoint,
    };
    run.classIndex = this.classIndexById.get(decision.classId) ?? 0;
    run.flowKey = flowKey;
    run.destination = decision.destination.endpoint;
    run.cursor = new FragmentCursor(plan);

    const classFlows = this.flowsByClass.get(decision.classId) ?? [];
    classFlows.push(flowKey);
    this.flowsByClass.set(decision.classId, classFlows);

    this.logger.info(
      `[orchestrator] payload ${payload.tag} -> ${decision.classId} (${decision.outcome === 'fallback' ? `fallback: ${decision.reason}` : 'bound'}), ` +
        `${plan.fragments.length} fragment(s) on ${flowIdOf(flowKey)}`,
    );

    this.transition(run, 'sending');
    const first = run.cursor.current();
    if (!first) {
      this.tracker.openFlow(flowKey, now);
      this.transition(run, 'completed');
      return;
    }
    this.scheduleSend(run, first.scheduledAt);
  }

  private scheduleSend(run: PayloadRun, at: number): void {
    this.scheduler.scheduleAt(Math.max(at, this.scheduler.now()), () => this.sendCurrent(run));
  }

  private sendCurrent(run: PayloadRun): void {
    const { cursor, flowKey, destination } = run;
    const fragment = cursor?.current();
    if (!cursor || !flowKey || !destination || !fragment) {
      return;
    }

    const body = run.payload.bytes.subarray(fragment.offset, fragment.offset + fragment.length);
    const frame = encodeFragment(run.classIndex, fragment.sequence, body);
    const now = this.scheduler.now();
    const result = this.transport.send(flowKey.source, destination, frame);

    if (result.status === 'backpressure') {
      run.backpressureRetries += 1;
      const retryAt =
        result.retryAt !== undefined && result.retryAt > now
          ? result.retryAt
          : now + pacingInterval(fragment.length, this.config.targetRateBps);
      this.scheduleSend(run, retryAt);
      return;
    }

    this.tracker.recordSend(flowKey, fragment.sequence, now, fragment.length);
    const next = cursor.advance();
    if (!next) {
      this.transition(run, 'completed');
      return;
    }
    this.scheduleSend(run, next.scheduledAt);
  }

  private handleArrival(destination: Endpoint, bytes: Uint8Array, arrivedAt: number, from: Endpoint): void {
    const decoded = decodeFragment(bytes);
    if (!decoded) {
      this.logger.warn(`[orchestrator] runt frame of ${bytes.length} byte(s) from ${from.address}:${from.port} ignored`);
      return;
    }

    this.tracker.recordReceive({ source: from, destination }, decoded.sequence, arrivedAt, decoded.body.length);
  }

  private transition(run: PayloadRun, next: PayloadState): void {
    if (!TRANSITIONS[run.state].includes(next)) {
      throw new InvalidTransitionError(run.payload.id, run.state, next);
    }
    run.state = next;
    run.history.push(next);
  }

  private allocatePort(): number {
    const port = this.nextEphemeralPort;
    if (port > LAST_EPHEMERAL_PORT) {
      throw new SchedulingError(`Run ${this.runId} has no source ports left`);
    }
    this.nextEphemeralPort = port + 1;
    return port;
  }

  private summarize(run: PayloadRun): PayloadSummary {
    return {
      payloadId: run.payload.id,
      tag: run.payload.tag,
      sizeBytes: run.payload.bytes.length,
      state: run.state,
      history: [...run.history],
      classId: run.decision && run.decision.outcome !== 'dropped' ? run.decision.classId : null,
      decision: run.decision?.outcome ?? 'pending',
      flowId: run.flowKey ? flowIdOf(run.flowKey) : null,
      fragmentsPlanned: run.cursor?.total ?? 0,
      fragmentsSent: run.cursor?.sentCount ?? 0,
      backpressureRetries: run.backpressureRetries,
    };
  }
}
