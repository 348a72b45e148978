import type { FlowKey, FlowStatistics, SimLogger, StatsInconsistencyRecord } from '../types/simulation.js';
import { flowIdOf } from '../utils/endpoint.js';
import { StatsInconsistency, UnknownFlowError } from './errors.js';

interface FlowRecord {
  key: FlowKey;
  sent: number;
  received: number;
  bytesSent: number;
  bytesReceived: number;
  delaySum: number;
  firstSendAt: number | null;
  lastReceiveAt: number | null;
  sendTimes: Map<number, number>;
  receivedSequences: Set<number>;
}

function emptyRecord(key: FlowKey, openedAt: number | null): FlowRecord {
  return {
    key,
    sent: 0,
    received: 0,
    bytesSent: 0,
    bytesReceived: 0,
    delaySum: 0,
    firstSendAt: openedAt,
    lastReceiveAt: null,
    sendTimes: new Map(),
    receivedSequences: new Set(),
  };
}

// Per-run flow bookkeeping. Each simulation owns one tracker; nothing here is process-wide.
export class DeliveryTracker {
  private readonly flows = new Map<string, FlowRecord>();

  private readonly inconsistencies: StatsInconsistencyRecord[] = [];

  constructor(private readonly logger: SimLogger = console) {}

  // Registers a flow that will never carry fragments (an empty payload) so it still reports.
  openFlow(key: FlowKey, openedAt: number): void {
    const flowId = flowIdOf(key);
    if (!this.flows.has(flowId)) {
      this.flows.set(flowId, emptyRecord(key, openedAt));
    }
  }

  recordSend(key: FlowKey, sequence: number, sentAt: number, sizeBytes: number): void {
    const flowId = flowIdOf(key);
    let record = this.flows.get(flowId);
    if (!record) {
      record = emptyRecord(key, sentAt);
      this.flows.set(flowId, record);
    }

    record.firstSendAt ??= sentAt;
    record.sent += 1;
    record.bytesSent += sizeBytes;
    record.sendTimes.set(sequence, sentAt);
  }

  /**
   * Returns false when the sample was rejected as inconsistent (no matching send, or the
   * same sequence arriving twice). Rejected samples are logged and kept for inspection.
   */
  recordReceive(key: FlowKey, sequence: number, receivedAt: number, sizeBytes: number): boolean {
    const flowId = flowIdOf(key);
    const record = this.flows.get(flowId);
    if (!record) {
      return this.reject(
        new StatsInconsistency(flowId, sequence, `Receive on ${flowId} seq=${sequence} for a flow with no sends`),
        'unknown_flow',
        receivedAt,
      );
    }

    const sentAt = record.sendTimes.get(sequence);
    if (sentAt === undefined) {
      return this.reject(
        new StatsInconsistency(flowId, sequence, `Receive on ${flowId} seq=${sequence} has no matching send`),
        'no_matching_send',
        receivedAt,
      );
    }
    if (record.receivedSequences.has(sequence)) {
      return this.reject(
        new StatsInconsistency(flowId, sequence, `Duplicate receive on ${flowId} seq=${sequence}`),
        'duplicate_receive',
        receivedAt,
      );
    }

    record.receivedSequences.add(sequence);
    record.received += 1;
    record.bytesReceived += sizeBytes;
    record.delaySum += receivedAt - sentAt;
    record.lastReceiveAt = receivedAt;
    return true;
  }

  finalize(key: FlowKey): FlowStatistics {
    const flowId = flowIdOf(key);
    const record = this.flows.get(flowId);
    if (!record) {
      throw new UnknownFlowError(flowId);
    }

    const meanDelaySec = record.received === 0 ? null : record.delaySum / record.received;

    let throughputBps: number | null = null;
    if (record.firstSendAt !== null && record.lastReceiveAt !== null) {
      const duration = record.lastReceiveAt - record.firstSendAt;
      if (duration > 0) {
        throughputBps = (record.bytesReceived * 8) / duration;
      }
    }

    const lossRatio = record.sent === 0 ? 0 : (record.sent - record.received) / record.sent;

    return {
      flowId,
      source: record.key.source,
      destination: record.key.destination,
      sent: record.sent,
      received: record.received,
      bytesSent: record.bytesSent,
      bytesReceived: record.bytesReceived,
      meanDelaySec,
      throughputBps,
      lossRatio,
      firstSendAt: record.firstSendAt,
      lastReceiveAt: record.lastReceiveAt,
    };
  }

  hasFlow(key: FlowKey): boolean {
    return this.flows.has(flowIdOf(key));
  }

  getFlowKeys(): FlowKey[] {
    return [...this.flows.values()].map((record) => record.key);
  }

  finalizeAll(): FlowStatistics[] {
    return this.getFlowKeys().map((key) => this.finalize(key));
  }

  getInconsistencies(): readonly StatsInconsistencyRecord[] {
    return this.inconsistencies;
  }

  private reject(err: StatsInconsistency, reason: StatsInconsistencyRecord['reason'], at: number): false {
    this.inconsistencies.push({ flowId: err.flowId, sequence: err.sequence, at, reason });
    this.logger.warn(`[tracker] stats inconsistency, sample dropped: ${err.message}`);
    return false;
  }
}
