export const FOOTBALLER_CLASSES = ['messi', 'ronaldo', 'neymar', 'mbappe', 'haaland'] as const;

export type FootballerClass = (typeof FOOTBALLER_CLASSES)[number];

export interface Endpoint {
  address: string;
  port: number;
}

export interface Destination<C extends string = string> {
  classId: C;
  endpoint: Endpoint;
}

export interface Payload {
  id: string;
  tag: string;
  bytes: Uint8Array;
}

// Lower distance means a more confident match.
export type ClassificationResult =
  | { status: 'classified'; classId: string; distance: number }
  | { status: 'unresolved'; distance?: number };

export type FallbackReason = 'unresolved' | 'low_confidence' | 'unknown_class';

export type BindingDecision<C extends string = string> =
  | { outcome: 'bound'; classId: C; destination: Destination<C> }
  | { outcome: 'fallback'; classId: C; destination: Destination<C>; reason: FallbackReason }
  | { outcome: 'dropped'; reason: FallbackReason };

export interface Fragment {
  sequence: number;
  offset: number;
  length: number;
  scheduledAt: number;
}

export interface PacingPlan {
  fragments: readonly Fragment[];
  startAt: number;
  endsAt: number;
  totalBytes: number;
}

export interface FlowKey {
  source: Endpoint;
  destination: Endpoint;
}

export interface FlowStatistics {
  flowId: string;
  source: Endpoint;
  destination: Endpoint;
  sent: number;
  received: number;
  bytesSent: number;
  bytesReceived: number;
  meanDelaySec: number | null;
  throughputBps: number | null;
  lossRatio: number;
  firstSendAt: number | null;
  lastReceiveAt: number | null;
}

export interface ClassStatistics {
  classId: string;
  flowCount: number;
  sent: number;
  received: number;
  bytesReceived: number;
  meanDelaySec: number | null;
  throughputBps: number | null;
  lossRatio: number | null;
}

export type PayloadState = 'classifying' | 'fragmenting' | 'sending' | 'completed';

export interface PayloadSummary {
  payloadId: string;
  tag: string;
  sizeBytes: number;
  state: PayloadState;
  history: PayloadState[];
  classId: string | null;
  decision: BindingDecision['outcome'] | 'pending';
  flowId: string | null;
  fragmentsPlanned: number;
  fragmentsSent: number;
  backpressureRetries: number;
}

export interface LinkConfig {
  bandwidthBps: number;
  propagationDelaySec: number;
  queueCapacity: number;
  frameOverheadBytes: number;
  lossRate: number;
  seed: number;
}

export interface SimulationConfig<C extends string = string> {
  classes: readonly C[];
  fragmentSizeBytes: number;
  targetRateBps: number;
  confidenceThreshold: number;
  fallbackClass?: C;
  durationSec: number;
  link: LinkConfig;
}

export interface StatsInconsistencyRecord {
  flowId: string;
  sequence: number;
  at: number;
  reason: 'no_matching_send' | 'duplicate_receive' | 'unknown_flow';
}

export interface SimulationReport {
  runId: string;
  scenario: string | null;
  config: SimulationConfig;
  finishedAt: number;
  stoppedEarly: boolean;
  flows: FlowStatistics[];
  classes: ClassStatistics[];
  droppedPayloads: number;
  assigned: Record<string, number>;
  payloads: PayloadSummary[];
  inconsistencies: StatsInconsistencyRecord[];
}

export interface SimLogger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
