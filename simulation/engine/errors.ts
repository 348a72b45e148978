export type SimulationErrorCode =
  | 'configuration'
  | 'stats_inconsistency'
  | 'unknown_flow'
  | 'invalid_transition'
  | 'scheduling';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends SimulationError {
  constructor(message: string) {
    super('configuration', message);
  }
}

// Raised for a receive event with no matching send. The tracker logs it and drops the sample.
export class StatsInconsistency extends SimulationError {
  readonly flowId: string;

  readonly sequence: number;

  constructor(flowId: string, sequence: number, message: string) {
    super('stats_inconsistency', message);
    this.flowId = flowId;
    this.sequence = sequence;
  }
}

export class UnknownFlowError extends SimulationError {
  constructor(flowId: string) {
    super('unknown_flow', `No flow recorded for ${flowId}`);
  }
}

export class InvalidTransitionError extends SimulationError {
  constructor(payloadId: string, from: string, to: string) {
    super('invalid_transition', `Payload ${payloadId} cannot move from ${from} to ${to}`);
  }
}

export class SchedulingError extends SimulationError {
  constructor(message: string) {
    super('scheduling', message);
  }
}
