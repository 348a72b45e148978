import type { ClassStatistics, FlowStatistics } from '../types/simulation.js';

function meanOfDefined(values: Array<number | null>): number | null {
  const defined = values.filter((v): v is number => v !== null && Number.isFinite(v));
  if (defined.length === 0) {
    return null;
  }
  return defined.reduce((sum, v) => sum + v, 0) / defined.length;
}

export interface RunComparison {
  flowCount: number;
  meanThroughputBps: number | null;
  meanDelaySec: number | null;
  meanLossRatio: number | null;
}

// Per-class summaries are unweighted: every flow counts once, whatever its size.
export class MetricsAggregator {
  computeClassStatistics(classId: string, flows: readonly FlowStatistics[]): ClassStatistics {
    return {
      classId,
      flowCount: flows.length,
      sent: flows.reduce((sum, flow) => sum + flow.sent, 0),
      received: flows.reduce((sum, flow) => sum + flow.received, 0),
      bytesReceived: flows.reduce((sum, flow) => sum + flow.bytesReceived, 0),
      meanDelaySec: meanOfDefined(flows.map((flow) => flow.meanDelaySec)),
      throughputBps: meanOfDefined(flows.map((flow) => flow.throughputBps)),
      lossRatio: meanOfDefined(flows.map((flow) => flow.lossRatio)),
    };
  }

  compareRun(flows: readonly FlowStatistics[]): RunComparison {
    return {
      flowCount: flows.length,
      meanThroughputBps: meanOfDefined(flows.map((flow) => flow.throughputBps)),
      meanDelaySec: meanOfDefined(flows.map((flow) => flow.meanDelaySec)),
      meanLossRatio: meanOfDefined(flows.map((flow) => flow.lossRatio)),
    };
  }
}
