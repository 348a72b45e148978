import type { SimulationReport } from '../types.js';

export interface RunSummary {
  runId: string;
  scenario: string | null;
  finishedAt: number;
  stoppedEarly: boolean;
  flowCount: number;
  droppedPayloads: number;
  inconsistencies: number;
}

function summarize(report: SimulationReport): RunSummary {
  return {
    runId: report.runId,
    scenario: report.scenario,
    finishedAt: report.finishedAt,
    stoppedEarly: report.stoppedEarly,
    flowCount: report.flows.length,
    droppedPayloads: report.droppedPayloads,
    inconsistencies: report.inconsistencies.length
  };
}

// Keeps the most recent reports in insertion order; the oldest is evicted past the limit.
export class RunStore {
  private readonly reports = new Map<string, SimulationReport>();

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Run history limit must be a positive integer, got ${limit}`);
    }
  }

  get size(): number {
    return this.reports.size;
  }

  save(report: SimulationReport): void {
    this.reports.delete(report.runId);
    this.reports.set(report.runId, report);
    while (this.reports.size > this.limit) {
      const oldest = this.reports.keys().next();
      if (oldest.done) break;
      this.reports.delete(oldest.value);
    }
  }

  get(runId: string): SimulationReport | undefined {
    return this.reports.get(runId);
  }

  latest(): SimulationReport | undefined {
    let last: SimulationReport | undefined;
    for (const report of this.reports.values()) last = report;
    return last;
  }

  list(): RunSummary[] {
    return [...this.reports.values()].map(summarize);
  }
}
