import type {
  ClassStatistics,
  FlowStatistics,
  SimulationReport
} from '../simulation/types/simulation.js';

export type { ClassStatistics, FlowStatistics, SimulationReport };

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

export interface RunRequestBody {
  scenario?: string;
  overrides?: unknown;
}

export interface SweepRequestBody {
  scenarios?: string[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRunRequest(value: unknown): RunRequestBody {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new HttpError(400, 'Expected a JSON object body');
  if (value.scenario !== undefined && typeof value.scenario !== 'string') {
    throw new HttpError(400, 'Expected { scenario?: string, overrides?: object }');
  }
  return {
    ...(typeof value.scenario === 'string' ? { scenario: value.scenario } : {}),
    ...(value.overrides !== undefined ? { overrides: value.overrides } : {})
  };
}

export function parseSweepRequest(value: unknown): SweepRequestBody {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new HttpError(400, 'Expected a JSON object body');
  const { scenarios } = value;
  if (scenarios === undefined) return {};
  if (!Array.isArray(scenarios) || !scenarios.every((name): name is string => typeof name === 'string')) {
    throw new HttpError(400, 'Expected { scenarios?: string[] }');
  }
  return { scenarios };
}
