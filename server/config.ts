import {
  DEFAULT_SIMULATION_CONFIG,
  parseDataRate,
  parseDuration,
  validateSimulationConfig
} from '../simulation/config/simulationConfig.js';
import { ConfigurationError } from '../simulation/engine/errors.js';
import { BUNDLED_SCENARIOS_PATH } from '../simulation/scenarios/presets.js';
import type { SimulationConfig } from '../simulation/types/simulation.js';

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  scenariosPath: string;
  runHistoryLimit: number;
  simulation: SimulationConfig;
}

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = readEnv(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

function readParsedEnv<T>(env: Env, name: string, parse: (raw: string) => T, fallback: T): T {
  const raw = readEnv(env, name);
  if (raw === undefined) return fallback;
  try {
    return parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid ${name}: ${reason}`);
  }
}

function parseThreshold(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigurationError(`"${raw}" is not a number`);
  return value;
}

function resolveSimulationDefaults(env: Env): SimulationConfig {
  const base = DEFAULT_SIMULATION_CONFIG;
  const fallbackClass = readEnv(env, 'SIM_FALLBACK_CLASS');
  const config: SimulationConfig = {
    ...base,
    fragmentSizeBytes: readIntEnv(env, 'SIM_PACKET_SIZE', base.fragmentSizeBytes),
    targetRateBps: readParsedEnv(env, 'SIM_DATA_RATE', parseDataRate, base.targetRateBps),
    confidenceThreshold: readParsedEnv(env, 'SIM_CONFIDENCE_THRESHOLD', parseThreshold, base.confidenceThreshold),
    durationSec: readParsedEnv(env, 'SIM_DURATION', parseDuration, base.durationSec),
    link: {
      ...base.link,
      propagationDelaySec: readParsedEnv(env, 'SIM_DELAY', parseDuration, base.link.propagationDelaySec)
    },
    ...(fallbackClass ? { fallbackClass } : {})
  };

  try {
    validateSimulationConfig(config);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid simulation defaults from environment: ${reason}`);
  }
  return config;
}

export function resolveServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: readIntEnv(env, 'PORT', 3001),
    corsOrigin: readEnv(env, 'CORS_ORIGIN') ?? 'http://localhost:5173',
    scenariosPath: readEnv(env, 'SCENARIOS_PATH') ?? BUNDLED_SCENARIOS_PATH,
    runHistoryLimit: readIntEnv(env, 'RUN_HISTORY_LIMIT', 20),
    simulation: resolveSimulationDefaults(env)
  };
}
