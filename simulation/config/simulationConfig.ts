import { ConfigurationError } from '../engine/errors.js';
import { assertPacingOptions } from '../engine/FragmentPacer.js';
import { validateLinkConfig } from '../transport/PointToPointTransport.js';
import { FOOTBALLER_CLASSES, type LinkConfig, type SimulationConfig } from '../types/simulation.js';

export const DEFAULT_LINK_CONFIG: LinkConfig = {
  bandwidthBps: 5_000_000,
  propagationDelaySec: 0.002,
  queueCapacity: 100,
  // UDP 8 + IPv4 20 + PPP 2
  frameOverheadBytes: 30,
  lossRate: 0,
  seed: 1,
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  classes: FOOTBALLER_CLASSES,
  fragmentSizeBytes: 1024,
  targetRateBps: 1_000_000,
  confidenceThreshold: 100,
  durationSec: 10,
  link: DEFAULT_LINK_CONFIG,
};

const RATE_UNITS: Record<string, number> = {
  bps: 1,
  b: 1,
  kbps: 1_000,
  kb: 1_000,
  mbps: 1_000_000,
  mb: 1_000_000,
  gbps: 1_000_000_000,
  gb: 1_000_000_000,
};

const BYTE_RATE_UNITS: Record<string, number> = {
  Bps: 8,
  KBps: 8_000,
  kBps: 8_000,
  MBps: 8_000_000,
  GBps: 8_000_000_000,
};

const TIME_UNITS: Record<string, number> = {
  s: 1,
  ms: 1e-3,
  us: 1e-6,
  ns: 1e-9,
  min: 60,
};

function splitQuantity(value: string, what: string): { amount: number; unit: string } {
  const match = value.trim().match(/^(\d+(?:\.\d+)?(?:e[+-]?\d+)?)\s*([A-Za-z]*)$/);
  const amount = match?.[1];
  if (!match || amount === undefined) {
    throw new ConfigurationError(`Invalid ${what}: "${value}"`);
  }
  return { amount: Number(amount), unit: match[2] ?? '' };
}

/**
 * Parses a data rate such as `"1Mbps"`, `"500kbps"` or `"2MBps"` into bits per second.
 * Multipliers are decimal; a capital `B` means bytes. Bare numbers are taken as bits/s.
 */
export function parseDataRate(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`Invalid data rate: ${value}`);
    }
    return value;
  }

  const { amount, unit } = splitQuantity(value, 'data rate');
  const byteMultiplier = BYTE_RATE_UNITS[unit];
  const multiplier = byteMultiplier ?? (unit === '' ? 1 : RATE_UNITS[unit.toLowerCase()]);
  if (multiplier === undefined || amount <= 0) {
    throw new ConfigurationError(`Invalid data rate: "${value}"`);
  }
  return amount * multiplier;
}

// `"2ms"`, `"10s"`, `"250us"`; bare numbers are seconds.
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(`Invalid duration: ${value}`);
    }
    return value;
  }

  const { amount, unit } = splitQuantity(value, 'duration');
  const multiplier = unit === '' ? 1 : TIME_UNITS[unit];
  if (multiplier === undefined) {
    throw new ConfigurationError(`Invalid duration: "${value}"`);
  }
  return amount * multiplier;
}

export function validateSimulationConfig(config: SimulationConfig): void {
  if (config.classes.length === 0) {
    throw new ConfigurationError('At least one destination class is required');
  }
  const seen = new Set<string>();
  for (const classId of config.classes) {
    if (classId.trim() === '') {
      throw new ConfigurationError('Destination class identifiers must be non-empty');
    }
    if (seen.has(classId)) {
      throw new ConfigurationError(`Destination class ${classId} is listed twice`);
    }
    seen.add(classId);
  }
  if (config.classes.length > 0xffff) {
    throw new ConfigurationError('Too many destination classes for the fragment header');
  }

  assertPacingOptions(config);

  if (!Number.isFinite(config.confidenceThreshold)) {
    throw new ConfigurationError('Confidence threshold must be a finite number');
  }
  if (config.fallbackClass !== undefined && !seen.has(config.fallbackClass)) {
    throw new ConfigurationError(`Fallback class ${config.fallbackClass} is not one of the destination classes`);
  }
  if (!Number.isFinite(config.durationSec) || config.durationSec <= 0) {
    throw new ConfigurationError(`Simulation duration must be positive, got ${config.durationSec}`);
  }

  validateLinkConfig(config.link);
}
