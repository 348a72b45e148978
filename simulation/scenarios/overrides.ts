import { ConfigurationError } from '../engine/errors.js';

export interface ScenarioPayloadSpec {
  tag: string;
  sizeBytes: number;
  // Class whose byte pattern fills the payload; omitted means unrecognisable content.
  contentClass?: string;
  // Share of bytes (after the first) inverted to push the classifier's distance up.
  corruption?: number;
  startAt?: number;
}

export interface ScenarioOverrides {
  classes?: string[];
  standardImages?: boolean;
  imageSize?: number;
  packetSize?: number;
  dataRate?: string | number;
  linkRate?: string | number;
  delay?: string | number;
  duration?: string | number;
  confidenceThreshold?: number;
  fallbackClass?: string | null;
  lossRate?: number;
  queueCapacity?: number;
  frameOverhead?: number;
  seed?: number;
  firstStart?: number;
  payloads?: ScenarioPayloadSpec[];
}

export interface ScenarioDefinition {
  name: string;
  description: string;
  overrides: ScenarioOverrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(source: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${where}.${key} must be a number`);
  }
  return value;
}

function optionalQuantity(source: Record<string, unknown>, key: string, where: string): string | number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' && (typeof value !== 'number' || !Number.isFinite(value))) {
    throw new ConfigurationError(`${where}.${key} must be a number or a string such as "1Mbps" or "2ms"`);
  }
  return value;
}

function parsePayloadSpec(value: unknown, where: string): ScenarioPayloadSpec {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  if (typeof value.tag !== 'string' || value.tag === '') {
    throw new ConfigurationError(`${where}.tag must be a non-empty string`);
  }
  const sizeBytes = optionalNumber(value, 'sizeBytes', where);
  if (sizeBytes === undefined || !Number.isInteger(sizeBytes) || sizeBytes < 0) {
    throw new ConfigurationError(`${where}.sizeBytes must be a non-negative integer`);
  }
  if (value.contentClass !== undefined && typeof value.contentClass !== 'string') {
    throw new ConfigurationError(`${where}.contentClass must be a string`);
  }
  const corruption = optionalNumber(value, 'corruption', where);
  if (corruption !== undefined && (corruption < 0 || corruption > 1)) {
    throw new ConfigurationError(`${where}.corruption must be between 0 and 1`);
  }
  const startAt = optionalNumber(value, 'startAt', where);

  return {
    tag: value.tag,
    sizeBytes,
    ...(typeof value.contentClass === 'string' ? { contentClass: value.contentClass } : {}),
    ...(corruption !== undefined ? { corruption } : {}),
    ...(startAt !== undefined ? { startAt } : {}),
  };
}

/** Validates untrusted scenario overrides (a preset file entry or a request body). */
export function parseScenarioOverrides(value: unknown, where = 'overrides'): ScenarioOverrides {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }

  const overrides: ScenarioOverrides = {};

  if (value.classes !== undefined) {
    if (!Array.isArray(value.classes) || !value.classes.every((c): c is string => typeof c === 'string')) {
      throw new ConfigurationError(`${where}.classes must be an array of strings`);
    }
    overrides.classes = value.classes;
  }
  if (value.standardImages !== undefined) {
    if (typeof value.standardImages !== 'boolean') {
      throw new ConfigurationError(`${where}.standardImages must be a boolean`);
    }
    overrides.standardImages = value.standardImages;
  }
  if (value.fallbackClass !== undefined) {
    if (value.fallbackClass !== null && typeof value.fallbackClass !== 'string') {
      throw new ConfigurationError(`${where}.fallbackClass must be a string or null`);
    }
    overrides.fallbackClass = value.fallbackClass;
  }

  const numbers = [
    'imageSize',
    'packetSize',
    'confidenceThreshold',
    'lossRate',
    'queueCapacity',
    'frameOverhead',
    'seed',
    'firstStart',
  ] as const;
  for (const key of numbers) {
    const parsed = optionalNumber(value, key, where);
    if (parsed !== undefined) overrides[key] = parsed;
  }

  const quantities = ['dataRate', 'linkRate', 'delay', 'duration'] as const;
  for (const key of quantities) {
    const parsed = optionalQuantity(value, key, where);
    if (parsed !== undefined) overrides[key] = parsed;
  }

  if (value.payloads !== undefined) {
    if (!Array.isArray(value.payloads)) {
      throw new ConfigurationError(`${where}.payloads must be an array`);
    }
    overrides.payloads = value.payloads.map((entry, index) => parsePayloadSpec(entry, `${where}.payloads[${index}]`));
  }

  return overrides;
}

export function parseScenarioDefinitions(value: unknown): ScenarioDefinition[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError('Scenario file must contain an array of scenarios');
  }

  const names = new Set<string>();
  return value.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || entry.name === '') {
      throw new ConfigurationError(`scenarios[${index}] needs a non-empty name`);
    }
    if (names.has(entry.name)) {
      throw new ConfigurationError(`Scenario ${entry.name} is defined twice`);
    }
    names.add(entry.name);
    return {
      name: entry.name,
      description: typeof entry.description === 'string' ? entry.description : '',
      overrides: parseScenarioOverrides(entry.overrides, `scenarios[${index}].overrides`),
    };
  });
}
