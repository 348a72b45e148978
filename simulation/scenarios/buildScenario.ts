import { PatternClassifier } from '../classifier/PatternClassifier.js';
import { generateSimulatedImage } from '../classifier/simulatedImage.js';
import {
  DEFAULT_SIMULATION_CONFIG,
  parseDataRate,
  parseDuration,
  validateSimulationConfig,
} from '../config/simulationConfig.js';
import { ConfigurationError } from '../engine/errors.js';
import { MetricsAggregator, type RunComparison } from '../engine/MetricsAggregator.js';
import { SimulationOrchestrator, type PayloadInput } from '../engine/SimulationOrchestrator.js';
import { MAX_WIRE_SEQUENCE } from '../transport/FragmentCodec.js';
import type { SimLogger, SimulationConfig, SimulationReport } from '../types/simulation.js';
import type { ScenarioDefinition, ScenarioOverrides, ScenarioPayloadSpec } from './overrides.js';

export const DEFAULT_IMAGE_SIZE = 50_000;
export const DEFAULT_FIRST_START_SEC = 2.0;

export interface ResolvedScenario {
  name: string | null;
  config: SimulationConfig;
  imageSizeBytes: number;
  firstStartSec: number;
  standardImages: boolean;
  payloads: ScenarioPayloadSpec[];
}

export interface TimedPayload extends PayloadInput {
  startAt: number;
}

export interface RunOptions {
  logger?: SimLogger;
  runId?: string;
}

export interface SweepEntry {
  name: string;
  description: string;
  report: SimulationReport;
  comparison: RunComparison & { droppedPayloads: number };
}

export function resolveScenario(
  overrides: ScenarioOverrides,
  base: SimulationConfig = DEFAULT_SIMULATION_CONFIG,
  name: string | null = null,
): ResolvedScenario {
  const fallbackClass = overrides.fallbackClass === null ? undefined : (overrides.fallbackClass ?? base.fallbackClass);

  const config: SimulationConfig = {
    classes: overrides.classes ?? base.classes,
    fragmentSizeBytes: overrides.packetSize ?? base.fragmentSizeBytes,
    targetRateBps: overrides.dataRate !== undefined ? parseDataRate(overrides.dataRate) : base.targetRateBps,
    confidenceThreshold: overrides.confidenceThreshold ?? base.confidenceThreshold,
    ...(fallbackClass !== undefined ? { fallbackClass } : {}),
    durationSec: overrides.duration !== undefined ? parseDuration(overrides.duration) : base.durationSec,
    link: {
      bandwidthBps: overrides.linkRate !== undefined ? parseDataRate(overrides.linkRate) : base.link.bandwidthBps,
      propagationDelaySec: overrides.delay !== undefined ? parseDuration(overrides.delay) : base.link.propagationDelaySec,
      queueCapacity: overrides.queueCapacity ?? base.link.queueCapacity,
      frameOverheadBytes: overrides.frameOverhead ?? base.link.frameOverheadBytes,
      lossRate: overrides.lossRate ?? base.link.lossRate,
      seed: overrides.seed ?? base.link.seed,
    },
  };
  validateSimulationConfig(config);

  // Largest payload whose fragments the wire header can still number.
  const maxPayloadBytes = (MAX_WIRE_SEQUENCE + 1) * config.fragmentSizeBytes;

  const imageSizeBytes = overrides.imageSize ?? DEFAULT_IMAGE_SIZE;
  if (!Number.isInteger(imageSizeBytes) || imageSizeBytes < 0) {
    throw new ConfigurationError(`Image size must be a non-negative integer, got ${imageSizeBytes}`);
  }
  if (imageSizeBytes > maxPayloadBytes) {
    throw new ConfigurationError(`Image size ${imageSizeBytes} exceeds the ${maxPayloadBytes}-byte payload limit`);
  }
  const firstStartSec = overrides.firstStart ?? DEFAULT_FIRST_START_SEC;
  if (firstStartSec < 0) {
    throw new ConfigurationError(`First start time must be non-negative, got ${firstStartSec}`);
  }

  const payloads = overrides.payloads ?? [];
  for (const spec of payloads) {
    if (spec.sizeBytes > maxPayloadBytes) {
      throw new ConfigurationError(`Payload ${spec.tag} of ${spec.sizeBytes} bytes exceeds the ${maxPayloadBytes}-byte payload limit`);
    }
    if (spec.contentClass !== undefined && !config.classes.includes(spec.contentClass)) {
      throw new ConfigurationError(`Payload ${spec.tag} uses content of unknown class ${spec.contentClass}`);
    }
  }

  return {
    name,
    config,
    imageSizeBytes,
    firstStartSec,
    standardImages: overrides.standardImages ?? true,
    payloads,
  };
}

function buildPayloadBytes(spec: ScenarioPayloadSpec, classes: readonly string[]): Uint8Array {
  if (spec.contentClass === undefined) {
    return new Uint8Array(spec.sizeBytes);
  }

  const bytes = generateSimulatedImage(classes.indexOf(spec.contentClass), spec.sizeBytes);
  const corrupted = Math.min(Math.floor((spec.corruption ?? 0) * spec.sizeBytes), Math.max(0, spec.sizeBytes - 1));
  for (let i = 1; i <= corrupted; i += 1) {
    bytes[i] = (bytes[i] ?? 0) ^ 0xff;
  }
  return bytes;
}

/**
 * One simulated image per class, then any extra payloads. Senders are staggered as they are
 * installed: the n-th sender, on link i, starts at
 * `firstStart + i * 0.5 + n * 0.1` seconds, with links numbered from 1.
 */
export function buildScenarioPayloads(scenario: ResolvedScenario): TimedPayload[] {
  const { classes } = scenario.config;
  const timed: TimedPayload[] = [];
  let installed = 0;

  if (scenario.standardImages) {
    classes.forEach((classId, index) => {
      timed.push({
        tag: `simulated_${classId}.jpg`,
        bytes: generateSimulatedImage(index, scenario.imageSizeBytes),
        startAt: scenario.firstStartSec + (index + 1) * 0.5 + installed * 0.1,
      });
      installed += 1;
    });
  }

  const linkOffset = scenario.standardImages ? classes.length : 0;
  scenario.payloads.forEach((spec, index) => {
    timed.push({
      tag: spec.tag,
      bytes: buildPayloadBytes(spec, classes),
      startAt: spec.startAt ?? scenario.firstStartSec + (linkOffset + index + 1) * 0.5 + installed * 0.1,
    });
    installed += 1;
  });

  return timed;
}

export function createScenarioRun(scenario: ResolvedScenario, options: RunOptions = {}): SimulationOrchestrator {
  const orchestrator = new SimulationOrchestrator(scenario.config, {
    classifier: new PatternClassifier(scenario.config.classes),
    ...(options.logger ? { logger: options.logger } : {}),
    ...(options.runId ? { runId: options.runId } : {}),
    ...(scenario.name !== null ? { scenario: scenario.name } : {}),
  });

  for (const payload of buildScenarioPayloads(scenario)) {
    orchestrator.submit(payload, payload.startAt);
  }
  return orchestrator;
}

export function runScenario(scenario: ResolvedScenario, options: RunOptions = {}): SimulationReport {
  return createScenarioRun(scenario, options).run();
}

// Each scenario gets its own orchestrator and tracker; nothing is shared between entries.
export function runSweep(
  definitions: readonly ScenarioDefinition[],
  base: SimulationConfig = DEFAULT_SIMULATION_CONFIG,
  options: Omit<RunOptions, 'runId'> = {},
): SweepEntry[] {
  const aggregator = new MetricsAggregator();
  return definitions.map((definition) => {
    const report = runScenario(resolveScenario(definition.overrides, base, definition.name), options);
    return {
      name: definition.name,
      description: definition.description,
      report,
      comparison: { ...aggregator.compareRun(report.flows), droppedPayloads: report.droppedPayloads },
    };
  });
}
