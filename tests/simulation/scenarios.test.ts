import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DEFAULT_SIMULATION_CONFIG } from '../../simulation/config/simulationConfig.js';
import { ConfigurationError } from '../../simulation/engine/errors.js';
import {
  buildScenarioPayloads,
  resolveScenario,
  runScenario,
  runSweep,
} from '../../simulation/scenarios/buildScenario.js';
import { parseScenarioDefinitions, parseScenarioOverrides } from '../../simulation/scenarios/overrides.js';
import { loadScenarioFile } from '../../simulation/scenarios/presets.js';
import { createTestLogger } from '../support/logger.js';

const presets = loadScenarioFile();

function preset(name: string) {
  const definition = presets.find((entry) => entry.name === name);
  if (!definition) throw new Error(`missing preset ${name}`);
  return definition;
}

function runPreset(name: string) {
  const definition = preset(name);
  return runScenario(resolveScenario(definition.overrides, DEFAULT_SIMULATION_CONFIG, definition.name), {
    logger: createTestLogger(),
  });
}

describe('resolveScenario', () => {
  it('applies unit-bearing overrides on top of the base config', () => {
    const scenario = resolveScenario({ dataRate: '500kbps', linkRate: '10Mbps', delay: '10ms', packetSize: 512 });

    expect(scenario.config.targetRateBps).toBe(500_000);
    expect(scenario.config.fragmentSizeBytes).toBe(512);
    expect(scenario.config.link.bandwidthBps).toBe(10_000_000);
    expect(scenario.config.link.propagationDelaySec).toBeCloseTo(0.01, 12);
    expect(scenario.imageSizeBytes).toBe(50_000);
    expect(scenario.firstStartSec).toBe(2);
  });

  it('clears an inherited fallback class when the override is null', () => {
    const base = { ...DEFAULT_SIMULATION_CONFIG, fallbackClass: 'messi' };

    expect(resolveScenario({}, base).config.fallbackClass).toBe('messi');
    expect(resolveScenario({ fallbackClass: null }, base).config.fallbackClass).toBeUndefined();
  });

  it('rejects payloads whose content class is not configured', () => {
    expect(() =>
      resolveScenario({ payloads: [{ tag: 'x.jpg', sizeBytes: 10, contentClass: 'pele' }] }),
    ).toThrow('Payload x.jpg uses content of unknown class pele');
  });

  it('rejects sizes beyond what the fragment header can number before building any payload', () => {
    expect(() => resolveScenario({ imageSize: 1e12 })).toThrow(
      'Image size 1000000000000 exceeds the 67108864-byte payload limit',
    );
    expect(() =>
      resolveScenario({ packetSize: 512, payloads: [{ tag: 'big.bin', sizeBytes: 512 * 65_536 + 1 }] }),
    ).toThrow('Payload big.bin of 33554433 bytes exceeds the 33554432-byte payload limit');
    expect(resolveScenario({ imageSize: 1024 * 65_536 }).imageSizeBytes).toBe(67_108_864);
  });

  it('rejects a negative image size', () => {
    expect(() => resolveScenario({ imageSize: -1 })).toThrow(ConfigurationError);
  });
});

describe('buildScenarioPayloads', () => {
  it('staggers one simulated image per class, then the extra payloads', () => {
    const payloads = buildScenarioPayloads(
      resolveScenario({
        imageSize: 8,
        payloads: [
          { tag: 'extra.jpg', sizeBytes: 4 },
          { tag: 'pinned.jpg', sizeBytes: 4, startAt: 9 },
        ],
      }),
    );

    expect(payloads.map((payload) => payload.tag)).toEqual([
      'simulated_messi.jpg',
      'simulated_ronaldo.jpg',
      'simulated_neymar.jpg',
      'simulated_mbappe.jpg',
      'simulated_haaland.jpg',
      'extra.jpg',
      'pinned.jpg',
    ]);
    const expectedStarts = [2.5, 3.1, 3.7, 4.3, 4.9, 5.5, 9];
    payloads.forEach((payload, index) => expect(payload.startAt).toBeCloseTo(expectedStarts[index] ?? Number.NaN, 9));
    expect([...(payloads[1]?.bytes ?? [])]).toEqual([60, 61, 62, 63, 64, 65, 66, 67]);
    expect([...(payloads[5]?.bytes ?? [])]).toEqual([0, 0, 0, 0]);
  });

  it('inverts the requested share of bytes after the first', () => {
    const [payload] = buildScenarioPayloads(
      resolveScenario({
        standardImages: false,
        payloads: [{ tag: 'blurry.jpg', sizeBytes: 4, contentClass: 'ronaldo', corruption: 0.5 }],
      }),
    );

    expect([...(payload?.bytes ?? [])]).toEqual([60, 61 ^ 0xff, 62 ^ 0xff, 63]);
    expect(payload?.startAt).toBe(2.5);
  });
});

describe('bundled presets', () => {
  it('loads every preset from the scenario file', () => {
    expect(presets.map((entry) => entry.name)).toEqual([
      'baseline',
      'high_bandwidth',
      'large_images',
      'small_packets',
      'high_latency',
      'congested',
      'lossy',
      'uncertain_with_fallback',
      'uncertain_without_fallback',
    ]);
  });

  it('delivers every fragment of every image in the baseline', () => {
    const report = runPreset('baseline');

    expect(report.scenario).toBe('baseline');
    expect(report.flows).toHaveLength(5);
    for (const flow of report.flows) {
      expect(flow).toMatchObject({ sent: 49, received: 49, bytesReceived: 50_000, lossRatio: 0 });
    }
    expect(report.flows[0]?.firstSendAt).toBe(2.5);
    expect(report.flows.map((flow) => flow.destination.address)).toEqual([
      '10.1.1.2',
      '10.1.2.2',
      '10.1.3.2',
      '10.1.4.2',
      '10.1.5.2',
    ]);
    expect(report.stoppedEarly).toBe(false);
  });

  it('drops uncertain images when no fallback is configured', () => {
    const report = runPreset('uncertain_without_fallback');

    expect(report.droppedPayloads).toBe(2);
    expect(report.flows).toHaveLength(5);
    expect(report.assigned).toEqual({ messi: 1, ronaldo: 1, neymar: 1, mbappe: 1, haaland: 1 });
  });

  it('routes uncertain images to the fallback class when one is configured', () => {
    const report = runPreset('uncertain_with_fallback');

    expect(report.droppedPayloads).toBe(0);
    expect(report.flows).toHaveLength(7);
    expect(report.assigned.messi).toBe(3);
    expect(report.payloads.find((payload) => payload.tag === 'blurry_neymar.jpg')).toMatchObject({
      decision: 'fallback',
      classId: 'messi',
    });
  });

  it('retries pushed-back fragments on a congested link without losing any', () => {
    const report = runPreset('congested');

    expect(report.payloads.some((payload) => payload.backpressureRetries > 0)).toBe(true);
    for (const flow of report.flows) {
      expect(flow).toMatchObject({ sent: 49, received: 49, lossRatio: 0 });
    }
  });

  it('raises mean delay with link latency', () => {
    const baseline = runPreset('baseline');
    const slow = runPreset('high_latency');

    expect(slow.flows[0]?.meanDelaySec).toBeCloseTo((baseline.flows[0]?.meanDelaySec ?? 0) + 0.048, 9);
  });
});

describe('runSweep', () => {
  it('runs each scenario in isolation and summarises it', () => {
    const entries = runSweep([preset('baseline'), preset('uncertain_without_fallback')], DEFAULT_SIMULATION_CONFIG, {
      logger: createTestLogger(),
    });

    expect(entries.map((entry) => entry.name)).toEqual(['baseline', 'uncertain_without_fallback']);
    expect(entries[0]?.comparison).toMatchObject({ flowCount: 5, meanLossRatio: 0, droppedPayloads: 0 });
    expect(entries[1]?.comparison).toMatchObject({ flowCount: 5, droppedPayloads: 2 });
    expect(entries[0]?.report.runId).not.toBe(entries[1]?.report.runId);
  });
});

describe('scenario file parsing', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reports a missing file as a configuration error', () => {
    expect(() => loadScenarioFile('/nonexistent/scenarios.json')).toThrow(ConfigurationError);
  });

  it('reports malformed JSON as a configuration error', () => {
    dir = mkdtempSync(join(tmpdir(), 'scenarios-'));
    const path = join(dir, 'broken.json');
    writeFileSync(path, '[{ "name": ');

    expect(() => loadScenarioFile(path)).toThrow(/is not valid JSON/);
  });

  it('rejects duplicate scenario names', () => {
    expect(() =>
      parseScenarioDefinitions([
        { name: 'a', overrides: {} },
        { name: 'a', overrides: {} },
      ]),
    ).toThrow('Scenario a is defined twice');
  });

  it('validates override field types', () => {
    expect(() => parseScenarioOverrides({ packetSize: '1024' })).toThrow('overrides.packetSize must be a number');
    expect(() => parseScenarioOverrides({ classes: ['a', 1] })).toThrow('overrides.classes must be an array of strings');
    expect(() => parseScenarioOverrides({ payloads: [{ tag: 'a', sizeBytes: 1, corruption: 2 }] })).toThrow(
      'overrides.payloads[0].corruption must be between 0 and 1',
    );
    expect(() => parseScenarioOverrides([])).toThrow('overrides must be an object');
  });

  it('keeps only recognised override fields', () => {
    expect(parseScenarioOverrides({ dataRate: '2Mbps', fallbackClass: null, unknownKnob: true })).toEqual({
      dataRate: '2Mbps',
      fallbackClass: null,
    });
  });
});
