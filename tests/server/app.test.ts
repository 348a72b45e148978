import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../../server/app.js';
import { RunStore } from '../../server/services/runStore.js';
import { DEFAULT_SIMULATION_CONFIG } from '../../simulation/config/simulationConfig.js';
import { loadScenarioFile } from '../../simulation/scenarios/presets.js';
import { createTestLogger } from '../support/logger.js';

const scenarios = loadScenarioFile();

describe('HTTP API', () => {
  let runStore: RunStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    runStore = new RunStore(5);
    app = createApp({
      scenarios,
      baseConfig: DEFAULT_SIMULATION_CONFIG,
      runStore,
      corsOrigin: 'http://localhost:5173',
      logger: createTestLogger()
    });
  });

  it('reports health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', runs: 0, scenarios: 9 });
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173');
  });

  it('lists presets and looks them up by name', async () => {
    const list = await request(app).get('/scenarios');
    const one = await request(app).get('/scenarios/congested');
    const missing = await request(app).get('/scenarios/nope');

    expect(list.body.scenarios).toHaveLength(9);
    expect(one.body.overrides).toEqual({ dataRate: '8Mbps', linkRate: '2Mbps', queueCapacity: 8 });
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Unknown scenario: nope' });
  });

  it('runs a preset, stores it and serves its statistics', async () => {
    const created = await request(app).post('/runs').send({ scenario: 'baseline' });

    expect(created.status).toBe(201);
    expect(created.body.scenario).toBe('baseline');
    expect(created.body.flows).toHaveLength(5);
    const runId: string = created.body.runId;

    const list = await request(app).get('/runs');
    expect(list.body.runs).toEqual([
      {
        runId,
        scenario: 'baseline',
        finishedAt: 10,
        stoppedEarly: false,
        flowCount: 5,
        droppedPayloads: 0,
        inconsistencies: 0
      }
    ]);

    const fetched = await request(app).get(`/runs/${runId}`);
    expect(fetched.status).toBe(200);
    expect(fetched.body.runId).toBe(runId);

    const messi = await request(app).get(`/runs/${runId}/classes/messi`);
    expect(messi.body).toMatchObject({ classId: 'messi', flowCount: 1, sent: 49, received: 49, lossRatio: 0 });

    const unknownClass = await request(app).get(`/runs/${runId}/classes/pele`);
    expect(unknownClass.status).toBe(404);
  });

  it('applies request overrides on top of a preset', async () => {
    const res = await request(app)
      .post('/runs')
      .send({ scenario: 'uncertain_without_fallback', overrides: { fallbackClass: 'ronaldo', imageSize: 4096 } });

    expect(res.status).toBe(201);
    expect(res.body.droppedPayloads).toBe(0);
    expect(res.body.assigned.ronaldo).toBe(3);
    expect(res.body.flows[0]).toMatchObject({ sent: 4, received: 4, bytesReceived: 4096 });
  });

  it('rejects an invalid configuration with its error code', async () => {
    const res = await request(app).post('/runs').send({ overrides: { packetSize: 0 } });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Fragment size must be a positive integer, got 0', code: 'configuration' });
    expect(runStore.size).toBe(0);
  });

  it('answers an oversized image with 400 before running anything', async () => {
    const res = await request(app).post('/runs').send({ overrides: { imageSize: 1e12 } });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'Image size 1000000000000 exceeds the 67108864-byte payload limit',
      code: 'configuration'
    });
    expect(runStore.size).toBe(0);
  });

  it('rejects malformed request bodies', async () => {
    const wrongType = await request(app).post('/runs').send({ scenario: 5 });
    const badJson = await request(app).post('/runs').set('Content-Type', 'application/json').send('{"scenario":');
    const unknown = await request(app).post('/runs').send({ scenario: 'nope' });

    expect(wrongType.status).toBe(400);
    expect(wrongType.body.error).toBe('Expected { scenario?: string, overrides?: object }');
    expect(badJson.status).toBe(400);
    expect(unknown.status).toBe(404);
  });

  it('sweeps the named presets and stores every run', async () => {
    const res = await request(app)
      .post('/runs/sweep')
      .send({ scenarios: ['baseline', 'uncertain_without_fallback'] });

    expect(res.status).toBe(200);
    expect(res.body.results.map((entry: { scenario: string }) => entry.scenario)).toEqual([
      'baseline',
      'uncertain_without_fallback'
    ]);
    expect(res.body.results[1].comparison).toMatchObject({ flowCount: 5, droppedPayloads: 2 });
    expect(runStore.size).toBe(2);
  });

  it('exports the latest run in Prometheus text format', async () => {
    const empty = await request(app).get('/metrics/prometheus');
    expect(empty.text).toBe('# No runs recorded yet\n');

    const created = await request(app).post('/runs').send({ scenario: 'uncertain_without_fallback' });
    const runId: string = created.body.runId;

    const res = await request(app).get('/metrics/prometheus');
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/plain');
    expect(res.text.split('\n')).toContain(
      `sim_dropped_payloads_total{run_id="${runId}",scenario="uncertain_without_fallback"} 2`
    );

    const unknown = await request(app).get('/metrics/prometheus?runId=missing');
    expect(unknown.status).toBe(404);
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Route not found: GET /nope' });
  });
});
