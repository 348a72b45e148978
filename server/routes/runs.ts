import { Router } from 'express';
import { resolveScenario, runScenario, runSweep } from '../../simulation/scenarios/buildScenario.js';
import { parseScenarioOverrides, type ScenarioDefinition } from '../../simulation/scenarios/overrides.js';
import type { SimLogger, SimulationConfig } from '../../simulation/types/simulation.js';
import type { RunStore } from '../services/runStore.js';
import { HttpError, parseRunRequest, parseSweepRequest } from '../types.js';

interface RunsDeps {
  runStore: RunStore;
  scenarios: readonly ScenarioDefinition[];
  baseConfig: SimulationConfig;
  logger: SimLogger;
}

export function createRunsRouter(deps: RunsDeps): Router {
  const router = Router();

  function findScenario(name: string): ScenarioDefinition {
    const scenario = deps.scenarios.find((entry) => entry.name === name);
    if (!scenario) throw new HttpError(404, `Unknown scenario: ${name}`);
    return scenario;
  }

  router.post('/', (req, res, next) => {
    try {
      const body = parseRunRequest(req.body);
      const preset = body.scenario !== undefined ? findScenario(body.scenario) : undefined;
      const overrides = { ...preset?.overrides, ...parseScenarioOverrides(body.overrides) };

      const report = runScenario(resolveScenario(overrides, deps.baseConfig, preset?.name ?? null), {
        logger: deps.logger
      });
      deps.runStore.save(report);
      deps.logger.info(`[runs] run ${report.runId} stored (scenario=${report.scenario ?? 'custom'})`);
      res.status(201).json(report);
    } catch (err) {
      next(err);
    }
  });

  router.post('/sweep', (req, res, next) => {
    try {
      const body = parseSweepRequest(req.body);
      const definitions = body.scenarios ? body.scenarios.map(findScenario) : [...deps.scenarios];

      const entries = runSweep(definitions, deps.baseConfig, { logger: deps.logger });
      for (const entry of entries) deps.runStore.save(entry.report);

      res.status(200).json({
        results: entries.map((entry) => ({
          scenario: entry.name,
          description: entry.description,
          runId: entry.report.runId,
          comparison: entry.comparison
        }))
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/', (_req, res) => {
    res.status(200).json({ runs: deps.runStore.list() });
  });

  router.get('/:runId', (req, res, next) => {
    const report = deps.runStore.get(req.params.runId);
    if (!report) {
      next(new HttpError(404, `Unknown run: ${req.params.runId}`));
      return;
    }
    res.status(200).json(report);
  });

  router.get('/:runId/classes/:classId', (req, res, next) => {
    const report = deps.runStore.get(req.params.runId);
    if (!report) {
      next(new HttpError(404, `Unknown run: ${req.params.runId}`));
      return;
    }
    const stats = report.classes.find((entry) => entry.classId === req.params.classId);
    if (!stats) {
      next(new HttpError(404, `Unknown class ${req.params.classId} in run ${req.params.runId}`));
      return;
    }
    res.status(200).json(stats);
  });

  return router;
}
