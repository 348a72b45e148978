import { Router } from 'express';
import type { ScenarioDefinition } from '../../simulation/scenarios/overrides.js';
import type { RunStore } from '../services/runStore.js';

interface HealthDeps {
  runStore: RunStore;
  scenarios: readonly ScenarioDefinition[];
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      runs: deps.runStore.size,
      scenarios: deps.scenarios.length,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}
