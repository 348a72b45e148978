import { Router } from 'express';
import type { ScenarioDefinition } from '../../simulation/scenarios/overrides.js';
import { HttpError } from '../types.js';

export function createScenariosRouter(scenarios: readonly ScenarioDefinition[]): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ scenarios });
  });

  router.get('/:name', (req, res, next) => {
    const scenario = scenarios.find((entry) => entry.name === req.params.name);
    if (!scenario) {
      next(new HttpError(404, `Unknown scenario: ${req.params.name}`));
      return;
    }
    res.status(200).json(scenario);
  });

  return router;
}
