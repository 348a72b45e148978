import cors from 'cors';
import express, { type Express } from 'express';
import type { ScenarioDefinition } from '../simulation/scenarios/overrides.js';
import type { SimLogger, SimulationConfig } from '../simulation/types/simulation.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createRequestLogger } from './middleware/requestLogger.js';
import { createHealthRouter } from './routes/health.js';
import { createMetricsRouter } from './routes/metrics.js';
import { createRunsRouter } from './routes/runs.js';
import { createScenariosRouter } from './routes/scenarios.js';
import { RunStore } from './services/runStore.js';

export interface AppDeps {
  scenarios: readonly ScenarioDefinition[];
  baseConfig: SimulationConfig;
  runStore: RunStore;
  corsOrigin: string;
  logger?: SimLogger;
}

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? console;
  const app = express();

  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));
  app.use(createRequestLogger(logger));

  app.use('/health', createHealthRouter({ runStore: deps.runStore, scenarios: deps.scenarios }));
  app.use('/scenarios', createScenariosRouter(deps.scenarios));
  app.use(
    '/runs',
    createRunsRouter({
      runStore: deps.runStore,
      scenarios: deps.scenarios,
      baseConfig: deps.baseConfig,
      logger
    })
  );
  app.use('/metrics', createMetricsRouter({ runStore: deps.runStore }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
