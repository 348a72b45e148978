import { Router } from 'express';
import { toPrometheusText } from '../services/prometheus.js';
import type { RunStore } from '../services/runStore.js';
import { HttpError } from '../types.js';

interface MetricsDeps {
  runStore: RunStore;
}

export function createMetricsRouter(deps: MetricsDeps): Router {
  const router = Router();

  router.get('/prometheus', (req, res, next) => {
    const runId = typeof req.query.runId === 'string' ? req.query.runId : undefined;
    const report = runId ? deps.runStore.get(runId) : deps.runStore.latest();
    if (runId && !report) {
      next(new HttpError(404, `Unknown run: ${runId}`));
      return;
    }

    res
      .status(200)
      .set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
      .send(report ? toPrometheusText(report) : '# No runs recorded yet\n');
  });

  return router;
}
