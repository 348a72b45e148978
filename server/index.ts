import dotenv from 'dotenv';
import { loadScenarioFile } from '../simulation/scenarios/presets.js';
import { createApp } from './app.js';
import { resolveServerConfig } from './config.js';
import { RunStore } from './services/runStore.js';

dotenv.config();

const config = resolveServerConfig();
const scenarios = loadScenarioFile(config.scenariosPath);

const app = createApp({
  scenarios,
  baseConfig: config.simulation,
  runStore: new RunStore(config.runHistoryLimit),
  corsOrigin: config.corsOrigin
});

app.listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port} (${scenarios.length} scenarios loaded)`);
});
