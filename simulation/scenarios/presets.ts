import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../engine/errors.js';
import { parseScenarioDefinitions, type ScenarioDefinition } from './overrides.js';

export const BUNDLED_SCENARIOS_PATH = fileURLToPath(new URL('./scenarios.json', import.meta.url));

export function loadScenarioFile(path: string = BUNDLED_SCENARIOS_PATH): ScenarioDefinition[] {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read scenario file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Scenario file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseScenarioDefinitions(parsed);
}
