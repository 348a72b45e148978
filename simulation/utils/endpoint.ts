import type { Endpoint, FlowKey } from '../types/simulation.js';

export function endpointId(endpoint: Endpoint): string {
  return `${endpoint.address}:${endpoint.port}`;
}

export function flowIdOf(key: FlowKey): string {
  return `${endpointId(key.source)}->${endpointId(key.destination)}`;
}
