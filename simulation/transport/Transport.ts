import type { Endpoint } from '../types/simulation.js';

export type SendResult = { status: 'sent' } | { status: 'backpressure'; retryAt?: number };

export type ReceiveHandler = (bytes: Uint8Array, arrivedAt: number, from: Endpoint) => void;

export interface Transport {
  send(source: Endpoint, destination: Endpoint, bytes: Uint8Array): SendResult;
  onReceive(destination: Endpoint, handler: ReceiveHandler): void;
}
