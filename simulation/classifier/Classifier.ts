import type { ClassificationResult } from '../types/simulation.js';

// Synchronous, one-shot classification backend. `tag` is the payload's source-assigned identity;
// real backends ignore it, scripted ones key their answers on it.
export interface Classifier {
  classify(bytes: Uint8Array, tag: string): ClassificationResult;
}
