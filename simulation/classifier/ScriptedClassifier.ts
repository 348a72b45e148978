import type { ClassificationResult } from '../types/simulation.js';
import type { Classifier } from './Classifier.js';

// Replays fixed answers keyed by payload tag, for scenarios that pin the classifier's output.
export class ScriptedClassifier implements Classifier {
  private readonly answers: Map<string, ClassificationResult>;

  constructor(
    answers: Record<string, ClassificationResult>,
    private readonly fallback: ClassificationResult = { status: 'unresolved' },
  ) {
    this.answers = new Map(Object.entries(answers));
  }

  classify(_bytes: Uint8Array, tag: string): ClassificationResult {
    return this.answers.get(tag) ?? this.fallback;
  }
}
