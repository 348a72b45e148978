import type { ClassificationResult } from '../types/simulation.js';
import type { Classifier } from './Classifier.js';
import { classPatternSeed } from './simulatedImage.js';

const MAX_DISTANCE = 200;

// Recognises payloads produced by generateSimulatedImage. The leading byte picks the class;
// the distance grows with the share of bytes that stray from that class's ramp.
export class PatternClassifier implements Classifier {
  constructor(private readonly classes: readonly string[]) {}

  classify(bytes: Uint8Array): ClassificationResult {
    const first = bytes[0];
    if (first === undefined) {
      return { status: 'unresolved' };
    }

    const classIndex = this.classes.findIndex((_, index) => classPatternSeed(index) === first);
    const classId = this.classes[classIndex];
    if (classId === undefined) {
      return { status: 'unresolved' };
    }

    const seed = classPatternSeed(classIndex);
    let mismatches = 0;
    for (let i = 0; i < bytes.length; i += 1) {
      if (bytes[i] !== (seed + i) % 256) {
        mismatches += 1;
      }
    }

    return { status: 'classified', classId, distance: (MAX_DISTANCE * mismatches) / bytes.length };
  }
}
