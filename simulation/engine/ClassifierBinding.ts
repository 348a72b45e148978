import type { BindingDecision, ClassificationResult, Destination, FallbackReason } from '../types/simulation.js';
import { ConfigurationError } from './errors.js';

export interface ClassifierBindingOptions<C extends string> {
  destinations: readonly Destination<C>[];
  confidenceThreshold: number;
  fallbackClass?: C;
}

// One-shot routing decision per payload. A classification only binds directly when its
// distance is strictly below the threshold; everything else goes through the fallback class,
// or is dropped when none is configured.
export class ClassifierBinding<C extends string = string> {
  private readonly destinations = new Map<string, Destination<C>>();

  private readonly assigned = new Map<C, number>();

  private readonly threshold: number;

  private readonly fallback: Destination<C> | undefined;

  constructor(options: ClassifierBindingOptions<C>) {
    if (!Number.isFinite(options.confidenceThreshold)) {
      throw new ConfigurationError('Confidence threshold must be a finite number');
    }

    for (const destination of options.destinations) {
      if (this.destinations.has(destination.classId)) {
        throw new ConfigurationError(`Destination class ${destination.classId} is bound twice`);
      }
      this.destinations.set(destination.classId, destination);
      this.assigned.set(destination.classId, 0);
    }

    this.threshold = options.confidenceThreshold;

    if (options.fallbackClass !== undefined) {
      const fallback = this.destinations.get(options.fallbackClass);
      if (!fallback) {
        throw new ConfigurationError(`Fallback class ${options.fallbackClass} has no destination`);
      }
      this.fallback = fallback;
    }
  }

  bind(result: ClassificationResult): BindingDecision<C> {
    if (result.status === 'unresolved') {
      return this.applyFallback('unresolved');
    }

    const destination = this.destinations.get(result.classId);
    if (!destination) {
      return this.applyFallback('unknown_class');
    }

    if (!(result.distance < this.threshold)) {
      return this.applyFallback('low_confidence');
    }

    this.countAssignment(destination.classId);
    return { outcome: 'bound', classId: destination.classId, destination };
  }

  getDestination(classId: C): Destination<C> | undefined {
    return this.destinations.get(classId);
  }

  getDestinations(): Destination<C>[] {
    return [...this.destinations.values()];
  }

  getAssignedCounts(): Record<string, number> {
    return Object.fromEntries(this.assigned.entries());
  }

  private applyFallback(reason: FallbackReason): BindingDecision<C> {
    if (!this.fallback) {
      return { outcome: 'dropped', reason };
    }

    this.countAssignment(this.fallback.classId);
    return { outcome: 'fallback', classId: this.fallback.classId, destination: this.fallback, reason };
  }

  private countAssignment(classId: C): void {
    this.assigned.set(classId, (this.assigned.get(classId) ?? 0) + 1);
  }
}
