import type { ClassifierResult } from '../types/index.js';

/**
 * Classifier Port - describes what is in a captured artifact.
 *
 * Implementations must be side-effect free and safe to call repeatedly.
 * They may reject; the selector turns any rejection into "no description".
 */
export interface ClassifierPort {
  classify(artifactPath: string, signal: AbortSignal): Promise<ClassifierResult | null>;
}
