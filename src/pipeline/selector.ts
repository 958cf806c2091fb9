import type { ClassifierPort } from '../ports/index.js';
import type { ClassifierResult, Detection, Logger } from '../types/index.js';
import type { CircuitBreaker } from '../core/circuit-breaker.js';
import { errorMessage } from '../core/errors.js';

export interface SelectorConfig {
  /** Stop classifying once a detection scores at least this much */
  goodEnoughScore: number;
  /** Words that make a description more useful (matched as whole words) */
  keywords: string[];
}

export interface ScoredDetection {
  detection: Detection;
  classification: ClassifierResult | null;
  score: number;
}

export interface SelectionResult {
  /** Chosen detection, with its classification attached when it has one */
  best: Detection;
  /** Every detection that was classified, in arrival order */
  scored: ScoredDetection[];
  classifierCalls: number;
}

/** Descriptions that mean the classifier saw nothing useful */
const GENERIC_PATTERNS: readonly RegExp[] = [
  /analysis failed/i,
  /not configured/i,
  /unable to/i,
  /^\s*unknown\b/i,
  /^\s*(an?\s+)?animal\s*\.?\s*$/i,
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Score a classification. Higher is more useful in a notification.
 *
 * - no classification: 0
 * - generic or failed description: 1
 * - otherwise 10, +2 per distinct keyword, +floor(confidence / 20)
 */
export function scoreClassification(
  result: ClassifierResult | null,
  keywords: readonly string[]
): number {
  if (!result) {
    return 0;
  }

  const description = result.description.trim();
  if (description.length === 0 || GENERIC_PATTERNS.some((p) => p.test(description))) {
    return 1;
  }

  let score = 10;
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized.length === 0 || seen.has(normalized)) continue;
    seen.add(normalized);
    if (new RegExp(`\\b${escapeRegExp(normalized)}\\b`, 'i').test(description)) {
      score += 2;
    }
  }

  if (result.confidence !== null && Number.isFinite(result.confidence)) {
    const clamped = Math.min(Math.max(result.confidence, 0), 100);
    score += Math.floor(clamped / 20);
  }

  return score;
}

/**
 * Picks the representative detection of a batch.
 *
 * Detections are classified in arrival order until one is good enough.
 * Classifier calls go through a circuit breaker, so when the service is
 * down the rest of the batch is skipped in one step per photo instead of
 * one timeout per photo.
 */
export class BestOfBatchSelector {
  private readonly config: SelectorConfig;
  private readonly classifier: ClassifierPort;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(
    config: SelectorConfig,
    classifier: ClassifierPort,
    breaker: CircuitBreaker,
    logger: Logger
  ) {
    this.config = config;
    this.classifier = classifier;
    this.breaker = breaker;
    this.logger = logger.child({ component: 'selector' });
  }

  async select(detections: readonly Detection[]): Promise<SelectionResult> {
    const first = detections[0];
    if (first === undefined) {
      throw new RangeError('Cannot select from an empty batch');
    }

    const scored: ScoredDetection[] = [];
    let classifierCalls = 0;
    let best: ScoredDetection | null = null;

    for (const detection of detections) {
      const artifact = detection.artifactPaths[0];
      let classification: ClassifierResult | null = null;

      if (artifact !== undefined) {
        classifierCalls++;
        classification = await this.classify(detection.tagId, artifact);
      }

      const entry: ScoredDetection = {
        detection,
        classification,
        score: scoreClassification(classification, this.config.keywords),
      };
      scored.push(entry);

      if (
        best === null ||
        entry.score > best.score ||
        (entry.score === best.score && detection.timestamp < best.detection.timestamp)
      ) {
        best = entry;
      }

      if (entry.score >= this.config.goodEnoughScore) {
        this.logger.debug({ tagId: detection.tagId, score: entry.score }, 'Good enough, stopping early');
        break;
      }
    }

    if (best === null || best.classification === null) {
      this.logger.info(
        { tagId: first.tagId, detections: detections.length },
        'No usable classification, using first detection'
      );
      return { best: first, scored, classifierCalls };
    }

    this.logger.info(
      { tagId: first.tagId, score: best.score, classifierCalls },
      'Selected best detection'
    );
    return {
      best: { ...best.detection, classification: best.classification },
      scored,
      classifierCalls,
    };
  }

  private async classify(tagId: string, artifactPath: string): Promise<ClassifierResult | null> {
    try {
      return await this.breaker.execute((signal) => this.classifier.classify(artifactPath, signal));
    } catch (error) {
      this.logger.warn({ tagId, artifactPath, error: errorMessage(error) }, 'Classification failed');
      return null;
    }
  }
}

export function createBestOfBatchSelector(
  config: SelectorConfig,
  classifier: ClassifierPort,
  breaker: CircuitBreaker,
  logger: Logger
): BestOfBatchSelector {
  return new BestOfBatchSelector(config, classifier, breaker, logger);
}
