/**
 * Detection-side domain types: what the reader produced and what the
 * pipeline carries from capture through selection.
 */

/**
 * A valid, decoded tag read. One per accepted frame.
 */
export interface TagEvent {
  /** 15-digit FDX-B chip id */
  readonly tagId: string;
  /** Epoch milliseconds at decode time */
  readonly detectedAt: number;
  /** Frame exactly as received (for diagnostics) */
  readonly rawFrame: string;
}

/**
 * What the classifier said about one artifact.
 */
export interface ClassifierResult {
  /** Free-text description, e.g. "orange tabby cat (90% confident)" */
  description: string;
  /** Confidence percentage parsed from the description, if present */
  confidence: number | null;
}

/**
 * A detection after capture: the tag plus whatever artifacts were taken.
 */
export interface Detection {
  tagId: string;
  timestamp: number;
  /** Local paths of captured photos (may be empty on camera failure) */
  artifactPaths: string[];
  /** Shareable links, filled in after upload */
  artifactLinks?: string[] | undefined;
  /** Filled in by the selector */
  classification?: ClassifierResult | undefined;
}

/**
 * Rolling encounter counts for a tag.
 */
export interface EncounterStats {
  recentCount: number;
  totalCount: number;
}

/**
 * Create an immutable tag event.
 */
export function createTagEvent(tagId: string, detectedAt: number, rawFrame: string): TagEvent {
  return Object.freeze({ tagId, detectedAt, rawFrame });
}
