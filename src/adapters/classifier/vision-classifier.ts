import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import type { ClassifierPort } from '../../ports/index.js';
import type { ClassifierResult, Logger } from '../../types/index.js';
import { ClassifierError, errorMessage } from '../../core/errors.js';

export interface VisionClassifierConfig {
  /** OpenAI-compatible API key; without it the classifier is disabled */
  apiKey: string | undefined;
  model: string;
  /** Override for OpenAI-compatible endpoints */
  baseUrl?: string | undefined;
  maxOutputTokens: number;
}

export const CLASSIFIER_PROMPT =
  'Analyze this photo and describe the animal you see. Be specific about colors, ' +
  'patterns, and species. Include your confidence level as a percentage, for example ' +
  "'orange and white tabby cat (95% confident)' or 'small brown dog, possibly a terrier " +
  "mix (80% confident)'. If you are unsure about the species, say so. Answer in one line.";

const CONFIDENCE_PATTERN = /\(?\s*(\d{1,3}(?:\.\d+)?)\s*%\s*(?:confident|confidence|sure)?\s*\)?/i;

const MEDIA_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
};

/**
 * Split a model answer into description and confidence percentage.
 */
export function parseClassifierText(text: string): ClassifierResult {
  const trimmed = text.trim();
  const match = CONFIDENCE_PATTERN.exec(trimmed);
  if (!match?.[1]) {
    return { description: trimmed, confidence: null };
  }

  const confidence = Math.min(Number(match[1]), 100);
  const description = trimmed
    .replace(match[0], ' ')
    .replace(/\s+/g, ' ')
    .replace(/[\s,;:]+([.!]?)$/, '$1')
    .trim();
  return { description, confidence };
}

/**
 * Describes captured stills with a vision model through the Vercel AI SDK.
 */
export class VisionClassifier implements ClassifierPort {
  private readonly config: VisionClassifierConfig;
  private readonly logger: Logger;
  private readonly model: LanguageModel | null;

  constructor(config: VisionClassifierConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'classifier' });
    this.model = config.apiKey
      ? createOpenAI({
          apiKey: config.apiKey,
          ...(config.baseUrl !== undefined && { baseURL: config.baseUrl }),
        }).chat(config.model)
      : null;

    if (!this.model) {
      this.logger.warn('No classifier API key configured, photos will not be described');
    }
  }

  isAvailable(): boolean {
    return this.model !== null;
  }

  async classify(artifactPath: string, signal: AbortSignal): Promise<ClassifierResult | null> {
    if (!this.model) {
      return null;
    }

    const image = await readFile(artifactPath);
    const mediaType = MEDIA_TYPES[extname(artifactPath).toLowerCase()] ?? 'image/jpeg';
    const startTime = Date.now();

    try {
      const result = await generateText({
        model: this.model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: CLASSIFIER_PROMPT },
              { type: 'image', image, mediaType },
            ],
          },
        ],
        maxOutputTokens: this.config.maxOutputTokens,
        // Retries are the circuit breaker's business
        maxRetries: 0,
        abortSignal: signal,
      });

      const parsed = parseClassifierText(result.text);
      this.logger.debug(
        {
          artifactPath,
          durationMs: Date.now() - startTime,
          confidence: parsed.confidence,
          usage: result.usage,
        },
        'Classification received'
      );
      return parsed.description.length > 0 ? parsed : null;
    } catch (error) {
      throw new ClassifierError(`Vision request failed: ${errorMessage(error)}`, error);
    }
  }
}

export function createVisionClassifier(
  config: VisionClassifierConfig,
  logger: Logger
): VisionClassifier {
  return new VisionClassifier(config, logger);
}
