import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { generateText } from 'ai';
import {
  CLASSIFIER_PROMPT,
  VisionClassifier,
  parseClassifierText,
} from '../../../src/adapters/classifier/vision-classifier.js';
import { ClassifierError } from '../../../src/core/errors.js';
import { createMockLogger } from '../../helpers/factories.js';

vi.mock('ai', () => ({
  generateText: vi.fn(),
}));

const mockChatModel = vi.fn(() => ({}));
vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: () => ({
    chat: mockChatModel,
  }),
}));

const mockGenerateText = generateText as unknown as {
  mockResolvedValue: (value: unknown) => void;
  mockRejectedValue: (value: unknown) => void;
  mock: { calls: unknown[][] };
};

describe('parseClassifierText', () => {
  it('splits off a confidence in parentheses', () => {
    expect(parseClassifierText('Orange tabby cat (95% confident)')).toEqual({
      description: 'Orange tabby cat',
      confidence: 95,
    });
  });

  it('keeps sentence punctuation after removing the confidence', () => {
    expect(parseClassifierText('small brown dog, possibly a terrier mix (80% confident).')).toEqual({
      description: 'small brown dog, possibly a terrier mix.',
      confidence: 80,
    });
  });

  it('caps confidence at 100', () => {
    expect(parseClassifierText('Dog, 120% sure')).toEqual({ description: 'Dog', confidence: 100 });
  });

  it('returns a null confidence when there is none', () => {
    expect(parseClassifierText('  A grey cat ')).toEqual({ description: 'A grey cat', confidence: null });
  });
});

describe('VisionClassifier', () => {
  let dir: string;
  let photo: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'classifier-test-'));
    photo = join(dir, 'still.png');
    await writeFile(photo, 'png-bytes');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null without an API key', async () => {
    const logger = createMockLogger();
    const classifier = new VisionClassifier(
      { apiKey: undefined, model: 'gpt-4o-mini', maxOutputTokens: 150 },
      logger
    );

    expect(classifier.isAvailable()).toBe(false);
    expect(await classifier.classify(photo, new AbortController().signal)).toBeNull();
    expect(generateText).not.toHaveBeenCalled();
    expect(logger.calls.warn).toHaveLength(1);
  });

  it('sends the photo with the prompt and parses the answer', async () => {
    mockGenerateText.mockResolvedValue({
      text: 'Black cat with white paws (90% confident)',
      usage: { inputTokens: 10, outputTokens: 8, totalTokens: 18 },
    });
    const classifier = new VisionClassifier(
      { apiKey: 'test-key', model: 'gpt-4o-mini', maxOutputTokens: 150 },
      createMockLogger()
    );
    const signal = new AbortController().signal;

    const result = await classifier.classify(photo, signal);

    expect(result).toEqual({ description: 'Black cat with white paws', confidence: 90 });
    expect(mockChatModel).toHaveBeenCalledWith('gpt-4o-mini');
    expect(mockGenerateText.mock.calls[0]?.[0]).toMatchObject({
      maxOutputTokens: 150,
      maxRetries: 0,
      abortSignal: signal,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: CLASSIFIER_PROMPT },
            { type: 'image', image: Buffer.from('png-bytes'), mediaType: 'image/png' },
          ],
        },
      ],
    });
  });

  it('returns null for an empty answer', async () => {
    mockGenerateText.mockResolvedValue({ text: '   ', usage: {} });
    const classifier = new VisionClassifier(
      { apiKey: 'test-key', model: 'gpt-4o-mini', maxOutputTokens: 150 },
      createMockLogger()
    );

    expect(await classifier.classify(photo, new AbortController().signal)).toBeNull();
  });

  it('wraps provider failures in ClassifierError', async () => {
    mockGenerateText.mockRejectedValue(new Error('429 Too Many Requests'));
    const classifier = new VisionClassifier(
      { apiKey: 'test-key', model: 'gpt-4o-mini', maxOutputTokens: 150 },
      createMockLogger()
    );

    await expect(classifier.classify(photo, new AbortController().signal)).rejects.toThrow(
      ClassifierError
    );
  });
});
