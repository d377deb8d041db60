import type { LoggerMethods } from '@quillkit/logger';
import type { LLMTokenUsageAggregator } from '@quillkit/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@quillkit/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { IntentClassifier, normalizeDocumentKind } from './intent-classifier';

vi.mock('@quillkit/shared', () => ({
  LLMCaller: {
    call: vi.fn(),
  },
}));

const usage = {
  component: 'IntentClassifier',
  phase: 'classification',
  model: 'primary' as const,
  modelName: 'test-model',
  inputTokens: 40,
  outputTokens: 12,
  totalTokens: 52,
};

describe('normalizeDocumentKind', () => {
  test.each([
    ['word', 'word'],
    ['pdf', 'pdf'],
    [' PDF\n', 'pdf'],
    ['Word', 'word'],
    ['docx', 'word'],
    ['excel', 'word'],
    ['', 'word'],
    [undefined, 'word'],
    [42, 'word'],
  ])('maps %j to %s', (raw, expected) => {
    expect(normalizeDocumentKind(raw)).toBe(expected);
  });
});

describe('IntentClassifier', () => {
  let mockLogger: LoggerMethods;
  let mockModel: LanguageModel;
  let mockAggregator: LLMTokenUsageAggregator;
  let classifier: IntentClassifier;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    mockModel = { modelId: 'test-model' } as unknown as LanguageModel;
    mockAggregator = { track: vi.fn() } as unknown as LLMTokenUsageAggregator;
    classifier = new IntentClassifier(
      mockLogger,
      mockModel,
      undefined,
      undefined,
      mockAggregator,
    );
  });

  test('returns the classification from the model', async () => {
    vi.mocked(LLMCaller.call).mockResolvedValue({
      output: {
        exportIntent: true,
        documentKind: 'pdf',
        reasoning: 'User asked for a PDF',
      },
      usage,
      usedFallback: false,
    });

    const outcome = await classifier.classify('Save as PDF');

    expect(outcome).toEqual({
      ok: true,
      value: {
        exportIntent: true,
        documentKind: 'pdf',
        reasoning: 'User asked for a PDF',
      },
    });
    expect(mockAggregator.track).toHaveBeenCalledWith(usage);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[IntentClassifier] Export intent: true, document kind: pdf',
    );
  });

  test('sends the instruction in the user prompt', async () => {
    vi.mocked(LLMCaller.call).mockResolvedValue({
      output: { exportIntent: true, documentKind: 'word', reasoning: null },
      usage,
      usedFallback: false,
    });

    await classifier.classify('Export as Word');

    expect(LLMCaller.call).toHaveBeenCalledWith(
      expect.objectContaining({
        userPrompt: 'Classify this request:\n"Export as Word"',
        component: 'IntentClassifier',
        phase: 'classification',
        primaryModel: mockModel,
        maxRetries: 3,
        temperature: 0,
      }),
    );
  });

  test('drops a null reasoning', async () => {
    vi.mocked(LLMCaller.call).mockResolvedValue({
      output: { exportIntent: false, documentKind: 'word', reasoning: null },
      usage,
      usedFallback: false,
    });

    const outcome = await classifier.classify('What time is it?');

    expect(outcome).toEqual({
      ok: true,
      value: {
        exportIntent: false,
        documentKind: 'word',
        reasoning: undefined,
      },
    });
  });

  test('coerces an unrecognised kind to word and warns', async () => {
    vi.mocked(LLMCaller.call).mockResolvedValue({
      output: { exportIntent: true, documentKind: 'spreadsheet', reasoning: null },
      usage,
      usedFallback: false,
    });

    const outcome = await classifier.classify('Export as a spreadsheet');

    expect(outcome.value.documentKind).toBe('word');
    expect(outcome.value.exportIntent).toBe(true);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[IntentClassifier] Unrecognised document kind "spreadsheet", using word',
    );
  });

  test('normalizes stray case and whitespace in the kind', async () => {
    vi.mocked(LLMCaller.call).mockResolvedValue({
      output: { exportIntent: true, documentKind: ' PDF ', reasoning: null },
      usage,
      usedFallback: false,
    });

    const outcome = await classifier.classify('pdf please');

    expect(outcome.value.documentKind).toBe('pdf');
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  test('short-circuits an empty instruction without calling the model', async () => {
    const outcome = await classifier.classify('   ');

    expect(outcome).toEqual({
      ok: true,
      value: { exportIntent: false, documentKind: 'word' },
    });
    expect(LLMCaller.call).not.toHaveBeenCalled();
    expect(mockAggregator.track).toHaveBeenCalledWith({
      component: 'IntentClassifier',
      phase: 'classification',
      model: 'primary',
      modelName: 'none',
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    });
  });

  test('returns the safe default as a ClassificationFailure when the call fails', async () => {
    const cause = new Error('Rate limited');
    vi.mocked(LLMCaller.call).mockRejectedValue(cause);

    const outcome = await classifier.classify('Export as PDF');

    expect(outcome).toEqual({
      ok: false,
      value: { exportIntent: false, documentKind: 'word' },
      failure: {
        kind: 'ClassificationFailure',
        stage: 'analyze',
        message: 'Failed to classify export request: Rate limited',
        cause,
      },
    });
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[IntentClassifier] Classification failed: Rate limited',
    );
  });

  test('handles non-Error rejections', async () => {
    vi.mocked(LLMCaller.call).mockRejectedValue('timeout');

    const outcome = await classifier.classify('Export as PDF');

    expect(outcome.ok).toBe(false);
    expect(outcome.ok === false && outcome.failure.message).toBe(
      'Failed to classify export request: timeout',
    );
  });

  test('uses a custom component name', async () => {
    const named = new IntentClassifier(mockLogger, mockModel, {
      componentName: 'ChatIntent',
    });

    await named.classify('');

    expect(mockLogger.info).toHaveBeenCalledWith(
      '[ChatIntent] Empty instruction, using default classification',
    );
  });
});
