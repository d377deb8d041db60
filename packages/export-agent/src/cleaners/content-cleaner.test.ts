import type { LoggerMethods } from '@quillkit/logger';
import type { LLMTokenUsageAggregator } from '@quillkit/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@quillkit/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { ContentCleaner } from './content-cleaner';

vi.mock('@quillkit/shared', () => ({
  LLMCaller: {
    callText: vi.fn(),
  },
}));

const usage = {
  component: 'ContentCleaner',
  phase: 'cleaning',
  model: 'primary' as const,
  modelName: 'test-model',
  inputTokens: 80,
  outputTokens: 60,
  totalTokens: 140,
};

const RAW = 'Proposal\n\nWe build a bridge.\n\nWould you like me to add a budget?';

describe('ContentCleaner', () => {
  let mockLogger: LoggerMethods;
  let cleaner: ContentCleaner;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    cleaner = new ContentCleaner(mockLogger, {
      modelId: 'test-model',
    } as unknown as LanguageModel);
  });

  test('returns the trimmed model output', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue({
      output: '\nProposal\n\nWe build a bridge.\n',
      usage,
      usedFallback: false,
    });

    const outcome = await cleaner.clean(RAW);

    expect(outcome).toEqual({
      ok: true,
      value: 'Proposal\n\nWe build a bridge.',
    });
    expect(LLMCaller.callText).toHaveBeenCalledWith(
      expect.objectContaining({
        userPrompt: `Clean this content:\n\n${RAW}`,
        component: 'ContentCleaner',
        phase: 'cleaning',
      }),
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      `[ContentCleaner] Cleaned content: ${RAW.length} → 28 characters`,
    );
  });

  test('skips empty text without calling the model', async () => {
    const outcome = await cleaner.clean('  \n');

    expect(outcome).toEqual({ ok: true, value: '  \n' });
    expect(LLMCaller.callText).not.toHaveBeenCalled();
  });

  test('records zero usage when there is nothing to clean', async () => {
    const aggregator = {
      track: vi.fn(),
    } as unknown as LLMTokenUsageAggregator;
    const tracked = new ContentCleaner(
      mockLogger,
      { modelId: 'test-model' } as unknown as LanguageModel,
      undefined,
      undefined,
      aggregator,
    );

    await tracked.clean('');

    expect(aggregator.track).toHaveBeenCalledWith({
      component: 'ContentCleaner',
      phase: 'cleaning',
      model: 'primary',
      modelName: 'none',
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    });
  });

  test('keeps the original text when the model returns nothing', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue({
      output: '   ',
      usage,
      usedFallback: false,
    });

    const outcome = await cleaner.clean(RAW);

    expect(outcome).toEqual({
      ok: false,
      value: RAW,
      failure: {
        kind: 'CleaningFailure',
        stage: 'clean',
        message: 'Cleaner returned empty text',
      },
    });
  });

  test('keeps the original text when the call fails', async () => {
    const cause = new Error('Service unavailable');
    vi.mocked(LLMCaller.callText).mockRejectedValue(cause);

    const outcome = await cleaner.clean(RAW);

    expect(outcome).toEqual({
      ok: false,
      value: RAW,
      failure: {
        kind: 'CleaningFailure',
        stage: 'clean',
        message: 'Failed to clean content: Service unavailable',
        cause,
      },
    });
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[ContentCleaner] Cleaning failed: Service unavailable',
    );
  });
});
