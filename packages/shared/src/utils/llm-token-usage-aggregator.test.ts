import type { LoggerMethods } from '@quillkit/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { ExtendedTokenUsage } from './llm-caller';

import { LLMTokenUsageAggregator } from './llm-token-usage-aggregator';

function usage(overrides: Partial<ExtendedTokenUsage>): ExtendedTokenUsage {
  return {
    component: 'IntentClassifier',
    phase: 'classification',
    model: 'primary',
    modelName: 'gpt-4o-mini',
    inputTokens: 100,
    outputTokens: 10,
    totalTokens: 110,
    ...overrides,
  };
}

describe('LLMTokenUsageAggregator', () => {
  let aggregator: LLMTokenUsageAggregator;
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    aggregator = new LLMTokenUsageAggregator();
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  test('starts with an empty report', () => {
    expect(aggregator.getReport()).toEqual({
      components: [],
      total: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
    });
  });

  test('sums repeated calls of the same component and phase', () => {
    aggregator.track(usage({}));
    aggregator.track(usage({ inputTokens: 50, outputTokens: 5, totalTokens: 55 }));

    expect(aggregator.getReport()).toEqual({
      components: [
        {
          component: 'IntentClassifier',
          phases: [
            {
              phase: 'classification',
              primary: {
                modelName: 'gpt-4o-mini',
                inputTokens: 150,
                outputTokens: 15,
                totalTokens: 165,
              },
              total: { inputTokens: 150, outputTokens: 15, totalTokens: 165 },
            },
          ],
          total: { inputTokens: 150, outputTokens: 15, totalTokens: 165 },
        },
      ],
      total: { inputTokens: 150, outputTokens: 15, totalTokens: 165 },
    });
  });

  test('keeps primary and fallback usage apart within a phase', () => {
    aggregator.track(usage({ component: 'FormattingExtractor', phase: 'extraction' }));
    aggregator.track(
      usage({
        component: 'FormattingExtractor',
        phase: 'extraction',
        model: 'fallback',
        modelName: 'claude-3-5-sonnet',
        inputTokens: 200,
        outputTokens: 20,
        totalTokens: 220,
      }),
    );

    const [phase] = aggregator.getReport().components[0].phases;
    expect(phase.primary?.totalTokens).toBe(110);
    expect(phase.fallback).toEqual({
      modelName: 'claude-3-5-sonnet',
      inputTokens: 200,
      outputTokens: 20,
      totalTokens: 220,
    });
    expect(phase.total.totalTokens).toBe(330);
  });

  test('orders components by first call', () => {
    aggregator.track(usage({ component: 'IntentClassifier' }));
    aggregator.track(usage({ component: 'ContentCleaner', phase: 'cleaning' }));
    aggregator.track(usage({ component: 'IntentClassifier' }));

    expect(
      aggregator.getReport().components.map((c) => c.component),
    ).toEqual(['IntentClassifier', 'ContentCleaner']);
    expect(aggregator.getTotalUsage()).toEqual({
      inputTokens: 300,
      outputTokens: 30,
      totalTokens: 330,
    });
  });

  test('returns report copies that do not change with later tracking', () => {
    aggregator.track(usage({}));
    const report = aggregator.getReport();

    aggregator.track(usage({}));

    expect(report.total.totalTokens).toBe(110);
    expect(report.components[0].phases[0].primary?.totalTokens).toBe(110);
  });

  test('reset clears tracked usage', () => {
    aggregator.track(usage({}));
    aggregator.reset();

    expect(aggregator.getReport().components).toEqual([]);
  });

  describe('logSummary', () => {
    test('logs when nothing was tracked', () => {
      aggregator.logSummary(mockLogger);

      expect(mockLogger.info).toHaveBeenCalledOnce();
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[ExportWorkflow] No token usage to report',
      );
    });

    test('logs component, phase and grand totals', () => {
      aggregator.track(usage({}));

      aggregator.logSummary(mockLogger);

      expect(vi.mocked(mockLogger.info).mock.calls).toEqual([
        ['[ExportWorkflow] Token usage summary:'],
        ['IntentClassifier:'],
        ['  - classification:'],
        ['      primary (gpt-4o-mini): 100 input, 10 output, 110 total'],
        ['      subtotal: 100 input, 10 output, 110 total'],
        ['  IntentClassifier total: 100 input, 10 output, 110 total'],
        ['Grand total: 100 input, 10 output, 110 total'],
      ]);
    });

    test('adds primary and fallback totals when a fallback answered', () => {
      aggregator.track(usage({}));
      aggregator.track(
        usage({
          model: 'fallback',
          modelName: 'claude-3-5-sonnet',
          inputTokens: 20,
          outputTokens: 2,
          totalTokens: 22,
        }),
      );

      aggregator.logSummary(mockLogger);

      expect(mockLogger.info).toHaveBeenCalledWith(
        '      fallback (claude-3-5-sonnet): 20 input, 2 output, 22 total',
      );
      expect(mockLogger.info).toHaveBeenCalledWith(
        'Primary total: 100 input, 10 output, 110 total',
      );
      expect(mockLogger.info).toHaveBeenCalledWith(
        'Fallback total: 20 input, 2 output, 22 total',
      );
      expect(mockLogger.info).toHaveBeenLastCalledWith(
        'Grand total: 120 input, 12 output, 132 total',
      );
    });
  });
});
