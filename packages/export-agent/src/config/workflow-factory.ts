import { createConsoleLogger } from '@quillkit/logger';

import type { ExportConfig } from './export-config';

import {
  type ExportWorkflow,
  type ExportWorkflowOptions,
  createExportWorkflow,
} from '../workflow/export-workflow';
import { type ModelFactory, createModelFactory } from './model-factory';

export interface WorkflowFactoryOptions
  extends Partial<Omit<ExportWorkflowOptions, 'model' | 'fallbackModel'>> {
  /**
   * Replaces the provider-backed model factory
   */
  createModel?: ModelFactory;
}

/**
 * Build a workflow from loaded configuration. Explicit options win over
 * configured values.
 */
export function createExportWorkflowFromConfig(
  config: ExportConfig,
  options: WorkflowFactoryOptions = {},
): ExportWorkflow {
  const { createModel = createModelFactory(config.credentials), ...overrides } =
    options;

  return createExportWorkflow({
    logger: createConsoleLogger({ level: config.logLevel }),
    model: createModel(config.model),
    fallbackModel: config.fallbackModel
      ? createModel(config.fallbackModel)
      : undefined,
    outputDirectory: config.outputDirectory,
    autoOpen: config.autoOpen,
    maxRetries: config.maxRetries,
    ...overrides,
  });
}
