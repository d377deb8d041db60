import type { LogLevel } from '@quillkit/logger';

import { omitBy } from 'es-toolkit';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';

import type { ProviderCredentials } from './model-factory';

import { ConfigError } from './config-error';

/**
 * Model used when EXPORT_LLM_MODEL is unset, by the first provider with an
 * API key
 */
export const DEFAULT_MODELS = {
  openai: 'openai/gpt-4o-mini',
  anthropic: 'anthropic/claude-3-5-sonnet-20241022',
} as const;

const TRUE_VALUES = ['true', '1', 'yes'];

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => TRUE_VALUES.includes(value));

const modelIdSchema = z
  .string()
  .trim()
  .regex(/^[a-z0-9-]+\/\S+$/i, 'Expected "provider/model-name"');

/**
 * Environment variables read by the export workflow
 */
export const exportEnvSchema = z.object({
  EXPORT_DIRECTORY: z.string().trim().optional(),
  EXPORT_AUTO_OPEN: booleanFlagSchema.default(false),
  EXPORT_LLM_MODEL: modelIdSchema.optional(),
  EXPORT_LLM_FALLBACK_MODEL: modelIdSchema.optional(),
  EXPORT_LLM_MAX_RETRIES: z.coerce
    .number()
    .int()
    .nonnegative()
    .max(10)
    .default(3),
  EXPORT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
});

export interface ExportConfig {
  /**
   * Absolute directory documents are written to
   */
  outputDirectory: string;
  autoOpen: boolean;

  /**
   * "provider/model-name"
   */
  model: string;
  fallbackModel?: string;
  maxRetries: number;
  logLevel: LogLevel;
  credentials: ProviderCredentials;
}

export interface LoadExportConfigOptions {
  /**
   * Base for relative directories (default: process.cwd())
   */
  cwd?: string;

  /**
   * Directory `~` expands to (default: os.homedir())
   */
  homeDirectory?: string;
}

/**
 * Expand `$VAR`, `${VAR}` and a leading `~`, then resolve against `cwd`.
 * Unset variables are left as written.
 */
export function resolveOutputDirectory(
  value: string | undefined,
  env: Readonly<Record<string, string | undefined>>,
  options: Required<LoadExportConfigOptions>,
): string {
  if (value === undefined) {
    return resolve(options.cwd, 'exports');
  }

  const expanded = value.replace(
    /\$(?:\{(\w+)\}|(\w+))/g,
    (match, braced: string | undefined, bare: string | undefined) =>
      env[braced ?? bare ?? ''] ?? match,
  );

  if (expanded === '~') {
    return options.homeDirectory;
  }
  if (expanded.startsWith('~/')) {
    return join(options.homeDirectory, expanded.slice(2));
  }
  return resolve(options.cwd, expanded);
}

/**
 * Read and validate the export configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws {ConfigError} when a variable is invalid or no model can be chosen
 */
export function loadExportConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  options: LoadExportConfigOptions = {},
): ExportConfig {
  const present = omitBy(
    env,
    (value) => value === undefined || value.trim() === '',
  );
  const result = exportEnvSchema.safeParse(present);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`,
    );
    throw new ConfigError(
      `Invalid export configuration: ${issues.join('; ')}`,
      issues,
      { cause: result.error },
    );
  }

  const parsed = result.data;
  const model =
    parsed.EXPORT_LLM_MODEL ??
    (parsed.OPENAI_API_KEY
      ? DEFAULT_MODELS.openai
      : parsed.ANTHROPIC_API_KEY
        ? DEFAULT_MODELS.anthropic
        : undefined);

  if (model === undefined) {
    throw new ConfigError(
      'No LLM configured: set EXPORT_LLM_MODEL, OPENAI_API_KEY or ANTHROPIC_API_KEY',
    );
  }

  return {
    outputDirectory: resolveOutputDirectory(parsed.EXPORT_DIRECTORY, env, {
      cwd: options.cwd ?? process.cwd(),
      homeDirectory: options.homeDirectory ?? homedir(),
    }),
    autoOpen: parsed.EXPORT_AUTO_OPEN,
    model,
    fallbackModel: parsed.EXPORT_LLM_FALLBACK_MODEL,
    maxRetries: parsed.EXPORT_LLM_MAX_RETRIES,
    logLevel: parsed.EXPORT_LOG_LEVEL,
    credentials: {
      openaiApiKey: parsed.OPENAI_API_KEY,
      anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    },
  };
}
