/**
 * Engagement configuration
 * Per-entity expectations (roster, compiler) and run settings, validated with zod
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { Environment } from './featureFlags';
import { readFlag } from './featureFlags';

/**
 * Tried in order until one answers
 */
export const DEFAULT_AUGMENTATION_MODELS = [
  'x-ai/grok-4.1-fast',
  'google/gemini-2.5-flash-lite',
  'openai/gpt-4.1-nano',
];

export const DEFAULT_AUGMENTATION_TIMEOUT_MS = 30000;

export const AugmentationSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  models: z.array(z.string().min(1)).min(1).default(DEFAULT_AUGMENTATION_MODELS),
  timeoutMs: z.number().int().positive().default(DEFAULT_AUGMENTATION_TIMEOUT_MS),
});

export const EngagementConfigSchema = z.object({
  entityName: z.string().min(1).optional(),

  /** Financial year being prepared (e.g. 2025) */
  currentYear: z.number().int().min(1900).max(2200).optional(),

  expectedDirectors: z.array(z.string().min(1)).default([]),
  expectedCompiler: z.string().min(1).optional(),

  /** Used when the prior report names no compiler */
  expectedCompilerTitle: z.string().min(1).optional(),

  /** Opening retained earnings; defaults to the prior report's closing balance */
  priorRetainedEarnings: z.number().finite().optional(),

  provisionsRowThreshold: z.number().int().nonnegative().optional(),

  augmentation: AugmentationSettingsSchema.default({}),
});

export type AugmentationSettings = z.infer<typeof AugmentationSettingsSchema>;
export type EngagementConfig = z.infer<typeof EngagementConfigSchema>;
export type EngagementConfigInput = z.input<typeof EngagementConfigSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
}

const TimeoutSchema = z.coerce.number().int().positive();

/**
 * Environment overrides:
 * STATEMENTS_AI_AUGMENTATION, STATEMENTS_AI_MODELS (comma-separated),
 * STATEMENTS_AI_TIMEOUT_MS
 */
function applyEnvironment(config: EngagementConfig, env: Environment): EngagementConfig {
  const augmentation = { ...config.augmentation };

  const enabled = readFlag('STATEMENTS_AI_AUGMENTATION', env);
  if (enabled !== undefined) {
    augmentation.enabled = enabled;
  }

  const models = env.STATEMENTS_AI_MODELS?.split(',')
    .map(model => model.trim())
    .filter(model => model.length > 0);
  if (models && models.length > 0) {
    augmentation.models = models;
  }

  if (env.STATEMENTS_AI_TIMEOUT_MS !== undefined) {
    const parsed = TimeoutSchema.safeParse(env.STATEMENTS_AI_TIMEOUT_MS);
    if (!parsed.success) {
      throw new ConfigurationError('STATEMENTS_AI_TIMEOUT_MS is invalid', describeIssues(parsed.error));
    }
    augmentation.timeoutMs = parsed.data;
  }

  return { ...config, augmentation };
}

/**
 * Validate a raw configuration object and apply environment overrides
 *
 * @throws ConfigurationError listing every failed field
 */
export function loadEngagementConfig(raw: unknown, env: Environment = process.env): EngagementConfig {
  const parsed = EngagementConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError('Engagement configuration is invalid', describeIssues(parsed.error));
  }
  return applyEnvironment(parsed.data, env);
}

export async function readEngagementConfigFile(
  path: string,
  env: Environment = process.env
): Promise<EngagementConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Engagement configuration ${path} could not be read`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Engagement configuration ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return loadEngagementConfig(raw, env);
}
