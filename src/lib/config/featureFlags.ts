/**
 * Feature Flags
 */

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * true / false when the variable is set to a recognised value, undefined otherwise
 */
export function readFlag(name: string, env: Environment = process.env): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  if (value) {
    console.warn(`[FEATURE_FLAG] Ignoring unrecognised value for ${name}: ${value}`);
  }
  return undefined;
}

/**
 * AI augmentation after the deterministic checks
 *
 * Environment: STATEMENTS_AI_AUGMENTATION=true|1 (default: off).
 * The adapter also needs OPENROUTER_API_KEY.
 */
export function isAiAugmentationEnabled(env: Environment = process.env): boolean {
  return readFlag('STATEMENTS_AI_AUGMENTATION', env) ?? false;
}
