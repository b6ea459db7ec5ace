/**
 * OpenRouter augmentation adapter
 * Chat-completions call with a model fallback chain and a per-request timeout
 */

import { z } from 'zod';
import type { FinancialDataset, LineItemMap } from '../../types/financial';
import { ALL_CATEGORIES } from '../../types/financial';
import type { AugmentationSettings } from '../config/engagement';
import type { Environment } from '../config/featureFlags';
import { AugmentationError } from '../utils/errors';
import { dlog } from '../utils/debug';
import type { AugmentationAdapter, AugmentationContext } from './interfaces';

export const OPENROUTER_ENDPOINT = 'https://openrouter.ai/api/v1/chat/completions';

/** Source text sent with the prompt */
const SOURCE_TEXT_LIMIT = 8000;

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

const SuggestionPayloadSchema = z.object({
  suggestions: z.record(z.string(), z.number().finite().nullable()),
});

export interface OpenRouterAdapterOptions {
  apiKey: string;
  models: readonly string[];
  timeoutMs: number;
  endpoint?: string;
}

/**
 * Body of a ```json fenced block, a bare ``` block, or the whole reply
 */
export function extractJsonPayload(content: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(content);
  return (fenced ? fenced[1] : content).trim();
}

/**
 * Validated suggestions; unknown categories and nulls are dropped
 *
 * @throws AugmentationError when the reply is not the expected JSON shape
 */
export function parseSuggestions(content: string): LineItemMap {
  let json: unknown;
  try {
    json = JSON.parse(extractJsonPayload(content));
  } catch (error) {
    throw new AugmentationError(
      'Augmentation reply is not JSON',
      'malformed_response',
      undefined,
      error instanceof Error ? error : undefined
    );
  }

  const parsed = SuggestionPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new AugmentationError('Augmentation reply has an unexpected shape', 'malformed_response', {
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const items: LineItemMap = {};
  for (const category of ALL_CATEGORIES) {
    const value = parsed.data.suggestions[category];
    if (typeof value === 'number') {
      items[category] = value;
    }
  }
  return items;
}

function buildPrompt(dataset: FinancialDataset, context: AugmentationContext): string {
  const lines = [
    `Review the ${dataset.period} period figures of an Australian non-reporting entity's annual financial statements` +
      (context.entityName ? ` for ${context.entityName}` : '') +
      (context.reportYear ? ` (year ended 30 June ${context.reportYear})` : '') +
      '.',
    'Amounts are AUD, rounded to the nearest dollar. Deductions are stored as positive amounts.',
    '',
    'FIGURES:',
    JSON.stringify(dataset.values, null, 2),
    '',
    `Categories with no source value (currently zero): ${dataset.defaulted.join(', ') || 'none'}`,
  ];

  if (context.sourceText) {
    lines.push('', 'SOURCE TEXT:', context.sourceText.slice(0, SOURCE_TEXT_LIMIT));
  }

  lines.push(
    '',
    'Suggest a value only for categories you can support from the figures or the source text.',
    'Respond in JSON: {"suggestions": {"<category>": number}}'
  );
  return lines.join('\n');
}

export class OpenRouterAugmentationAdapter implements AugmentationAdapter {
  readonly name = 'openrouter';
  private readonly endpoint: string;

  constructor(private readonly options: OpenRouterAdapterOptions) {
    this.endpoint = options.endpoint ?? OPENROUTER_ENDPOINT;
  }

  private timeoutError(cause?: Error): AugmentationError {
    return new AugmentationError(
      `No response within ${this.options.timeoutMs}ms`,
      'timeout',
      { timeoutMs: this.options.timeoutMs },
      cause
    );
  }

  /**
   * Settles with the promise, or rejects with a timeout once the signal aborts.
   * A stub or a stalled body may ignore the signal itself.
   */
  private untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.timeoutError());
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * POST and read the JSON body; the timeout covers both
   */
  private async postWithTimeout(model: string, body: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.untilAborted(
          fetch(this.endpoint, {
            method: 'POST',
            headers: {
              'Authorization': `Bearer ${this.options.apiKey}`,
              'Content-Type': 'application/json',
              'X-Title': 'Annual Statements Generator',
            },
            body,
            signal: controller.signal,
          }),
          controller.signal
        );
      } catch (error) {
        if (error instanceof AugmentationError) {
          throw error;
        }
        if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
          throw this.timeoutError(error instanceof Error ? error : undefined);
        }
        throw new AugmentationError(
          `Request failed: ${error instanceof Error ? error.message : String(error)}`,
          'http',
          { model },
          error instanceof Error ? error : undefined
        );
      }

      if (!response.ok) {
        throw new AugmentationError(`HTTP error! status: ${response.status}`, 'http', {
          model,
          status: response.status,
        });
      }

      try {
        return await this.untilAborted(response.json(), controller.signal);
      } catch (error) {
        if (error instanceof AugmentationError) {
          throw error;
        }
        if (controller.signal.aborted) {
          throw this.timeoutError(error instanceof Error ? error : undefined);
        }
        throw new AugmentationError(
          'Response body is not JSON',
          'malformed_response',
          { model },
          error instanceof Error ? error : undefined
        );
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async callModel(model: string, prompt: string): Promise<LineItemMap> {
    const body = await this.postWithTimeout(
      model,
      JSON.stringify({
        model,
        messages: [
          { role: 'system', content: 'You are an Australian chartered accountant reviewing draft financial statements.' },
          { role: 'user', content: prompt },
        ],
        temperature: 0.3,
      })
    );

    const completion = ChatCompletionSchema.safeParse(body);
    if (!completion.success) {
      throw new AugmentationError('Response has no completion', 'malformed_response', { model });
    }

    return parseSuggestions(completion.data.choices[0].message.content);
  }

  /**
   * Tries each model in order; the first valid reply wins
   *
   * @throws AugmentationError from the last model when every model fails
   */
  async augment(dataset: FinancialDataset, context: AugmentationContext): Promise<LineItemMap | null> {
    const prompt = buildPrompt(dataset, context);
    let lastError: AugmentationError | undefined;

    for (const model of this.options.models) {
      try {
        const suggestions = await this.callModel(model, prompt);
        dlog(`[Augmentation] ${model}: ${Object.keys(suggestions).length} suggestions`);
        return Object.keys(suggestions).length > 0 ? suggestions : null;
      } catch (error) {
        lastError =
          error instanceof AugmentationError
            ? error
            : new AugmentationError(String(error), 'http', { model });
        console.warn(`[Augmentation] ${model} failed (${lastError.reason}): ${lastError.message}`);
      }
    }

    throw lastError ?? new AugmentationError('No augmentation models configured', 'unavailable');
  }
}

/**
 * Adapter for the configured settings, or undefined when augmentation is off
 * or has no credential
 */
export function createAugmentationAdapter(
  settings: AugmentationSettings,
  env: Environment = process.env
): AugmentationAdapter | undefined {
  if (!settings.enabled) {
    return undefined;
  }

  const apiKey = env.OPENROUTER_API_KEY?.trim();
  if (!apiKey) {
    console.warn('[Augmentation] Enabled but OPENROUTER_API_KEY is not set; skipping');
    return undefined;
  }

  return new OpenRouterAugmentationAdapter({
    apiKey,
    models: settings.models,
    timeoutMs: settings.timeoutMs,
  });
}
