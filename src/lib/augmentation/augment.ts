/**
 * Augmentation runner
 * Turns adapter suggestions into queries and warnings; the dataset is never changed
 */

import type { Category, FinancialDataset, LineItemMap } from '../../types/financial';
import { ALL_CATEGORIES } from '../../types/financial';
import type { ValidationIssue, ValidationReport } from '../../types/validation';
import { amountsAgree, formatCurrency, formatSignedCurrency } from '../utils/currency';
import { getErrorLogger, toStatementError } from '../utils/errors';
import type { AugmentationAdapter, AugmentationContext, AugmentationOutcome } from './interfaces';

function suggestionIssues(
  dataset: FinancialDataset,
  suggestions: LineItemMap,
  adapterName: string
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const defaulted = new Set<Category>(dataset.defaulted);
  const extracted = new Set<Category>(dataset.extracted);

  for (const category of ALL_CATEGORIES) {
    const suggested = suggestions[category];
    if (suggested === undefined) {
      continue;
    }
    const current = dataset.values[category];

    if (defaulted.has(category) && !amountsAgree(suggested, current)) {
      issues.push({
        severity: 'query',
        code: 'AUGMENTATION_SUGGESTION',
        message: [
          `Suggested value for ${category}`,
          `Source: none (shown as ${formatCurrency(current)})`,
          `Suggested by ${adapterName}: ${formatCurrency(suggested)}`,
          'Confirm before using the suggested value.',
        ].join('\n'),
        delta: suggested - current,
      });
    } else if (extracted.has(category) && !amountsAgree(suggested, current)) {
      issues.push({
        severity: 'warning',
        code: 'AUGMENTATION_DISAGREEMENT',
        message: [
          `Augmentation disagrees on ${category}`,
          `Extracted: ${formatCurrency(current)}`,
          `Suggested by ${adapterName}: ${formatCurrency(suggested)}`,
          `Difference: ${formatSignedCurrency(suggested - current)}`,
        ].join('\n'),
        delta: suggested - current,
      });
    }
  }

  return issues;
}

/**
 * Consult the adapter after the deterministic checks.
 * Skipped when there is no adapter or the report has a fatal issue;
 * adapter failures are logged and reported as skipped.
 */
export async function runAugmentation(
  adapter: AugmentationAdapter | undefined,
  dataset: FinancialDataset,
  report: ValidationReport,
  context: AugmentationContext = {}
): Promise<AugmentationOutcome> {
  if (!adapter) {
    return { status: 'skipped', reason: 'augmentation disabled' };
  }
  if (!report.ok) {
    return { status: 'skipped', reason: 'fatal validation issues present' };
  }

  let suggestions: LineItemMap | null;
  try {
    suggestions = await adapter.augment(dataset, context);
  } catch (error) {
    const statementError = toStatementError(error);
    getErrorLogger().log(statementError, { adapter: adapter.name });
    return { status: 'skipped', reason: `${adapter.name} failed: ${statementError.message}` };
  }

  if (!suggestions) {
    return { status: 'skipped', reason: `${adapter.name} returned no suggestions` };
  }

  const issues = suggestionIssues(dataset, suggestions, adapter.name);
  console.log(`[Augmentation] ${adapter.name}: ${issues.length} finding(s)`);
  return { status: 'completed', adapter: adapter.name, suggestions, issues };
}
