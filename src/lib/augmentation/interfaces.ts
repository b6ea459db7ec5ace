/**
 * Augmentation capability
 * Optional second opinion on a built dataset; never part of the deterministic core
 */

import type { FinancialDataset, LineItemMap } from '../../types/financial';
import type { ValidationIssue } from '../../types/validation';

export interface AugmentationContext {
  entityName?: string;
  reportYear?: number;

  /** Source text the adapter may read (truncated by the adapter) */
  sourceText?: string;
}

export interface AugmentationAdapter {
  readonly name: string;

  /**
   * Suggested values by category, or null when the adapter has nothing to offer
   */
  augment(dataset: FinancialDataset, context: AugmentationContext): Promise<LineItemMap | null>;
}

export type AugmentationOutcome =
  | {
      status: 'completed';
      adapter: string;
      suggestions: LineItemMap;
      issues: ValidationIssue[];
    }
  | {
      status: 'skipped';
      reason: string;
    };
