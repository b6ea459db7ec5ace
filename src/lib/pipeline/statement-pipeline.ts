/**
 * Statement pipeline
 * Prior-year report -> current extraction -> derive -> validate ->
 * rollforward copy -> optional augmentation
 */

import type { FinancialDataset, LineItemMap } from '../../types/financial';
import type { Compiler, Director, PriorYearReport } from '../../types/report';
import type { ValidationReport } from '../../types/validation';
import type { EngagementConfig } from '../config/engagement';
import type { AugmentationAdapter, AugmentationOutcome } from '../augmentation/interfaces';
import { runAugmentation } from '../augmentation/augment';
import type { ExtractionOptions, SourceTable } from '../parsers/interfaces';
import { parsePriorYearReport } from '../parsers/report-structure';
import { extractStatementFromTables } from '../parsers/row-extractor';
import { applyRetainedEarningsRollforward, buildDataset } from '../statements/derived-values';
import { validateStatements, withAdditionalIssues } from '../validation/reconciliation-validator';
import { StatementError, getErrorLogger, toStatementError } from '../utils/errors';
import type { PipelineStage, StageProgress } from '../utils/progress-tracker';
import { ProgressTracker, STAGE_CONFIGS, withTimeout } from '../utils/progress-tracker';

export interface StatementPipelineInput {
  /** Current period workbook tables */
  tables: readonly SourceTable[];

  /** Prior-year report text, one string per page */
  priorYearPages: readonly string[];

  config: EngagementConfig;
  adapter?: AugmentationAdapter;
  onProgress?: (progress: StageProgress) => void;
}

export interface Signatories {
  directors: Director[];
  compiler?: Compiler;
}

export interface StatementsOutcome {
  priorYear: PriorYearReport;
  prior: FinancialDataset;
  current: FinancialDataset;
  priorRetainedEarnings: number;
  signatories: Signatories;
  report: ValidationReport;
}

export type StatementPipelineResult =
  | {
      kind: 'structural_failure';
      stage: PipelineStage;
      error: StatementError;
    }
  | ({ kind: 'blocked' } & StatementsOutcome)
  | ({
      kind: 'ready';

      /** Current dataset as validated, before the rollforward copy */
      validated: FinancialDataset;

      augmentation: AugmentationOutcome;
    } & StatementsOutcome);

function isStructuralFailure(error: unknown): error is StatementError {
  return error instanceof StatementError && error.status === 'structural_failure';
}

/**
 * Prior report signatories, or the configured roster when the report names none
 */
export function resolveSignatories(priorYear: PriorYearReport, config: EngagementConfig): Signatories {
  let directors = priorYear.directors;
  if (directors.length === 0 && config.expectedDirectors.length > 0) {
    console.log('[Pipeline] Directors not found in the prior year report, using the configured roster');
    directors = config.expectedDirectors.map(name => ({ name, title: 'Director' }));
  }

  let compiler = priorYear.compiler;
  if (!compiler && config.expectedCompiler) {
    console.log('[Pipeline] Compiler not found in the prior year report, using the configured compiler');
    compiler = { name: config.expectedCompiler, title: config.expectedCompilerTitle ?? 'Compiler' };
  }

  return { directors, ...(compiler ? { compiler } : {}) };
}

interface ExtractedSources {
  priorYear: PriorYearReport;
  currentItems: LineItemMap;
}

function extractSources(
  input: StatementPipelineInput,
  options: ExtractionOptions,
  progress: ProgressTracker,
  onStage: (stage: PipelineStage) => void
): ExtractedSources {
  onStage('PRIOR_REPORT_PARSE');
  progress.enter('PRIOR_REPORT_PARSE');
  const priorYear = parsePriorYearReport(input.priorYearPages, options);

  onStage('CURRENT_EXTRACT');
  progress.enter('CURRENT_EXTRACT');
  const income = extractStatementFromTables(input.tables, 'income_statement', options);
  const balance = extractStatementFromTables(input.tables, 'balance_sheet', options);

  return { priorYear, currentItems: { ...income.items, ...balance.items } };
}

export async function runStatementPipeline(input: StatementPipelineInput): Promise<StatementPipelineResult> {
  const { config } = input;
  const progress = new ProgressTracker(input.onProgress);
  const options: ExtractionOptions =
    config.provisionsRowThreshold !== undefined ? { provisionsRowThreshold: config.provisionsRowThreshold } : {};

  let stage: PipelineStage = 'PRIOR_REPORT_PARSE';
  let sources: ExtractedSources;
  try {
    sources = extractSources(input, options, progress, next => {
      stage = next;
    });
  } catch (error) {
    if (!isStructuralFailure(error)) {
      throw error;
    }
    getErrorLogger().log(error, { stage });
    progress.enter('ERROR', error.message);
    return { kind: 'structural_failure', stage, error };
  }

  const { priorYear, currentItems } = sources;

  progress.enter('DERIVE');
  const prior = buildDataset({ ...priorYear.incomeStatement.items, ...priorYear.balanceSheet.items }, 'prior');
  const current = buildDataset(currentItems, 'current');
  const priorRetainedEarnings = config.priorRetainedEarnings ?? prior.values.retained_earnings;

  progress.enter('VALIDATE');
  const signatories = resolveSignatories(priorYear, config);
  const report = validateStatements(
    {
      current,
      prior,
      priorRetainedEarnings,
      directors: signatories.directors,
      compiler: signatories.compiler,
      taxConsolidationEntity: priorYear.taxConsolidationEntity,
      contingentLiabilityText: priorYear.contingentLiabilityText,
      notes: priorYear.notes,
    },
    {
      expectedDirectors: config.expectedDirectors,
      expectedCompiler: config.expectedCompiler,
    }
  );

  const outcome: StatementsOutcome = { priorYear, prior, current, priorRetainedEarnings, signatories, report };

  if (!report.ok) {
    console.log(`[Pipeline] Generation halted: ${report.fatals.length} fatal issue(s)`);
    progress.enter('ERROR', 'Generation halted');
    return { kind: 'blocked', ...outcome };
  }

  const rolledForward = applyRetainedEarningsRollforward(current, priorRetainedEarnings);

  progress.enter('AUGMENT');
  let augmentation: AugmentationOutcome;
  try {
    augmentation = await withTimeout(
      runAugmentation(input.adapter, current, report, {
        entityName: config.entityName ?? priorYear.entityName,
        reportYear: config.currentYear,
        sourceText: input.priorYearPages.join('\n'),
      }),
      STAGE_CONFIGS.AUGMENT.timeoutMs,
      'AUGMENT'
    );
  } catch (error) {
    const statementError = toStatementError(error);
    getErrorLogger().log(statementError, { stage: 'AUGMENT' });
    augmentation = { status: 'skipped', reason: statementError.message };
  }

  const finalReport =
    augmentation.status === 'completed' ? withAdditionalIssues(report, augmentation.issues) : report;

  progress.enter('DONE');
  return {
    kind: 'ready',
    ...outcome,
    current: rolledForward,
    validated: current,
    report: finalReport,
    augmentation,
  };
}
