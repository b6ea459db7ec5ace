#!/usr/bin/env node
/**
 * generate-statements
 * Reconciles the current workbook against the prior year report and writes
 * the validated datasets for rendering.
 *
 * Exit codes: 0 ready, 1 halted by fatal issues, 2 structural failure or bad arguments
 */

import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import type { EngagementConfig } from '../lib/config/engagement';
import { loadEngagementConfig, readEngagementConfigFile } from '../lib/config/engagement';
import { createAugmentationAdapter } from '../lib/augmentation/openrouter-adapter';
import { readWorkbook } from '../lib/parsers/workbook-reader';
import type { StatementPipelineResult } from '../lib/pipeline/statement-pipeline';
import { runStatementPipeline } from '../lib/pipeline/statement-pipeline';
import { formatValidationReport } from '../lib/validation/reconciliation-validator';
import { ConfigurationError, safeStage, toStatementError } from '../lib/utils/errors';

export const EXIT_READY = 0;
export const EXIT_BLOCKED = 1;
export const EXIT_STRUCTURAL = 2;

const USAGE = `Usage: generate-statements --workbook <file.xlsx> --prior-year-text <file.txt>
                           [--config <engagement.json>] [--out <result.json>] [--no-ai]

  --prior-year-text   text of the prior year report, pages separated by form feeds`;

export interface CliOptions {
  workbook: string;
  priorYearText: string;
  config?: string;
  out?: string;
  noAi: boolean;
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        workbook: { type: 'string' },
        'prior-year-text': { type: 'string' },
        config: { type: 'string' },
        out: { type: 'string' },
        'no-ai': { type: 'boolean', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigurationError('Invalid arguments', [error instanceof Error ? error.message : String(error)]);
  }
}

/**
 * @throws ConfigurationError on unknown or missing arguments
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = readFlags(argv);

  const missing = [
    values.workbook ? undefined : '--workbook',
    values['prior-year-text'] ? undefined : '--prior-year-text',
  ].filter((flag): flag is string => flag !== undefined);

  if (!values.workbook || !values['prior-year-text']) {
    throw new ConfigurationError('Missing required arguments', missing.map(flag => `${flag} is required`));
  }

  return {
    workbook: values.workbook,
    priorYearText: values['prior-year-text'],
    config: values.config,
    out: values.out,
    noAi: values['no-ai'] ?? false,
  };
}

/**
 * Pages of a text export; form feeds separate pages
 */
export function splitPages(text: string): string[] {
  return text.split('\f');
}

export function exitCodeFor(result: StatementPipelineResult): number {
  switch (result.kind) {
    case 'ready':
      return EXIT_READY;
    case 'blocked':
      return EXIT_BLOCKED;
    case 'structural_failure':
      return EXIT_STRUCTURAL;
  }
}

function serialiseResult(result: StatementPipelineResult): unknown {
  if (result.kind === 'structural_failure') {
    return {
      kind: result.kind,
      stage: result.stage,
      error: { status: result.error.status, message: result.error.message, details: result.error.details },
    };
  }

  return {
    kind: result.kind,
    entityName: result.priorYear.entityName,
    priorReportYear: result.priorYear.reportYear,
    contents: result.priorYear.contents,
    notes: result.priorYear.notes.map(note => ({ number: note.number, heading: note.heading })),
    signatories: result.signatories,
    priorRetainedEarnings: result.priorRetainedEarnings,
    prior: result.prior,
    current: result.current,
    report: result.report,
    ...(result.kind === 'ready' ? { augmentation: result.augmentation } : {}),
  };
}

async function loadConfig(options: CliOptions): Promise<EngagementConfig> {
  const config = options.config ? await readEngagementConfigFile(options.config) : loadEngagementConfig({});
  if (options.noAi) {
    return { ...config, augmentation: { ...config.augmentation, enabled: false } };
  }
  return config;
}

function printConfigurationError(error: ConfigurationError): void {
  console.error(`Error: ${error.message}`);
  for (const detail of error.issues) {
    console.error(`  - ${detail}`);
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  let config: EngagementConfig;
  try {
    options = parseCliArgs(argv);
    config = await loadConfig(options);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      console.error(USAGE);
      return EXIT_STRUCTURAL;
    }
    throw error;
  }

  const run = await safeStage(
    async () => {
      const [workbook, priorYearText] = await Promise.all([
        readFile(options.workbook),
        readFile(options.priorYearText, 'utf8'),
      ]);

      return runStatementPipeline({
        tables: await readWorkbook(workbook),
        priorYearPages: splitPages(priorYearText),
        config,
        adapter: createAugmentationAdapter(config.augmentation),
      });
    },
    { workbook: options.workbook, priorYearText: options.priorYearText }
  );

  if (!run.data) {
    console.error(`Error: ${run.error?.message ?? 'Unknown error occurred'}`);
    return EXIT_STRUCTURAL;
  }
  const result = run.data;

  if (result.kind === 'structural_failure') {
    console.error(`Error: ${result.error.message}`);
  } else {
    console.log(formatValidationReport(result.report));
    if (result.kind === 'ready' && result.augmentation.status === 'skipped') {
      console.log(`[Augmentation] skipped: ${result.augmentation.reason}`);
    }
  }

  if (options.out) {
    await writeFile(options.out, `${JSON.stringify(serialiseResult(result), null, 2)}\n`, 'utf8');
    console.log(`Results written to ${options.out}`);
  }

  return exitCodeFor(result);
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Error: ${toStatementError(error).message}`);
      process.exitCode = EXIT_STRUCTURAL;
    }
  );
}
