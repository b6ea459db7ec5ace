/**
 * Progress tracking and stage timeouts
 */

import { StageTimeoutError } from './errors'

export type PipelineStage =
  | 'PRIOR_REPORT_PARSE'   // prior-year report text (0~25%)
  | 'CURRENT_EXTRACT'      // current workbook tables (25~45%)
  | 'DERIVE'               // identities, defaults, totals (45~55%)
  | 'VALIDATE'             // reconciliation checks (55~70%)
  | 'AUGMENT'              // optional adapter (70~95%)
  | 'DONE'
  | 'ERROR'

export interface StageProgress {
  stage: PipelineStage
  percentage: number
  message: string
}

export interface StageConfig {
  minPercentage: number
  maxPercentage: number
  timeoutMs: number
  label: string
}

export const STAGE_CONFIGS: Record<PipelineStage, StageConfig> = {
  PRIOR_REPORT_PARSE: {
    minPercentage: 0,
    maxPercentage: 25,
    timeoutMs: 0,
    label: 'Reading prior year report',
  },
  CURRENT_EXTRACT: {
    minPercentage: 25,
    maxPercentage: 45,
    timeoutMs: 0,
    label: 'Extracting current year figures',
  },
  DERIVE: {
    minPercentage: 45,
    maxPercentage: 55,
    timeoutMs: 0,
    label: 'Deriving missing values',
  },
  VALIDATE: {
    minPercentage: 55,
    maxPercentage: 70,
    timeoutMs: 0,
    label: 'Reconciling statements',
  },
  AUGMENT: {
    minPercentage: 70,
    maxPercentage: 95,
    timeoutMs: 120000, // whole fallback chain
    label: 'Requesting augmentation',
  },
  DONE: {
    minPercentage: 95,
    maxPercentage: 100,
    timeoutMs: 0,
    label: 'Statements ready',
  },
  ERROR: {
    minPercentage: 0,
    maxPercentage: 0,
    timeoutMs: 0,
    label: 'Failed',
  },
}

/**
 * Promise wrapper with a stage time budget
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  stage: PipelineStage
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new StageTimeoutError(STAGE_CONFIGS[stage].label, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutId)
  }
}

export function calculateStageProgress(
  stage: PipelineStage,
  subProgress: number = 0 // 0-1 within the stage
): number {
  const config = STAGE_CONFIGS[stage]
  const range = config.maxPercentage - config.minPercentage
  return config.minPercentage + range * subProgress
}

/**
 * Stage transition logging
 */
export function logStageTransition(
  fromStage: PipelineStage | null,
  toStage: PipelineStage,
  startTime: number
): void {
  if (fromStage) {
    const elapsed = Date.now() - startTime
    console.log(`[Progress] ${fromStage} → ${toStage} (${elapsed}ms)`)
  }

  console.log(`[Progress] ${toStage} - ${STAGE_CONFIGS[toStage].label}`)
}

/**
 * Tracks the current stage and reports transitions
 */
export class ProgressTracker {
  private stage: PipelineStage | null = null
  private stageStart = Date.now()

  constructor(private readonly onProgress?: (progress: StageProgress) => void) {}

  enter(stage: PipelineStage, message: string = STAGE_CONFIGS[stage].label): void {
    logStageTransition(this.stage, stage, this.stageStart)
    this.stage = stage
    this.stageStart = Date.now()
    this.onProgress?.({ stage, percentage: calculateStageProgress(stage), message })
  }
}
