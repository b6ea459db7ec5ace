/**
 * Error handling and logging utilities
 * Structural failures are thrown; validation findings are returned, never thrown
 */

/**
 * Stage result status
 */
export type StageStatus =
  | 'success'             // stage completed
  | 'structural_failure'  // required statement/section not found
  | 'invalid_source'      // source container could not be read
  | 'configuration_error' // engagement configuration rejected
  | 'augmentation_error'  // optional adapter failed
  | 'timeout'             // stage exceeded its time budget
  | 'unknown_error';

/**
 * Base error type
 */
export class StatementError extends Error {
  constructor(
    public readonly status: StageStatus,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'StatementError';

    if (originalError?.stack) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * A required statement table or section is not present in the source.
 * The caller cannot build a dataset and must stop before validation.
 */
export class RequiredStatementMissingError extends StatementError {
  constructor(
    public readonly statement: string,
    public readonly triedAliases: readonly string[],
    public readonly sourceKind: 'table' | 'text'
  ) {
    super(
      'structural_failure',
      `Required statement missing: ${statement}. Expected one of: ${triedAliases.join(', ')}`,
      { statement, triedAliases: [...triedAliases], sourceKind }
    );
    this.name = 'RequiredStatementMissingError';
  }
}

/**
 * Workbook container could not be decoded
 */
export class WorkbookFormatError extends StatementError {
  constructor(message: string, originalError?: Error) {
    super('invalid_source', message, undefined, originalError);
    this.name = 'WorkbookFormatError';
  }
}

export class ConfigurationError extends StatementError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super('configuration_error', message, { issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * Augmentation adapter failure. Always recovered by the caller.
 */
export class AugmentationError extends StatementError {
  constructor(
    message: string,
    public readonly reason: 'timeout' | 'http' | 'malformed_response' | 'unavailable',
    details?: Record<string, unknown>,
    originalError?: Error
  ) {
    super('augmentation_error', message, { ...details, reason }, originalError);
    this.name = 'AugmentationError';
  }
}

/**
 * A pipeline stage did not finish within its time budget
 */
export class StageTimeoutError extends StatementError {
  constructor(
    public readonly stage: string,
    public readonly timeoutMs: number
  ) {
    super('timeout', `[${stage}] Timed out after ${timeoutMs}ms`, { stage, timeoutMs });
    this.name = 'StageTimeoutError';
  }
}

/**
 * Error logger interface
 */
export interface ErrorLogger {
  log(error: StatementError, context?: Record<string, unknown>): void;
  logError(error: Error, context?: Record<string, unknown>): void;
}

/**
 * Console error logger (default)
 */
export class ConsoleErrorLogger implements ErrorLogger {
  log(error: StatementError, context?: Record<string, unknown>): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      status: error.status,
      message: error.message,
      details: error.details,
      context,
    };

    console.error('[Statement Error]', JSON.stringify(logEntry, null, 2));
  }

  logError(error: Error, context?: Record<string, unknown>): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      message: error.message,
      context,
      stack: error.stack,
    };

    console.error('[Error]', JSON.stringify(logEntry, null, 2));
  }
}

let globalLogger: ErrorLogger = new ConsoleErrorLogger();

export function setErrorLogger(logger: ErrorLogger): void {
  globalLogger = logger;
}

export function getErrorLogger(): ErrorLogger {
  return globalLogger;
}

/**
 * Normalise anything thrown into a StatementError
 */
export function toStatementError(error: unknown): StatementError {
  if (error instanceof StatementError) {
    return error;
  }
  if (error instanceof Error) {
    return new StatementError('unknown_error', error.message, { originalError: error.name }, error);
  }
  return new StatementError('unknown_error', 'Unknown error occurred', { error: String(error) });
}

/**
 * Run a stage and convert failures into a status result (logged, not rethrown)
 */
export async function safeStage<T>(
  stageFn: () => Promise<T>,
  context?: Record<string, unknown>
): Promise<{
  status: StageStatus;
  data?: T;
  error?: StatementError;
}> {
  try {
    const data = await stageFn();
    return {
      status: 'success',
      data,
    };
  } catch (error) {
    const statementError = toStatementError(error);
    globalLogger.log(statementError, context);

    return {
      status: statementError.status,
      error: statementError,
    };
  }
}
