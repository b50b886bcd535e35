/**
 * Structured error codes and error classes for the recon pipeline
 *
 * Error code format: CATEGORY_SPECIFIC_ERROR
 * Categories:
 * - INPUT: Input file and option errors (fatal, before any fetch)
 * - OUTPUT: Result file errors (fatal, silent data loss is worse than stopping)
 * - EVALUATION: Sandboxed script evaluation faults (recovered by the JS miner)
 * - SCANNER: Scanner registration errors
 */

export const ErrorCode = {
  // Input (fatal)
  INPUT_UNREADABLE: 'INPUT_UNREADABLE',
  INPUT_INVALID_OPTION: 'INPUT_INVALID_OPTION',

  // Output (fatal)
  OUTPUT_BACKUP_FAILED: 'OUTPUT_BACKUP_FAILED',
  OUTPUT_OPEN_FAILED: 'OUTPUT_OPEN_FAILED',
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',
  OUTPUT_NOT_OPEN: 'OUTPUT_NOT_OPEN',

  // Evaluation (recovered)
  EVALUATION_PARSE: 'EVALUATION_PARSE',
  EVALUATION_BUDGET: 'EVALUATION_BUDGET',
  EVALUATION_CAPABILITY: 'EVALUATION_CAPABILITY',
  EVALUATION_RUNTIME: 'EVALUATION_RUNTIME',

  // Scanner registry
  SCANNER_INVALID: 'SCANNER_INVALID',
  SCANNER_DUPLICATE: 'SCANNER_DUPLICATE',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

export class ReconError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCodeType,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options?.details;
  }
}

/** Malformed or unreadable input */
export class InputError extends ReconError {}

/** Failure to persist results */
export class OutputIOError extends ReconError {}

export type EvaluationFaultReason = 'parse' | 'budget' | 'capability' | 'runtime';

const EVALUATION_CODES: Record<EvaluationFaultReason, ErrorCodeType> = {
  parse: ErrorCode.EVALUATION_PARSE,
  budget: ErrorCode.EVALUATION_BUDGET,
  capability: ErrorCode.EVALUATION_CAPABILITY,
  runtime: ErrorCode.EVALUATION_RUNTIME,
};

/** Sandboxed script fault; the JS miner downgrades to pattern output */
export class EvaluationFault extends ReconError {
  readonly reason: EvaluationFaultReason;

  constructor(reason: EvaluationFaultReason, message: string, options?: { cause?: unknown }) {
    super(EVALUATION_CODES[reason], message, options);
    this.reason = reason;
  }
}

/**
 * Anything thrown while evaluating becomes a fault; host errors (URIError,
 * RangeError from a deep tree) are reported as `runtime`
 */
export function toEvaluationFault(error: unknown): EvaluationFault {
  if (error instanceof EvaluationFault) return error;
  return new EvaluationFault('runtime', describeError(error), { cause: error });
}

export class ScannerError extends ReconError {}

/**
 * Common error constructors
 */
export const Errors = {
  inputUnreadable: (path: string, cause?: unknown) =>
    new InputError(ErrorCode.INPUT_UNREADABLE, `Input file not readable: ${path}`, {
      details: { path },
      cause,
    }),

  invalidOption: (field: string, validOptions: readonly string[]) =>
    new InputError(ErrorCode.INPUT_INVALID_OPTION, `Invalid ${field}. Must be one of: ${validOptions.join(', ')}`, {
      details: { field, valid_options: validOptions },
    }),

  invalidNumber: (field: string, expected: string) =>
    new InputError(ErrorCode.INPUT_INVALID_OPTION, `Invalid ${field}. ${expected}`, {
      details: { field, expected },
    }),

  backupFailed: (path: string, cause?: unknown) =>
    new OutputIOError(ErrorCode.OUTPUT_BACKUP_FAILED, `Could not back up previous output: ${path}`, {
      details: { path },
      cause,
    }),

  outputOpenFailed: (path: string, cause?: unknown) =>
    new OutputIOError(ErrorCode.OUTPUT_OPEN_FAILED, `Output path not writable: ${path}`, {
      details: { path },
      cause,
    }),

  outputWriteFailed: (path: string, cause?: unknown) =>
    new OutputIOError(ErrorCode.OUTPUT_WRITE_FAILED, `Failed to write results to ${path}`, {
      details: { path },
      cause,
    }),

  outputNotOpen: () =>
    new OutputIOError(ErrorCode.OUTPUT_NOT_OPEN, 'Result store is not open'),

  invalidScanner: (id?: string) =>
    new ScannerError(ErrorCode.SCANNER_INVALID, 'Object does not implement IDiscoveryScanner', {
      details: id ? { id } : undefined,
    }),

  duplicateScanner: (id: string) =>
    new ScannerError(ErrorCode.SCANNER_DUPLICATE, `Scanner already registered: ${id}`, {
      details: { id },
    }),
} as const;

/**
 * Errors that abort the run (setup-time and sink-time)
 */
export function isFatalError(error: unknown): error is InputError | OutputIOError {
  return error instanceof InputError || error instanceof OutputIOError;
}

/**
 * Extract the system error code (ECONNREFUSED, ENOENT, UND_ERR_*) from an error or its cause
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error && error.cause !== error) return systemErrorCode(error.cause);
  return undefined;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
