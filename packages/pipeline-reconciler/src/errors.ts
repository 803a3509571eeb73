import type { ValidationIssue } from './types.js';

// ─── Initialization ─────────────────────────────────────────────────

export type InitializationErrorCode = 'MISSING_DEPENDENCY' | 'REGION_REQUIRED';

/**
 * Raised before any remote call when the process cannot be set up:
 * the SDK module is unavailable or no region was configured.
 */
export class InitializationError extends Error {
  public readonly code: InitializationErrorCode;

  constructor(code: InitializationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InitializationError';
    this.code = code;
  }
}

// ─── Desired state ──────────────────────────────────────────────────

export class DesiredStateError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(formatIssues(issues));
    this.name = 'DesiredStateError';
    this.issues = issues;
  }
}

/** Render validation issues as a single message, one issue per line */
export function formatIssues(issues: ValidationIssue[]): string {
  if (issues.length === 1 && issues[0]) {
    return `${issues[0].field}: ${issues[0].message}`;
  }
  const lines = issues.map((issue) => `  ${issue.field}: ${issue.message}`);
  return `Invalid desired state:\n${lines.join('\n')}`;
}

// ─── Remote calls ───────────────────────────────────────────────────

export type PipelineOperation = 'list' | 'create' | 'update' | 'delete';

/**
 * A control-plane call failed. The message is the SDK's message, unchanged.
 */
export class PipelineApiError extends Error {
  public readonly operation: PipelineOperation;
  /** SDK error name, e.g. "ValidationException" */
  public readonly code: string;
  public readonly statusCode?: number;

  constructor(
    operation: PipelineOperation,
    message: string,
    details: { code: string; statusCode?: number; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.name = 'PipelineApiError';
    this.operation = operation;
    this.code = details.code;
    this.statusCode = details.statusCode;
  }

  /** Wrap whatever the SDK threw for the given operation */
  static from(operation: PipelineOperation, err: unknown): PipelineApiError {
    if (err instanceof PipelineApiError) {
      return err;
    }
    if (err instanceof Error) {
      return new PipelineApiError(operation, err.message, {
        code: err.name,
        statusCode: httpStatusOf(err),
        cause: err,
      });
    }
    return new PipelineApiError(operation, String(err), { code: 'UnknownError', cause: err });
  }
}

function httpStatusOf(err: Error): number | undefined {
  if (!('$metadata' in err)) return undefined;
  const metadata: unknown = err.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

// ─── Reconcile ──────────────────────────────────────────────────────

export class ReconcileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReconcileError';
  }
}

/** Message to report for any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
