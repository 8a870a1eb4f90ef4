/**
 * Register Errors
 *
 * Error codes and the error type thrown by schema resolution, name
 * resolution, model construction and the codec.
 *
 * Structural errors (unknown kind, unknown name, length mismatch, invalid
 * layout) are thrown as soon as they are found. Data errors are collected
 * into `issues` and thrown together once a validation pass completes.
 *
 * @module errors/register-error
 */

export const ERROR_CODES = {
  OUT_OF_RANGE: 'NEUROREG_OUT_OF_RANGE',
  ARITY_MISMATCH: 'NEUROREG_ARITY_MISMATCH',
  READ_ONLY_VIOLATION: 'NEUROREG_READ_ONLY_VIOLATION',
  MISSING_FIELD: 'NEUROREG_MISSING_FIELD',
  DUPLICATE_FIELD: 'NEUROREG_DUPLICATE_FIELD',
  UNKNOWN_KIND: 'NEUROREG_UNKNOWN_KIND',
  UNKNOWN_NAME: 'NEUROREG_UNKNOWN_NAME',
  LENGTH_MISMATCH: 'NEUROREG_LENGTH_MISMATCH',
  LAYOUT_INVALID: 'NEUROREG_LAYOUT_INVALID',
  VALIDATION_ERROR: 'NEUROREG_VALIDATION_ERROR',
} as const;

export type RegisterErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * One problem found for one field during a validation pass.
 */
export interface RegisterIssue {
  code: RegisterErrorCode;
  /** Model name of the field, or the raw input name when it did not resolve */
  field: string;
  message: string;
  value?: unknown;
}

export class RegisterError extends Error {
  readonly code: RegisterErrorCode;
  readonly issues: readonly RegisterIssue[];

  constructor(code: RegisterErrorCode, message: string, issues: readonly RegisterIssue[] = []) {
    super(message);
    this.name = 'RegisterError';
    this.code = code;
    this.issues = issues;
  }

  /** Issues reported for one field. */
  issuesFor(field: string): RegisterIssue[] {
    return this.issues.filter((issue) => issue.field === field);
  }
}

export function createRegisterError(
  code: RegisterErrorCode,
  message: string,
  issues?: readonly RegisterIssue[]
): RegisterError {
  return new RegisterError(code, message, issues);
}

export function isRegisterError(error: unknown): error is RegisterError {
  return error instanceof RegisterError;
}

/**
 * Render issues one per line, for error messages and logs.
 */
export function formatIssues(issues: readonly RegisterIssue[]): string {
  return issues.map((issue) => `  - ${issue.field}: ${issue.message}`).join('\n');
}

/**
 * Build the aggregate error for a failed validation pass.
 *
 * A pass where every issue is a missing field reports MISSING_FIELD;
 * anything else reports VALIDATION_ERROR.
 */
export function aggregateIssues(context: string, issues: readonly RegisterIssue[]): RegisterError {
  const onlyMissing = issues.every((issue) => issue.code === ERROR_CODES.MISSING_FIELD);
  const code = onlyMissing ? ERROR_CODES.MISSING_FIELD : ERROR_CODES.VALIDATION_ERROR;
  const noun = issues.length === 1 ? 'issue' : 'issues';
  return createRegisterError(
    code,
    `${context}: ${issues.length} ${noun}\n${formatIssues(issues)}`,
    issues
  );
}
