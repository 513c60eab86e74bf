import type { ZodError } from 'zod';

export type AutofillErrorCode =
  | 'SCHEMA_VIOLATION'
  | 'NO_VALUE'
  | 'MATCH_TIMEOUT'
  | 'DETECTION_FAILURE';

export abstract class AutofillError extends Error {
  abstract readonly code: AutofillErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The personal record does not fit the attribute schema. Fatal at load time.
 */
export class SchemaViolation extends AutofillError {
  readonly code = 'SCHEMA_VIOLATION';
  readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, issues: Array<{ path: string; message: string }> = []) {
    super(message);
    this.issues = issues;
  }

  static fromZodError(error: ZodError, source: string): SchemaViolation {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message:
        issue.code === 'unrecognized_keys'
          ? `Unknown attribute(s): ${issue.keys.join(', ')}`
          : issue.message,
    }));
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    return new SchemaViolation(`Invalid personal record in ${source}: ${summary}`, issues);
  }
}

export class NoValueError extends AutofillError {
  readonly code = 'NO_VALUE';

  constructor(
    readonly attribute: string,
    readonly reason: string
  ) {
    super(`No value for ${attribute}: ${reason}`);
  }
}

export class MatchTimeout extends AutofillError {
  readonly code = 'MATCH_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`AI matcher did not answer within ${timeoutMs}ms`);
  }
}

export class DetectionFailure extends AutofillError {
  readonly code = 'DETECTION_FAILURE';

  constructor(readonly source: string) {
    super(`No form fields found on ${source}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
