export type BracketsErrorKind =
  | 'ParseError'
  | 'NoBaselineError'
  | 'AlreadyExistsError'
  | 'NoDataError'
  | 'IoError'
  | 'InvalidInputError';

/**
 * Base class for every failure the engine reports to its caller.
 * `path` names the document involved, when there is one.
 */
export class BracketsError extends Error {
  readonly kind: BracketsErrorKind;
  readonly path: string | null;

  constructor(kind: BracketsErrorKind, message: string, path: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.path = path;
  }
}

/** Input is not recognisable as a journal document. */
export class ParseError extends BracketsError {
  constructor(message: string, path: string | null = null) {
    super('ParseError', message, path);
  }

  /** Copy of this error bound to the file it was read from. */
  withPath(path: string): ParseError {
    return new ParseError(this.message, path);
  }
}

export class NoBaselineError extends BracketsError {
  constructor(message: string, path: string | null = null) {
    super('NoBaselineError', message, path);
  }
}

export class AlreadyExistsError extends BracketsError {
  constructor(path: string) {
    super('AlreadyExistsError', `Document already exists: ${path}`, path);
  }
}

export class NoDataError extends BracketsError {
  constructor(message: string) {
    super('NoDataError', message);
  }
}

export class IoError extends BracketsError {
  constructor(message: string, path: string, cause: unknown) {
    super('IoError', `${message}: ${describeCause(cause)}`, path, { cause });
  }
}

/** Caller supplied an argument the engine cannot act on, e.g. a malformed date. */
export class InvalidInputError extends BracketsError {
  constructor(message: string) {
    super('InvalidInputError', message);
  }
}

/**
 * Non-fatal outcome of a yearly consolidation that found gaps.
 * Returned alongside the result, never thrown.
 */
export class PartialDataWarning {
  readonly kind = 'PartialDataWarning' as const;
  readonly message: string;

  constructor(readonly year: number, readonly missingMonths: number[]) {
    const listed = missingMonths.map(m => String(m).padStart(2, '0')).join(', ');
    this.message = `Year ${year} is missing monthly rollups for month(s) ${listed}`;
  }
}

/** A consumed source document could not be deleted after its rollup was written. */
export class SourceRemovalWarning {
  readonly kind = 'SourceRemovalWarning' as const;
  readonly message: string;

  constructor(readonly path: string, cause: unknown) {
    this.message = `Could not remove ${path}: ${describeCause(cause)}`;
  }
}

export type OperationWarning = PartialDataWarning | SourceRemovalWarning;

// Errors thrown by Node's own modules can come from another realm (Jest runs
// tests in a vm context), so these checks look at the shape, not the class.

export function describeCause(cause: unknown): string {
  if (typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string') {
    return cause.message;
  }
  return String(cause);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
