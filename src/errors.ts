/**
 * Base language error class.
 */
export class LoxError extends Error {
  constructor(message: string, public line: number) {
    super(message);
    this.name = 'LoxError';
  }
}

/**
 * Error representing characters the scanner cannot turn into a token.
 */
export class ScanError extends LoxError {
  constructor(
    message: string,
    line: number,
    /**
     * Offset into the source where the offending token started.
     */
    public offset: number,
  ) {
    super(message, line);
    this.name = 'ScanError';
  }
}

/**
 * Single compile-time diagnostic.
 */
export class CompileError extends LoxError {
  constructor(
    message: string,
    line: number,
    /**
     * Quoted lexeme, `end`, or an empty string for lexical errors.
     */
    public where: string,
  ) {
    super(message, line);
    this.name = 'CompileError';
  }

  /**
   * Formats the diagnostic the way it is written to stderr.
   *
   * @returns Diagnostic line
   */
  toString(): string {
    const location = this.where ? ` at ${this.where}` : '';
    return `[line ${this.line}] Error${location}: ${this.message}`;
  }
}

/**
 * Categories of failures raised by the value operators and the VM.
 */
export type RuntimeErrorKind =
  | 'arithmetic'
  | 'negation'
  | 'comparison'
  | 'undefined-variable'
  | 'stack-overflow';

/**
 * Failure of a value-level operator. Carries no source position; the VM
 * attaches one when it converts this into a {@link RuntimeError}.
 */
export class EvaluationError extends Error {
  constructor(message: string, public kind: RuntimeErrorKind) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/**
 * Errors occurring during runtime VM execution.
 */
export class RuntimeError extends LoxError {
  constructor(
    message: string,
    line: number,
    public kind: RuntimeErrorKind,
  ) {
    super(message, line);
    this.name = 'RuntimeError';
  }
}
