/**
 * TVM802 Export - Custom Error Classes
 *
 * Structured error handling with full context for debugging
 */

export interface ErrorContext {
  operation: string;
  input?: unknown;
  timestamp: Date;
  filePath?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export class Tvm802ExportError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    exitCode: number,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context,
    };
  }
}

// Usage Errors (exit 2)
export class ValidationError extends Tvm802ExportError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'VALIDATION_ERROR', 2, context);
  }
}

export class BomRequiredError extends Tvm802ExportError {
  constructor(placementPath: string, context: Partial<ErrorContext>) {
    super(
      `BOM CSV is required when using 'positions.csv' input: ${placementPath}`,
      'BOM_REQUIRED',
      2,
      { ...context, filePath: placementPath, suggestion: 'Pass a BOM file with --bom' }
    );
  }
}

// Data Errors (exit 1)
export class DuplicateKeyError extends Tvm802ExportError {
  public readonly key: string;

  constructor(source: string, key: string, context: Partial<ErrorContext>) {
    super(`Duplicate ${source} key: ${key}`, 'DUPLICATE_KEY', 1, { ...context, key });
    this.key = key;
  }
}

// IO Errors (exit 1)
export class FileAccessError extends Tvm802ExportError {
  public readonly filePath: string;

  constructor(
    action: 'read' | 'write',
    filePath: string,
    cause: string,
    context: Partial<ErrorContext>
  ) {
    super(
      `Failed to ${action} ${filePath}: ${cause}`,
      'FILE_ACCESS_ERROR',
      1,
      { ...context, filePath, action }
    );
    this.filePath = filePath;
  }
}

// Internal Errors (exit 70)
export class InternalError extends Tvm802ExportError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', 70, context, false);
  }
}

// Error type guard
export function isTvm802ExportError(error: unknown): error is Tvm802ExportError {
  return error instanceof Tvm802ExportError;
}

// Error handler helper
export function handleError(error: unknown): Tvm802ExportError {
  if (isTvm802ExportError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      operation: 'unknown',
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new InternalError('An unexpected error occurred', {
    operation: 'unknown',
    originalError: String(error),
  });
}
