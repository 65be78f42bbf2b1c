/**
 * Typed failures returned by maternal record operations.
 * Messages are safe to send to callers; they never include profile contents.
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class MaternalError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = "MaternalError";
    this.code = code;
    this.statusCode = statusCode;
    Error.captureStackTrace(this, this.constructor);
  }

  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

export class ValidationError extends MaternalError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, "VALIDATION_ERROR", 400);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends MaternalError {
  constructor(resource: string) {
    super(`${resource} not found`, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

export class UnknownOperationError extends MaternalError {
  public readonly operation: string;

  constructor(operation: string) {
    super(`Unknown operation: ${operation}`, "UNKNOWN_OPERATION", 404);
    this.name = "UnknownOperationError";
    this.operation = operation;
  }
}

export class ConfigurationError extends MaternalError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR", 500);
    this.name = "ConfigurationError";
  }
}

export class SnapshotError extends MaternalError {
  constructor(message: string) {
    super(message, "SNAPSHOT_ERROR", 500);
    this.name = "SnapshotError";
  }
}

export function isMaternalError(error: unknown): error is MaternalError {
  return error instanceof MaternalError;
}
