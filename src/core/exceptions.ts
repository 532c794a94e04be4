/**
 * Custom exceptions for the transform-and-relocate pipeline.
 */

/** A single upload attempt failed; the transfer primitive retries these. */
export class TransientTransferError extends Error {
  key: string;
  attempt: number;

  constructor(key: string, attempt: number, message?: string) {
    super(
      message
        ? `Transfer of ${key} failed on attempt ${attempt}: ${message}`
        : `Transfer of ${key} failed on attempt ${attempt}`,
    );
    this.name = "TransientTransferError";
    this.key = key;
    this.attempt = attempt;
  }
}

/** The transfer primitive ran out of attempts. */
export class PermanentTransferError extends Error {
  key: string;
  attempts: number;

  constructor(key: string, attempts: number, message?: string) {
    super(
      message
        ? `Transfer of ${key} gave up after ${attempts} attempts: ${message}`
        : `Transfer of ${key} gave up after ${attempts} attempts`,
    );
    this.name = "PermanentTransferError";
    this.key = key;
    this.attempts = attempts;
  }
}

export class EmptyInputError extends Error {
  key: string;

  constructor(key: string) {
    super(`${key} is empty, skipping it`);
    this.name = "EmptyInputError";
    this.key = key;
  }
}

/** The input parsed but lacks the long-format columns or numeric values. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

export class InvalidObjectKeyError extends Error {
  key: string;

  constructor(key: string, reason: string) {
    super(`Invalid object key "${key}": ${reason}`);
    this.name = "InvalidObjectKeyError";
    this.key = key;
  }
}

export class ObjectNotFoundError extends Error {
  key: string;

  constructor(key: string) {
    super(`Object not found: ${key}`);
    this.name = "ObjectNotFoundError";
    this.key = key;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorName(err: unknown): string {
  return err instanceof Error ? err.name : "Error";
}
