/**
 * Relay Domain Errors
 *
 * Every error carries an `ErrorCode` so the bot surface and the HTTP surface
 * can report it without inspecting messages.
 *
 * @module shared/errors/relay-errors
 */

import { ErrorCode } from '@relayshare/shared';

/**
 * Base class of all domain errors
 */
export class RelayShareError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayShareError';
    this.code = code;
  }
}

/**
 * Operation attempted outside the required upload session mode
 */
export class InvalidStateError extends RelayShareError {
  constructor(message: string) {
    super(ErrorCode.INVALID_STATE, message);
    this.name = 'InvalidStateError';
  }
}

export class NotFoundError extends RelayShareError {
  constructor(message: string, code: ErrorCode = ErrorCode.NOT_FOUND) {
    super(code, message);
    this.name = 'NotFoundError';
  }
}

/**
 * Authorization or ownership failure
 */
export class ForbiddenError extends RelayShareError {
  constructor(message: string, code: ErrorCode = ErrorCode.FORBIDDEN) {
    super(code, message);
    this.name = 'ForbiddenError';
  }
}

/**
 * Transport or storage failure while relaying items
 */
export class RelayError extends RelayShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.RELAY_FAILED, message, options);
    this.name = 'RelayError';
  }
}

/**
 * Registry read or write failure
 */
export class PersistenceError extends RelayShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.PERSISTENCE_FAILED, message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Gate check failure. Always treated as "not authorized".
 */
export class GateError extends RelayShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.GATE_DENIED, message, options);
    this.name = 'GateError';
  }
}

/**
 * Bot API call answered with ok=false
 */
export class TelegramApiError extends RelayShareError {
  readonly method: string;
  readonly errorCode: number;
  readonly description: string;
  readonly retryAfter: number | undefined;

  constructor(method: string, errorCode: number, description: string, retryAfter?: number) {
    super(ErrorCode.TRANSPORT_ERROR, `${method} failed (${errorCode}): ${description}`);
    this.name = 'TelegramApiError';
    this.method = method;
    this.errorCode = errorCode;
    this.description = description;
    this.retryAfter = retryAfter;
  }
}

export function isRelayShareError(error: unknown): error is RelayShareError {
  return error instanceof RelayShareError;
}

/**
 * Plain message of any thrown value, for logs
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
