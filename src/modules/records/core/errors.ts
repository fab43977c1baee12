/**
 * Records Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * The one exception is EncodeContractError, which is thrown: it signals a
 * caller bug, not bad data.
 */

import type { AppError } from '../../../common/types/errors.js';
import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Transport Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The request never produced an HTTP response (DNS, socket, timeout).
 */
export interface NetworkError extends AppError {
  readonly type: 'NetworkError';
  readonly retryable: boolean;
}

/**
 * The service rejected the credentials (401/403).
 */
export interface AuthenticationError extends AppError {
  readonly type: 'AuthenticationError';
  readonly status: number;
}

/**
 * The dataset or record does not exist or is not shared with the integration.
 */
export interface NotFoundError extends AppError {
  readonly type: 'NotFoundError';
  readonly resource: string;
  readonly id: string;
}

/**
 * Any other non-2xx response.
 */
export interface ApiError extends AppError {
  readonly type: 'ApiError';
  readonly status: number;
  /** Service error code, e.g. "validation_error" */
  readonly code: string | null;
  readonly retryable: boolean;
}

/**
 * A 2xx response whose body does not have the expected shape.
 */
export interface InvalidResponseError extends AppError {
  readonly type: 'InvalidResponseError';
  readonly details: string[];
}

export type TransportError =
  | NetworkError
  | AuthenticationError
  | NotFoundError
  | ApiError
  | InvalidResponseError;

// ─────────────────────────────────────────────────────────────────────────────
// Validation Rejections
// ─────────────────────────────────────────────────────────────────────────────

export type Rejection =
  | { readonly type: 'NotANumber'; readonly message: 'not a number'; readonly input: string }
  | { readonly type: 'NotABoolean'; readonly message: 'not a boolean'; readonly input: string }
  | {
      readonly type: 'NotInAllowedOptions';
      readonly message: 'not in allowed options';
      readonly input: string;
      readonly allowed: readonly string[];
    }
  | {
      readonly type: 'EmptyOptionLabel';
      readonly message: 'missing an option label';
      readonly input: string;
    }
  | { readonly type: 'InvalidDate'; readonly message: 'not a YYYY-MM-DD date'; readonly input: string }
  | { readonly type: 'InvalidUrl'; readonly message: 'not an http(s) URL'; readonly input: string }
  | { readonly type: 'InvalidEmail'; readonly message: 'not an email address'; readonly input: string }
  | { readonly type: 'ReadOnlyField'; readonly message: 'read-only field' }
  | { readonly type: 'UnknownField'; readonly message: 'unknown field' };

export type RejectionType = Rejection['type'];

export const REJECTIONS = {
  notANumber: (input: string): Rejection => ({ type: 'NotANumber', message: 'not a number', input }),
  notABoolean: (input: string): Rejection => ({
    type: 'NotABoolean',
    message: 'not a boolean',
    input,
  }),
  notInAllowedOptions: (input: string, allowed: readonly string[]): Rejection => ({
    type: 'NotInAllowedOptions',
    message: 'not in allowed options',
    input,
    allowed,
  }),
  emptyOptionLabel: (input: string): Rejection => ({
    type: 'EmptyOptionLabel',
    message: 'missing an option label',
    input,
  }),
  invalidDate: (input: string): Rejection => ({
    type: 'InvalidDate',
    message: 'not a YYYY-MM-DD date',
    input,
  }),
  invalidUrl: (input: string): Rejection => ({
    type: 'InvalidUrl',
    message: 'not an http(s) URL',
    input,
  }),
  invalidEmail: (input: string): Rejection => ({
    type: 'InvalidEmail',
    message: 'not an email address',
    input,
  }),
  readOnlyField: (): Rejection => ({ type: 'ReadOnlyField', message: 'read-only field' }),
  unknownField: (): Rejection => ({ type: 'UnknownField', message: 'unknown field' }),
} as const;

/**
 * Renders a rejection for display next to the offending input.
 */
export const formatRejection = (rejection: Rejection): string => {
  switch (rejection.type) {
    case 'NotInAllowedOptions':
      return rejection.allowed.length > 0
        ? `'${rejection.input}' is ${rejection.message}: ${rejection.allowed.join(', ')}`
        : `'${rejection.input}' is ${rejection.message}: no options are defined`;
    case 'ReadOnlyField':
    case 'UnknownField':
      return rejection.message;
    case 'NotANumber':
    case 'NotABoolean':
    case 'EmptyOptionLabel':
    case 'InvalidDate':
    case 'InvalidUrl':
    case 'InvalidEmail':
      return `'${rejection.input}' is ${rejection.message}`;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Write Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One or more field inputs were rejected. Every rejected field is listed.
 */
export interface WriteValidationError extends AppError {
  readonly type: 'WriteValidationError';
  readonly rejections: readonly FieldRejection[];
}

export interface FieldRejection {
  readonly field: string;
  readonly rejection: Rejection;
}

/**
 * Every input was blank, so there is nothing to send.
 */
export interface NothingToWriteError extends AppError {
  readonly type: 'NothingToWriteError';
}

export type WriteError = WriteValidationError | NothingToWriteError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type RecordsError = TransportError | WriteError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNetworkError = (message: string, cause?: unknown): NetworkError => ({
  type: 'NetworkError',
  message,
  retryable: true,
  cause,
});

export const createAuthenticationError = (status: number, message: string): AuthenticationError => ({
  type: 'AuthenticationError',
  message,
  status,
});

export const createNotFoundError = (resource: string, id: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `${resource} with id '${id}' not found`,
  resource,
  id,
});

export const createApiError = (status: number, code: string | null, message: string): ApiError => ({
  type: 'ApiError',
  message,
  status,
  code,
  retryable: status === 429 || status >= 500,
});

export const createInvalidResponseError = (
  message: string,
  details: string[]
): InvalidResponseError => ({
  type: 'InvalidResponseError',
  message,
  details,
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

export const createWriteValidationError = (
  rejections: readonly FieldRejection[]
): WriteValidationError => ({
  type: 'WriteValidationError',
  message: rejections
    .map(({ field, rejection }) => `${field}: ${formatRejection(rejection)}`)
    .join('; '),
  rejections,
});

export const createNothingToWriteError = (): NothingToWriteError => ({
  type: 'NothingToWriteError',
  message: 'No field values were provided',
});

// ─────────────────────────────────────────────────────────────────────────────
// Contract Violations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when a caller asks the codec to encode a read-only kind, or a value
 * whose shape does not belong to the target kind.
 */
export class EncodeContractError extends Error {
  readonly kind: string;
  readonly valueKind: string;

  constructor(kind: string, valueKind: string, reason: string) {
    super(`Cannot encode ${valueKind} value as ${kind}: ${reason}`);
    this.name = 'EncodeContractError';
    this.kind = kind;
    this.valueKind = valueKind;
  }
}
