/**
 * errors.ts
 * Typed gateway errors. Each carries the HTTP status it maps to and a stable
 * `error` label used in the response envelope.
 */

import type { ZodIssue } from 'zod';
import { ERROR_MESSAGES } from '../constants/index.js';

export interface ErrorEnvelope {
  error: string;
  detail?: unknown;
}

export class GatewayError extends Error {
  readonly statusCode: number;
  readonly label: string;

  constructor(label: string, statusCode: number, message?: string) {
    super(message ?? label);
    this.name = 'GatewayError';
    this.label = label;
    this.statusCode = statusCode;
  }

  toJSON(): ErrorEnvelope {
    return this.message === this.label
      ? { error: this.label }
      : { error: this.label, detail: this.message };
  }
}

/**
 * Connection could not be established, or the backend's breaker is open.
 */
export class BackendUnavailableError extends GatewayError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(ERROR_MESSAGES.BACKEND_UNAVAILABLE, 503, message);
    this.name = 'BackendUnavailableError';
    this.backend = backend;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Connected, but the backend did not answer in time.
 */
export class BackendTimeoutError extends GatewayError {
  readonly backend: string;

  constructor(backend: string, message: string) {
    super(ERROR_MESSAGES.BACKEND_TIMEOUT, 504, message);
    this.name = 'BackendTimeoutError';
    this.backend = backend;
  }
}

export class BackendNotConfiguredError extends GatewayError {
  constructor(name: string) {
    super(ERROR_MESSAGES.BACKEND_NOT_CONFIGURED, 503, ERROR_MESSAGES.BACKEND_NOT_CONFIGURED_NAME(name));
    this.name = 'BackendNotConfiguredError';
  }
}

export class ModelNotFoundError extends GatewayError {
  readonly model: string;

  constructor(model: string) {
    super(ERROR_MESSAGES.MODEL_NOT_FOUND, 400, ERROR_MESSAGES.MODEL_NOT_FOUND_NAME(model));
    this.name = 'ModelNotFoundError';
    this.model = model;
  }
}

export class ModelLoadFailedError extends GatewayError {
  readonly model: string;

  constructor(model: string, message?: string) {
    super(ERROR_MESSAGES.MODEL_LOAD_FAILED, 502, message ?? ERROR_MESSAGES.MODEL_LOAD_FAILED_NAME(model));
    this.name = 'ModelLoadFailedError';
    this.model = model;
  }
}

export class ModelLoadTimeoutError extends GatewayError {
  readonly model: string;

  constructor(model: string, timeoutMs: number) {
    super(ERROR_MESSAGES.MODEL_LOAD_TIMEOUT, 504, ERROR_MESSAGES.MODEL_LOAD_TIMEOUT_NAME(model, timeoutMs));
    this.name = 'ModelLoadTimeoutError';
    this.model = model;
  }
}

export class RequestValidationError extends GatewayError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(ERROR_MESSAGES.INVALID_REQUEST, 400, message);
    this.name = 'RequestValidationError';
    this.issues = issues;
  }

  override toJSON(): ErrorEnvelope {
    if (this.issues.length === 0) {
      return { error: this.label, detail: this.message };
    }
    return {
      error: this.label,
      detail: this.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    };
  }
}

export class ProfileFieldError extends GatewayError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(ERROR_MESSAGES.INVALID_PROFILE_FIELD, 400, `${field}: ${message}`);
    this.name = 'ProfileFieldError';
    this.field = field;
  }
}
