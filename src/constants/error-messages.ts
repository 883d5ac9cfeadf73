/**
 * error-messages.ts
 * Standardized error messages used across the gateway
 */

export const ERROR_MESSAGES = {
  // Backend errors
  BACKEND_UNAVAILABLE: 'Backend unavailable',
  BACKEND_TIMEOUT: 'Backend timeout',
  BACKEND_NOT_CONFIGURED: 'Backend not configured',
  BACKEND_NOT_CONFIGURED_NAME: (name: string) => `Backend '${name}' is not configured`,
  CIRCUIT_OPEN: (name: string) => `Circuit breaker open for backend '${name}'`,
  BACKEND_ERROR: 'Backend error',

  // Model errors
  MODEL_NOT_FOUND: 'Model not found',
  MODEL_NOT_FOUND_NAME: (model: string) => `Model '${model}' not found on backend`,
  MODEL_REQUIRED: 'model is required and must be a string',
  MODEL_LOAD_FAILED: 'Model load failed',
  MODEL_LOAD_FAILED_NAME: (model: string) => `Backend reported failed load for '${model}'`,
  MODEL_LOAD_REJECTED: (model: string, status: number) =>
    `Load command for '${model}' rejected with HTTP ${status}`,
  MODEL_LOAD_TIMEOUT: 'Model load timeout',
  MODEL_LOAD_TIMEOUT_NAME: (model: string, ms: number) =>
    `Model '${model}' did not finish loading within ${Math.round(ms / 1000)}s`,
  MODEL_LIST_FAILED: (status: number) => `Model list request failed with HTTP ${status}`,

  // Request errors
  INVALID_REQUEST: 'Invalid request',
  INVALID_JSON: 'Invalid JSON body',
  MESSAGES_REQUIRED: 'messages must be an array',
  INVALID_PROFILE_FIELD: 'Invalid profile field',

  // Terminal feed
  TERMINAL_FEED_DISABLED: 'Terminal feed disabled',

  // Generic errors
  INTERNAL_SERVER_ERROR: 'Internal server error',
  TOO_MANY_REQUESTS: 'Too many requests, please try again later',
} as const;
