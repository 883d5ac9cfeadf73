/**
 * constants/index.ts
 * Shared constant values
 */

export { ERROR_MESSAGES } from './error-messages.js';

export const TIMEOUT_CLASSES = ['llm', 'embeddings', 'tts', 'stt', 'speaker', 'audio', 'default'] as const;
export type TimeoutClass = (typeof TIMEOUT_CLASSES)[number];

export const ROUTE_FAMILIES = ['llm', 'embeddings', 'tts', 'stt', 'speakers', 'audio'] as const;
export type RouteFamily = (typeof ROUTE_FAMILIES)[number];

export const HEALTH_CHECK_TIMEOUT_MS = 5000;
export const ERROR_DETAIL_MAX_CHARS = 1000;
export const TERMINAL_BACKLOG_MIN = 1;
export const TERMINAL_BACKLOG_MAX = 500;
export const SHUTDOWN_FORCE_EXIT_MS = 30000;
