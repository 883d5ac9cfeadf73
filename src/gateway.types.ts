/**
 * gateway.types.ts
 * Shared request and model types
 */

export interface ChatMessage {
  role: string;
  content?: unknown;
  [key: string]: unknown;
}

/**
 * OpenAI-style chat completion request. Unknown keys are forwarded untouched.
 */
export interface ChatCompletionRequest {
  model?: unknown;
  messages: ChatMessage[];
  stream?: unknown;
  [key: string]: unknown;
}

export type ModelStatusValue = 'unloaded' | 'loading' | 'loaded' | 'unloading' | 'unknown';

export interface ModelStatus {
  value: ModelStatusValue;
  failed: boolean;
  args: string[];
}

/**
 * One entry of a backend's model registry, as reported
 */
export interface ModelLoadState {
  id: string;
  status: ModelStatus;
}

/**
 * A registry entry after split parts are merged. `id` is the first part's id.
 */
export interface LogicalModel extends ModelLoadState {
  parts?: string[];
}

export type ModelFamily = 'gpt-oss' | 'qwen' | 'generic';
