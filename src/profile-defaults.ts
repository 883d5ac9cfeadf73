/**
 * profile-defaults.ts
 * Fill-only merge of stored profile values into a chat completion request
 */

import type { ChatCompletionRequest, ChatMessage } from './gateway.types.js';
import type { ProfileValues } from './model-profile-store.js';

export const GENERATION_KEYS = [
  'temperature',
  'top_p',
  'top_k',
  'min_p',
  'repeat_penalty',
  'max_tokens',
] as const;

const REASONING_LINE = /^\s*Reasoning:\s*(low|medium|high)\s*$/im;

function hasReasoningLine(content: unknown): boolean {
  if (typeof content === 'string') {
    return REASONING_LINE.test(content);
  }
  if (Array.isArray(content)) {
    return content.some(
      part =>
        typeof part === 'object' &&
        part !== null &&
        'text' in part &&
        typeof part.text === 'string' &&
        REASONING_LINE.test(part.text)
    );
  }
  return false;
}

function withDirective(message: ChatMessage, directive: string): ChatMessage {
  const { content } = message;
  if (hasReasoningLine(content)) {
    return message;
  }
  if (Array.isArray(content)) {
    return { ...message, content: [{ type: 'text', text: directive }, ...content] };
  }
  if (typeof content === 'string' && content.length > 0) {
    return { ...message, content: `${directive}\n${content}` };
  }
  return { ...message, content: directive };
}

/**
 * Copy stored values into the request wherever the caller left a key out.
 * Caller values are never overwritten and applying twice changes nothing.
 * Returns a new request; the input is not modified.
 */
export function applyProfileDefaults(
  payload: ChatCompletionRequest,
  profile: ProfileValues
): ChatCompletionRequest {
  const merged: ChatCompletionRequest = { ...payload, messages: [...payload.messages] };

  for (const key of GENERATION_KEYS) {
    const stored = profile[key];
    if (stored !== undefined && (merged[key] === undefined || merged[key] === null)) {
      merged[key] = stored;
    }
  }

  const systemPrompt = profile.system_prompt;
  if (
    typeof systemPrompt === 'string' &&
    systemPrompt.trim().length > 0 &&
    !merged.messages.some(message => message.role === 'system')
  ) {
    merged.messages.unshift({ role: 'system', content: systemPrompt });
  }

  const effort = profile.reasoning_effort;
  if (typeof effort === 'string' && effort.length > 0) {
    const directive = `Reasoning: ${effort}`;
    const index = merged.messages.findIndex(message => message.role === 'system');
    if (index === -1) {
      merged.messages.unshift({ role: 'system', content: directive });
    } else {
      merged.messages[index] = withDirective(merged.messages[index], directive);
    }
  }

  return merged;
}
