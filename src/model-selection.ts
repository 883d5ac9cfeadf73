/**
 * model-selection.ts
 * Picks a default model for chat requests that do not name one
 */

import type { ModelsConfig } from './config/schema.js';
import type { ChatMessage } from './gateway.types.js';

const CODE_KEYWORDS =
  /\b(code|coding|bug|bugs|debug|debugging|function|method|class|compile|compiler|python|javascript|typescript|java|rust|golang|kotlin|swift|php|ruby|sql|regex|script|refactor|stack\s?trace|traceback|exception|segfault|api|json|yaml|dockerfile|docker|kubernetes|git|bash|shell|npm|pip|unit\s?test)\b/i;
const CODE_SYMBOLS = /```|c\+\+|c#|=>|\bdef\s+\w+\(|\bfn\s+\w+\(/i;

export interface ModelSelection {
  model: string;
  auto: boolean;
}

function textOf(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }
  const texts: string[] = [];
  for (const part of content) {
    if (typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string') {
      texts.push(part.text);
    }
  }
  return texts.join('\n');
}

/**
 * Text of the most recent user message, or '' when there is none
 */
export function latestUserText(messages: ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') {
      return textOf(messages[i].content);
    }
  }
  return '';
}

export function looksLikeCode(text: string): boolean {
  return CODE_KEYWORDS.test(text) || CODE_SYMBOLS.test(text);
}

export function isAutoAlias(model: string, aliases: string[]): boolean {
  const normalized = model.trim().toLowerCase();
  return aliases.some(alias => alias.trim().toLowerCase() === normalized);
}

/**
 * An explicit model wins unless it is one of the auto aliases
 */
export function selectModel(
  requested: unknown,
  messages: ChatMessage[],
  config: Pick<ModelsConfig, 'generalModel' | 'coderModel' | 'autoAliases'>
): ModelSelection {
  if (typeof requested === 'string' && !isAutoAlias(requested, config.autoAliases)) {
    return { model: requested.trim(), auto: false };
  }
  const model = looksLikeCode(latestUserText(messages)) ? config.coderModel : config.generalModel;
  return { model, auto: true };
}
