/**
 * @module @llmverify/core/request
 * Request-shaping helpers used by every provider adapter.
 */

import type { ChatContentPart, ChatMessage, ChatRequest } from './types.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful AI assistant. Provide accurate and well-structured responses.';

export function partsText(parts: readonly ChatContentPart[]): string {
  return parts
    .map((part) => (part.type === 'text' ? part.text : ''))
    .join(' ');
}

export function messageText(message: ChatMessage): string {
  return typeof message.content === 'string' ? message.content : partsText(message.content);
}

/**
 * True when any user message mentions one of `words` (case-insensitive).
 */
export function promptMentions(request: ChatRequest, words: readonly string[]): boolean {
  const text = request.messages
    .filter((m) => m.role === 'user')
    .map(messageText)
    .join('\n')
    .toLowerCase();
  return words.some((word) => text.includes(word));
}

/**
 * Prepend a system message unless the conversation already starts with one.
 */
export function withSystemPrompt(messages: ChatMessage[], prompt = DEFAULT_SYSTEM_PROMPT): ChatMessage[] {
  const first = messages[0];
  if (!first || first.role === 'system') {
    return messages;
  }
  return [{ role: 'system', content: prompt }, ...messages];
}

export function trimBaseURL(baseURL: string): string {
  return baseURL.replace(/\/+$/, '');
}

/**
 * Read a non-negative integer header. Absent or unparsable values stay absent.
 */
export function readIntHeader(headers: Headers, name: string): number | undefined {
  const raw = headers.get(name)?.trim();
  if (!raw || !/^\d+$/.test(raw)) {
    return undefined;
  }
  return Number.parseInt(raw, 10);
}
