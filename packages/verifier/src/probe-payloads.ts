/**
 * @module @llmverify/verifier/probe-payloads
 * Minimal prompts sent when a probe request carries no payload.
 */

import type { ChatRequest, ProbeKind } from '@llmverify/core';

/** 1×1 PNG used by the vision probe */
export const PROBE_IMAGE_PNG =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8DwHwAFBQIAX8jx0gAAAABJRU5ErkJggg==';

export const WEATHER_TOOL = {
  name: 'get_weather',
  description: 'Get the current weather for a city',
  parameters: {
    type: 'object',
    properties: { city: { type: 'string' } },
    required: ['city'],
  },
};

export function defaultPayload(kind: ProbeKind): ChatRequest {
  switch (kind) {
    case 'existence':
    case 'transport':
      return { messages: [] };
    case 'responsiveness':
    case 'streaming':
      return { messages: [{ role: 'user', content: 'Reply with the single word: pong' }], maxTokens: 16 };
    case 'function_calling':
      return {
        messages: [{ role: 'user', content: 'What is the weather in Paris? Use the get_weather tool.' }],
        tools: [WEATHER_TOOL],
        maxTokens: 64,
      };
    case 'vision':
      return {
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: 'Describe this image in one word.' },
              { type: 'image', mediaType: 'image/png', data: PROBE_IMAGE_PNG },
            ],
          },
        ],
        maxTokens: 16,
      };
    case 'embeddings':
      return { messages: [{ role: 'user', content: 'verification probe' }] };
  }
}
