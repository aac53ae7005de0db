/**
 * @module @llmverify/core/sse
 * Server-sent-event reading shared by the provider adapters.
 *
 * @example
 * ```typescript
 * for await (const chunk of parseDataStream(body, decodeChunk, { finishOnEof: false })) {
 *   if (chunk.finish) break;
 *   process.stdout.write(chunk.content);
 * }
 * ```
 */

import type { StreamingChunk } from './types.js';

/**
 * One `data:` line, with the most recent `event:` name seen in the same block.
 */
export interface SseEvent {
  event?: string;
  data: string;
}

/**
 * What an adapter makes of one decoded `data:` payload.
 */
export type DecodedEvent =
  | { type: 'content'; content: string }
  | { type: 'finish'; content?: string }
  | { type: 'error'; message: string; terminal?: boolean }
  | { type: 'ignore' };

export type EventDecoder = (payload: unknown, event: string | undefined) => DecodedEvent;

export interface ParseDataStreamOptions {
  /** Emit a final `finish: true` chunk when the body ends without a terminal marker */
  finishOnEof: boolean;
}

const DONE_MARKER = '[DONE]';

/**
 * Read a byte stream line by line and yield its `data:` events.
 *
 * The reader is cancelled in `finally`, so a consumer that stops iterating
 * early releases the underlying connection.
 */
export async function* readSseEvents(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<SseEvent, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let event: string | undefined;
  let drained = false;

  const handleLine = (rawLine: string): SseEvent | undefined => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line === '') {
      event = undefined;
      return undefined;
    }
    if (line.startsWith('event:')) {
      event = line.slice('event:'.length).trim();
      return undefined;
    }
    if (line.startsWith('data:')) {
      const data = line.slice('data:'.length).trim();
      return event === undefined ? { data } : { event, data };
    }
    // comments (":keep-alive"), id:, retry:
    return undefined;
  };

  try {
    for (;;) {
      // eslint-disable-next-line no-await-in-loop -- sequential stream reads
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const sse = handleLine(buffer.slice(0, newline));
        buffer = buffer.slice(newline + 1);
        if (sse) {
          yield sse;
        }
        newline = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      const sse = handleLine(buffer);
      if (sse) {
        yield sse;
      }
    }
  } finally {
    if (!drained) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Turn a `data:` event stream into StreamingChunks.
 *
 * `data: [DONE]` ends the sequence with one finish chunk. A payload that is
 * not valid JSON yields an error chunk and parsing continues.
 */
export async function* parseDataStream(
  body: ReadableStream<Uint8Array>,
  decode: EventDecoder,
  options: ParseDataStreamOptions,
): AsyncGenerator<StreamingChunk, void, undefined> {
  for await (const { event, data } of readSseEvents(body)) {
    if (data === DONE_MARKER) {
      yield { content: '', finish: true };
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      yield { content: '', finish: false, error: `malformed chunk: ${reason}` };
      continue;
    }

    const decoded = decode(payload, event);
    switch (decoded.type) {
      case 'content':
        if (decoded.content.length > 0) {
          yield { content: decoded.content, finish: false };
        }
        break;
      case 'finish':
        yield { content: decoded.content ?? '', finish: true };
        return;
      case 'error':
        yield { content: '', finish: false, error: decoded.message };
        if (decoded.terminal) {
          return;
        }
        break;
      case 'ignore':
        break;
    }
  }

  if (options.finishOnEof) {
    yield { content: '', finish: true };
  }
}

/**
 * Build a ReadableStream from text pieces. Used by tests and by callers that
 * already hold a full response body.
 */
export function textStream(pieces: readonly string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const piece = pieces[index];
      index += 1;
      if (piece === undefined) {
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(piece));
    },
  });
}
