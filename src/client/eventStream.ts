import { createParser } from 'eventsource-parser';
import type { EventSourceMessage } from 'eventsource-parser';
import { MalformedEventError } from '../types/index.js';
import type { SseEvent } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('event-stream');

/** Event name the SSE format assigns when a block carries no `event:` field */
export const DEFAULT_EVENT_NAME = 'message';

/**
 * Build an SseEvent from a parsed block, attaching the decoded JSON or a
 * MalformedEventError
 */
export function toSseEvent(message: EventSourceMessage): SseEvent {
  const event = message.event ?? DEFAULT_EVENT_NAME;
  const base = { event, data: message.data, id: message.id };

  try {
    const json: unknown = JSON.parse(message.data);
    return { ...base, json };
  } catch (error) {
    const parseError = new MalformedEventError(
      event,
      message.data,
      error instanceof Error ? error.message : String(error)
    );
    logger.debug(parseError.message);
    return { ...base, parseError };
  }
}

/**
 * Decode a text/event-stream body into events as they arrive.
 *
 * The sequence is single-use. Leaving a `for await` loop early cancels the
 * underlying body, which closes the connection.
 */
export async function* decodeEvents(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<SseEvent, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const pending: SseEvent[] = [];

  const parser = createParser({
    onEvent: (message) => {
      pending.push(toSseEvent(message));
    },
    onError: (error) => {
      logger.warn(`Discarding unparseable stream field: ${error.message}`);
    },
  });

  let finished = false;
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        // Flush any multi-byte sequence still held by the decoder
        parser.feed(decoder.decode());
        parser.reset({ consume: true });
      } else {
        parser.feed(decoder.decode(value, { stream: true }));
      }

      while (pending.length > 0) {
        const next = pending.shift();
        if (next) {
          yield next;
        }
      }

      if (done) {
        finished = true;
        return;
      }
    }
  } finally {
    if (!finished) {
      logger.debug('Event consumer stopped early, cancelling stream');
      await reader.cancel().catch((error: unknown) => {
        logger.debug('Stream cancel failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
    reader.releaseLock();
  }
}

/**
 * Pass events through up to and including the first one named `eventName`
 */
export async function* takeUntilEvent(
  source: AsyncIterable<SseEvent>,
  eventName: string = DEFAULT_EVENT_NAME
): AsyncGenerator<SseEvent, void, undefined> {
  for await (const event of source) {
    yield event;
    if (event.event === eventName) {
      return;
    }
  }
}
