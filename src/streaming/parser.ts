/**
 * Shared pieces of the streaming parsers.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ThunderstoreError } from '../error/index.js';

/**
 * Turns text chunks into validated records.
 */
export interface StreamParser<T> {
  /** Feeds a chunk and returns the records it completes. */
  feed(data: string): T[];
  /** Returns the records left when the stream ends. */
  flush(): T[];
}

/**
 * Parses one JSON record and validates it against `schema`.
 *
 * @throws {ThunderstoreError} `InvalidResponse` on malformed or unexpected JSON
 */
export function decodeRecord<T>(json: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw ThunderstoreError.invalidResponse('malformed JSON record', error);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw ThunderstoreError.invalidResponse(result.error.message, result.error);
  }
  return result.data;
}

/**
 * Reads `body` to the end, yielding records as `parser` completes them.
 *
 * The body is cancelled if iteration stops early. A read that fails after
 * the headers arrived is reported as `ConnectionFailed` for `url`.
 */
export async function* parseStream<T>(
  body: ReadableStream<Uint8Array>,
  parser: StreamParser<T>,
  url: string
): AsyncGenerator<T, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let done = false;

  try {
    while (true) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await reader.read();
      } catch (error) {
        // an errored stream needs no cancel
        done = true;
        throw error instanceof ThunderstoreError
          ? error
          : ThunderstoreError.connectionFailed(url, error);
      }
      if (chunk.done) {
        done = true;
        break;
      }
      yield* parser.feed(decoder.decode(chunk.value, { stream: true }));
    }

    yield* parser.feed(decoder.decode());
    yield* parser.flush();
  } finally {
    if (!done) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
