/**
 * Incremental parser for a top-level JSON array of objects.
 *
 * The community v1 package listing is one large array:
 * [{"name":"...","versions":[...]},
 * {"name":"...","versions":[...]}]
 *
 * Objects are yielded as soon as their closing brace arrives, so the whole
 * array never has to be held in memory.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ThunderstoreError } from '../error/index.js';
import type { StreamParser } from './parser.js';
import { decodeRecord } from './parser.js';

/**
 * Parser for a JSON array streamed in arbitrary chunks.
 *
 * @example
 * ```typescript
 * const parser = new ChunkedJsonParser(PackageV1Schema);
 *
 * parser.feed('[{"name":"Lethal');
 * // [] (incomplete object)
 *
 * parser.feed('Lib", ...}]');
 * // [{ name: 'LethalLib', ... }]
 * ```
 */
export class ChunkedJsonParser<T> implements StreamParser<T> {
  private buffer = '';
  private opened = false;
  private closed = false;

  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  /**
   * Feeds a chunk and returns every object it completes.
   */
  feed(data: string): T[] {
    this.buffer += data;
    const results: T[] = [];

    while (true) {
      const result = this.tryExtractObject();
      if (result === null) break;
      results.push(result);
    }

    return results;
  }

  private tryExtractObject(): T | null {
    this.skipWhitespaceAndDelimiters();

    if (this.closed || this.buffer.length === 0) return null;

    if (!this.opened) {
      if (!this.buffer.startsWith('[')) {
        throw ThunderstoreError.invalidResponse(
          `expected a JSON array, got '${this.buffer[0]}'`
        );
      }
      this.buffer = this.buffer.slice(1);
      this.opened = true;
      return this.tryExtractObject();
    }

    if (this.buffer.startsWith(']')) {
      this.buffer = this.buffer.slice(1);
      this.closed = true;
      return null;
    }

    if (!this.buffer.startsWith('{')) {
      throw ThunderstoreError.invalidResponse(
        `unexpected '${this.buffer[0]}' in JSON array`
      );
    }

    const extracted = extractJsonObject(this.buffer);
    if (!extracted) return null;

    const [jsonStr, remaining] = extracted;
    this.buffer = remaining;
    return decodeRecord(jsonStr, this.schema);
  }

  private skipWhitespaceAndDelimiters(): void {
    let i = 0;
    while (i < this.buffer.length) {
      const c = this.buffer[i];
      if (c === ' ' || c === '\n' || c === '\r' || c === '\t' || c === ',') {
        i++;
      } else {
        break;
      }
    }
    this.buffer = this.buffer.slice(i);
  }

  /**
   * Call when the stream ends.
   *
   * @throws {ThunderstoreError} `InvalidResponse` if the array never closed
   */
  flush(): T[] {
    const results = this.feed('');
    if (!this.closed) {
      throw ThunderstoreError.invalidResponse(
        this.buffer.length > 0
          ? 'JSON array ended inside an object'
          : 'JSON array ended before its closing bracket'
      );
    }
    if (this.buffer.length > 0) {
      throw ThunderstoreError.invalidResponse('unexpected data after JSON array');
    }
    return results;
  }

  reset(): void {
    this.buffer = '';
    this.opened = false;
    this.closed = false;
  }
}

/**
 * Splits a complete JSON object off the front of `input`.
 *
 * Tracks nesting depth, string boundaries and escapes so that braces
 * inside strings are ignored. Returns `null` while the object is incomplete.
 */
export function extractJsonObject(input: string): [string, string] | null {
  if (!input.startsWith('{')) return null;

  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }

    switch (char) {
      case '\\':
        if (inString) escapeNext = true;
        break;
      case '"':
        inString = !inString;
        break;
      case '{':
      case '[':
        if (!inString) depth++;
        break;
      case '}':
      case ']':
        if (!inString) {
          depth--;
          if (depth === 0) {
            return [input.slice(0, i + 1), input.slice(i + 1)];
          }
        }
        break;
    }
  }

  return null;
}
