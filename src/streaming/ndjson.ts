/**
 * Incremental parser for newline-delimited JSON.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { StreamParser } from './parser.js';
import { decodeRecord } from './parser.js';

/**
 * Parser for one JSON record per line. Blank lines are skipped and the
 * last record may lack its trailing newline.
 */
export class NdjsonParser<T> implements StreamParser<T> {
  private buffer = '';

  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  feed(data: string): T[] {
    this.buffer += data;
    const results: T[] = [];

    let start = 0;
    let newline = this.buffer.indexOf('\n', start);
    while (newline !== -1) {
      this.pushLine(this.buffer.slice(start, newline), results);
      start = newline + 1;
      newline = this.buffer.indexOf('\n', start);
    }
    this.buffer = this.buffer.slice(start);

    return results;
  }

  flush(): T[] {
    const results: T[] = [];
    const line = this.buffer;
    this.buffer = '';
    this.pushLine(line, results);
    return results;
  }

  reset(): void {
    this.buffer = '';
  }

  private pushLine(line: string, results: T[]): void {
    const trimmed = line.trim();
    if (trimmed.length > 0) {
      results.push(decodeRecord(trimmed, this.schema));
    }
  }
}
