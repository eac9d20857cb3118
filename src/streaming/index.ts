/**
 * Streaming response parsers.
 */

export { ChunkedJsonParser, extractJsonObject } from './chunked-json.js';
export { NdjsonParser } from './ndjson.js';
export { decodeRecord, parseStream } from './parser.js';
export type { StreamParser } from './parser.js';
