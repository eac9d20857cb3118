/**
 * Local file access for downloads, uploads and profiles.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ThunderstoreError } from '../error/index.js';

/**
 * Reads a whole file.
 *
 * @throws {ThunderstoreError} `Io` when the file cannot be read
 */
export async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    throw ThunderstoreError.io(path, error);
  }
}

/**
 * Writes `data` to `path`, creating missing parent directories.
 *
 * @throws {ThunderstoreError} `Io` when the file cannot be written
 */
export async function writeBytes(path: string, data: Uint8Array): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  } catch (error) {
    throw ThunderstoreError.io(path, error);
  }
}
