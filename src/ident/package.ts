/**
 * Package identifier.
 * @module ident/package
 */

import type { SemVer } from 'semver';
import { ThunderstoreError } from '../error/index.js';
import { IdentPath } from './path.js';
import { DELIMITER, compareText, delimiterOffsets, hashText } from './text.js';
import { VersionIdent } from './version.js';

/**
 * Identifies a package as `namespace-name`.
 *
 * Stored as the canonical text plus the offset where the name starts, so
 * the component accessors are plain slices.
 *
 * @example
 * ```typescript
 * const id = PackageIdent.parse('BepInEx-BepInExPack');
 * id.namespace; // 'BepInEx'
 * id.path().toString(); // 'BepInEx/BepInExPack'
 * ```
 */
export class PackageIdent {
  private readonly text: string;
  private readonly nameOffset: number;

  /**
   * Joins the components with `-`. The components are not validated.
   */
  constructor(namespace: string, name: string) {
    this.text = `${namespace}${DELIMITER}${name}`;
    this.nameOffset = namespace.length + 1;
  }

  /**
   * Parses `namespace-name`, splitting at the first `-`.
   *
   * @throws {ThunderstoreError} `InvalidIdent` when there is no `-`
   */
  static parse(text: string): PackageIdent {
    const offsets = delimiterOffsets(text, 1);
    if (!offsets) {
      throw ThunderstoreError.invalidIdent(text, 'expected namespace-name');
    }
    const [nameOffset] = offsets;
    return new PackageIdent(text.slice(0, nameOffset - 1), text.slice(nameOffset));
  }

  /**
   * Like {@link PackageIdent.parse}, returning `undefined` on malformed text.
   */
  static tryParse(text: string): PackageIdent | undefined {
    return delimiterOffsets(text, 1) ? PackageIdent.parse(text) : undefined;
  }

  /**
   * Converts any accepted input shape into a package identifier.
   *
   * An existing `PackageIdent` is returned as-is and a `VersionIdent`
   * yields its package.
   */
  static from(input: PackageIdent | VersionIdent | string | readonly [string, string]): PackageIdent {
    if (input instanceof PackageIdent) {
      return input;
    }
    if (input instanceof VersionIdent) {
      return input.packageId();
    }
    if (typeof input === 'string') {
      return PackageIdent.parse(input);
    }
    const [namespace, name] = input;
    return new PackageIdent(namespace, name);
  }

  /**
   * Restores an identifier from its JSON form.
   */
  static fromJSON(value: unknown): PackageIdent {
    if (typeof value !== 'string') {
      throw ThunderstoreError.invalidIdent(String(value), 'expected a string');
    }
    return PackageIdent.parse(value);
  }

  get namespace(): string {
    return this.text.slice(0, this.nameOffset - 1);
  }

  get name(): string {
    return this.text.slice(this.nameOffset);
  }

  /**
   * `namespace/name`, rendered when formatted.
   */
  path(): IdentPath {
    return new IdentPath([this.namespace, this.name]);
  }

  /**
   * Appends a version to this package.
   */
  withVersion(version: string | SemVer): VersionIdent {
    const text = typeof version === 'string' ? version : version.version;
    return new VersionIdent(this.namespace, this.name, text);
  }

  equals(other: PackageIdent): boolean {
    return this.text === other.text;
  }

  compare(other: PackageIdent): number {
    return compareText(this.text, other.text);
  }

  hashCode(): number {
    return hashText(this.text);
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}
