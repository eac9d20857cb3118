/**
 * Package version identifier.
 * @module ident/version
 */

import semver from 'semver';
import type { SemVer } from 'semver';
import { ThunderstoreError } from '../error/index.js';
import { PackageIdent } from './package.js';
import { IdentPath } from './path.js';
import { DELIMITER, compareText, delimiterOffsets, hashText } from './text.js';

/**
 * Identifies one version of a package as `namespace-name-version`.
 *
 * Only the first two dashes are structural: `NS-Name-1.0.0-beta` has the
 * version `1.0.0-beta`.
 */
export class VersionIdent {
  private readonly text: string;
  private readonly nameOffset: number;
  private readonly versionOffset: number;

  constructor(namespace: string, name: string, version: string) {
    this.text = `${namespace}${DELIMITER}${name}${DELIMITER}${version}`;
    this.nameOffset = namespace.length + 1;
    this.versionOffset = this.nameOffset + name.length + 1;
  }

  /**
   * Parses `namespace-name-version`.
   *
   * @throws {ThunderstoreError} `InvalidIdent` when there are fewer than two `-`
   */
  static parse(text: string): VersionIdent {
    const offsets = delimiterOffsets(text, 2);
    if (!offsets) {
      throw ThunderstoreError.invalidIdent(text, 'expected namespace-name-version');
    }
    const [nameOffset, versionOffset] = offsets;
    return new VersionIdent(
      text.slice(0, nameOffset - 1),
      text.slice(nameOffset, versionOffset - 1),
      text.slice(versionOffset)
    );
  }

  static tryParse(text: string): VersionIdent | undefined {
    return delimiterOffsets(text, 2) ? VersionIdent.parse(text) : undefined;
  }

  /**
   * Converts any accepted input shape into a version identifier.
   */
  static from(input: VersionIdent | string | readonly [string, string, string | SemVer]): VersionIdent {
    if (input instanceof VersionIdent) {
      return input;
    }
    if (typeof input === 'string') {
      return VersionIdent.parse(input);
    }
    const [namespace, name, version] = input;
    return new VersionIdent(
      namespace,
      name,
      typeof version === 'string' ? version : version.version
    );
  }

  static fromJSON(value: unknown): VersionIdent {
    if (typeof value !== 'string') {
      throw ThunderstoreError.invalidIdent(String(value), 'expected a string');
    }
    return VersionIdent.parse(value);
  }

  get namespace(): string {
    return this.text.slice(0, this.nameOffset - 1);
  }

  get name(): string {
    return this.text.slice(this.nameOffset, this.versionOffset - 1);
  }

  get version(): string {
    return this.text.slice(this.versionOffset);
  }

  /**
   * Parses the version component as a semantic version.
   *
   * @throws {ThunderstoreError} `InvalidVersion` when it is not valid semver
   */
  parsedVersion(): SemVer {
    const parsed = this.tryParsedVersion();
    if (!parsed) {
      throw ThunderstoreError.invalidVersion(this.version);
    }
    return parsed;
  }

  tryParsedVersion(): SemVer | null {
    return semver.parse(this.version);
  }

  /**
   * The package this version belongs to.
   */
  packageId(): PackageIdent {
    return new PackageIdent(this.namespace, this.name);
  }

  /**
   * Whether this version belongs to `pkg`.
   */
  eqPackage(pkg: PackageIdent): boolean {
    return this.namespace === pkg.namespace && this.name === pkg.name;
  }

  /**
   * `namespace/name/version`, rendered when formatted.
   */
  path(): IdentPath {
    return new IdentPath([this.namespace, this.name, this.version]);
  }

  equals(other: VersionIdent): boolean {
    return this.text === other.text;
  }

  compare(other: VersionIdent): number {
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
