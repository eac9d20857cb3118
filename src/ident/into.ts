/**
 * Conversion of loosely typed identifier inputs.
 * @module ident/into
 */

import type { SemVer } from 'semver';
import { PackageIdent } from './package.js';
import { VersionIdent } from './version.js';

/**
 * Anything an operation accepts in place of a {@link PackageIdent}.
 */
export type PackageIdentInput = PackageIdent | VersionIdent | string | readonly [string, string];

/**
 * Anything an operation accepts in place of a {@link VersionIdent}.
 */
export type VersionIdentInput = VersionIdent | string | readonly [string, string, string | SemVer];

/**
 * Normalizes `input` to a package identifier.
 *
 * @throws {ThunderstoreError} `InvalidIdent` for malformed strings
 */
export function intoPackageIdent(input: PackageIdentInput): PackageIdent {
  return PackageIdent.from(input);
}

/**
 * Normalizes `input` to a version identifier.
 *
 * @throws {ThunderstoreError} `InvalidIdent` for malformed strings
 */
export function intoVersionIdent(input: VersionIdentInput): VersionIdent {
  return VersionIdent.from(input);
}
