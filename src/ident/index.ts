/**
 * Package and version identifiers.
 * @module ident
 */

export { PackageIdent } from './package.js';
export { VersionIdent } from './version.js';
export { IdentPath } from './path.js';
export { intoPackageIdent, intoVersionIdent } from './into.js';
export type { PackageIdentInput, VersionIdentInput } from './into.js';
