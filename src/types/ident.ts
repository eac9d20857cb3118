/**
 * Zod schemas for identifier fields in response bodies.
 * @module types/ident
 */

import { z } from 'zod';
import { PackageIdent } from '../ident/package.js';
import { VersionIdent } from '../ident/version.js';

/**
 * A `namespace-name` string, parsed into a {@link PackageIdent}.
 */
export const PackageIdentSchema = z.string().transform((value, ctx) => {
  const ident = PackageIdent.tryParse(value);
  if (!ident) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid package identifier: ${value}`,
    });
    return z.NEVER;
  }
  return ident;
});

/**
 * A `namespace-name-version` string, parsed into a {@link VersionIdent}.
 */
export const VersionIdentSchema = z.string().transform((value, ctx) => {
  const ident = VersionIdent.tryParse(value);
  if (!ident) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid version identifier: ${value}`,
    });
    return z.NEVER;
  }
  return ident;
});
