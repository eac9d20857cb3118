/**
 * Type definitions for the Thunderstore API.
 * @module types
 */

export * from './ident.js';
export * from './package.js';
export * from './community.js';
export * from './usermedia.js';
export * from './submission.js';
export * from './wiki.js';
