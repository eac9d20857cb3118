/**
 * URL-path projection of an identifier.
 * @module ident/path
 */

/**
 * The `namespace/name[/version]` rendering of an identifier.
 *
 * Holds the components and only joins them when formatted. There is no
 * parser back from a path.
 */
export class IdentPath {
  private readonly segments: readonly string[];

  constructor(segments: readonly string[]) {
    this.segments = segments;
  }

  /**
   * Joins the components with `/`.
   */
  toString(): string {
    return this.segments.join('/');
  }
}
