/**
 * Specification data model for dockspec.
 *
 * A specification is loaded once per composition request and is immutable
 * after loading.
 */

/** Placeholder keys found in a specification's fragments. */
export interface PlaceholderSets {
  /** Resolved from configuration or declared defaults. */
  plain: ReadonlySet<string>;
  /** Resolved by the credential injector (CREDENTIAL_ prefix). */
  secret: ReadonlySet<string>;
}

/** A named, located bundle of Dockerfile fragments. */
export interface Specification {
  readonly name: string;
  /** Directory in which the bundle was found. */
  readonly location: string;
  /** Absolute path of the bundle file. */
  readonly file: string;
  readonly description?: string;
  readonly fragments: readonly string[];
  /** Names composed before this specification's own fragments. */
  readonly includes: readonly string[];
  /** Plain placeholder defaults declared with `#@ default KEY=value`. */
  readonly defaults: ReadonlyMap<string, string>;
  readonly placeholders: PlaceholderSets;
}

/** Entry of a search-path listing. */
export interface SpecSummary {
  name: string;
  location: string;
  description?: string;
  /** True when an earlier search-path directory holds the same name. */
  shadowed: boolean;
}
