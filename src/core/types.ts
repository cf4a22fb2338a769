/**
 * Shared type definitions for package records and dependency graphs
 */

/**
 * One stanza of a Debian-style package index
 */
export interface PackageRecord {
  readonly name: string;
  readonly dependencies: readonly string[];
}

/**
 * Package name -> record. Later records with the same name replace earlier ones.
 */
export type Repository = Map<string, PackageRecord>;

/**
 * Package name -> dependency names, for every package expanded during traversal
 */
export type DependencyGraph = Map<string, readonly string[]>;

/**
 * Stands in for the dependency list of a name the repository does not contain
 */
export const PACKAGE_NOT_FOUND = "(package not found)";

/**
 * Child line printed under a package that is its own ancestor
 */
export const CYCLIC_DEPENDENCY = "(cyclic dependency)";
