import type { Repository } from "./types.js";

/**
 * Check if a package name is excluded by the filter substring.
 * An empty filter excludes nothing.
 */
export function matchesFilter(packageName: string, filter: string): boolean {
  return filter.length > 0 && packageName.includes(filter);
}

/**
 * Check if a package is listed in the repository
 */
export function packageExists(
  repository: Repository,
  packageName: string,
): boolean {
  return repository.has(packageName);
}

/**
 * Names listed as dependencies somewhere in the repository but never defined
 */
export function findMissingPackages(repository: Repository): string[] {
  const missing = new Set<string>();

  for (const record of repository.values()) {
    for (const dependency of record.dependencies) {
      if (!repository.has(dependency)) {
        missing.add(dependency);
      }
    }
  }

  return [...missing];
}
