import type { PackageRecord, Repository } from "./types.js";

/**
 * Index records by name. When two records share a name the later one wins.
 */
export function createRepository(
  records: Iterable<PackageRecord>,
): Repository {
  const repository: Repository = new Map();

  for (const record of records) {
    repository.set(record.name, record);
  }

  return repository;
}
