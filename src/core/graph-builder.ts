import type { DependencyGraph, Repository } from "./types.js";
import { PACKAGE_NOT_FOUND } from "./types.js";
import { matchesFilter } from "./utils.js";

/**
 * Build the dependency graph reachable from a root package.
 *
 * Breadth-first: every reachable name is expanded at most once, so a package
 * shared by several dependents gets a single entry. Names containing `filter`
 * are never expanded. They still show up in their dependents' lists, since an
 * entry always holds the package's full dependency list. Names missing from
 * the repository map to `[PACKAGE_NOT_FOUND]`.
 */
export function buildDependencyGraph(
  root: string,
  repository: Repository,
  filter = "",
): DependencyGraph {
  const graph: DependencyGraph = new Map();
  const visited = new Set<string>([root]);
  const queue: string[] = [root];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined || matchesFilter(current, filter)) {
      continue;
    }

    const record = repository.get(current);
    if (!record) {
      graph.set(current, [PACKAGE_NOT_FOUND]);
      continue;
    }

    graph.set(current, record.dependencies);

    for (const dependency of record.dependencies) {
      if (matchesFilter(dependency, filter) || visited.has(dependency)) {
        continue;
      }
      visited.add(dependency);
      queue.push(dependency);
    }
  }

  return graph;
}
