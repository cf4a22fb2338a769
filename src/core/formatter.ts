import chalk from "chalk";
import yaml from "js-yaml";
import type { DependencyGraph } from "./types.js";
import { CYCLIC_DEPENDENCY, PACKAGE_NOT_FOUND } from "./types.js";

const BRANCH = "└── ";
const INDENT = "    ";

/**
 * Prefix for a node at the given depth: one indent per ancestor level
 * except the last, which gets the branch connector
 */
export function indentFor(depth: number): string {
  if (depth <= 0) {
    return "";
  }
  return INDENT.repeat(depth - 1) + BRANCH;
}

/**
 * Render the graph as an indented tree, depth-first in pre-order.
 *
 * A package reachable through several dependents is printed under each of
 * them. A package that shows up again among its own ancestors is printed
 * once more with a `(cyclic dependency)` line below it and not descended into.
 */
export function renderTree(
  root: string,
  graph: DependencyGraph,
  useColor = true,
): string[] {
  const lines: string[] = [];
  const ancestors = new Set<string>();

  const rootColor = useColor ? chalk.cyan : (s: string) => s;
  const missingColor = useColor ? chalk.red : (s: string) => s;
  const cycleColor = useColor ? chalk.yellow : (s: string) => s;

  const label = (name: string, depth: number): string => {
    if (depth === 0) return rootColor(name);
    if (name === PACKAGE_NOT_FOUND) return missingColor(name);
    return name;
  };

  const emit = (name: string, depth: number): void => {
    lines.push(indentFor(depth) + label(name, depth));

    if (ancestors.has(name)) {
      lines.push(indentFor(depth + 1) + cycleColor(CYCLIC_DEPENDENCY));
      return;
    }

    ancestors.add(name);
    for (const dependency of graph.get(name) ?? []) {
      emit(dependency, depth + 1);
    }
    ancestors.delete(name);
  };

  emit(root, 0);

  return lines;
}

export function formatGraphAsJson(graph: DependencyGraph): string {
  return JSON.stringify(Object.fromEntries(graph), null, 2);
}

export function formatGraphAsYaml(graph: DependencyGraph): string {
  return yaml.dump(Object.fromEntries(graph), { lineWidth: -1 });
}
