import { parseControlFile } from "../core/control-file.js";
import { createRepository } from "../core/repository.js";
import { buildDependencyGraph } from "../core/graph-builder.js";
import {
  renderTree,
  formatGraphAsJson,
  formatGraphAsYaml,
} from "../core/formatter.js";
import {
  packageExists as checkPackageExists,
  findMissingPackages,
} from "../core/utils.js";
import type {
  DependencyGraph,
  PackageRecord,
  Repository,
} from "../core/types.js";

export type OutputFormat = "tree" | "json" | "yaml";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["tree", "json", "yaml"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface VisualizeInput {
  rootPackageName: string;
  filterSubstring: string;
  rawControlText: string;
}

export class TreeUsecase {
  private repository: Repository;

  constructor(records: Iterable<PackageRecord>) {
    this.repository = createRepository(records);
  }

  static fromControlText(text: string): TreeUsecase {
    return new TreeUsecase(parseControlFile(text));
  }

  get packageCount(): number {
    return this.repository.size;
  }

  /**
   * Check if a package is defined in the index
   */
  packageExists(packageName: string): boolean {
    return checkPackageExists(this.repository, packageName);
  }

  /**
   * Names referenced as dependencies but not defined in the index
   */
  missingPackages(): string[] {
    return findMissingPackages(this.repository);
  }

  buildGraph(root: string, filter = ""): DependencyGraph {
    return buildDependencyGraph(root, this.repository, filter);
  }

  /**
   * Build the graph for `root` and format it
   */
  render(
    root: string,
    filter = "",
    format: OutputFormat = "tree",
    useColor = true,
  ): string {
    const graph = this.buildGraph(root, filter);

    switch (format) {
      case "json":
        return formatGraphAsJson(graph);
      case "yaml":
        return formatGraphAsYaml(graph);
      case "tree":
      default:
        return renderTree(root, graph, useColor).join("\n");
    }
  }
}

/**
 * Parse, traverse and render in one go. Performs no I/O.
 */
export function visualizeDependencies(input: VisualizeInput): string[] {
  const usecase = TreeUsecase.fromControlText(input.rawControlText);
  const graph = usecase.buildGraph(input.rootPackageName, input.filterSubstring);
  return renderTree(input.rootPackageName, graph, false);
}
