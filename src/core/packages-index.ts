import fs from "fs";

export interface IndexSource {
  /** Path to a Packages file, or a repository URL */
  repo?: string;
  /** Read `repo` from disk instead of fetching it */
  local?: boolean;
}

// Cache for loaded index texts
const indexCache = new Map<string, string>();

/**
 * Resolve where the index text lives
 * @returns The file path for local sources, the full Packages URL otherwise
 */
export function resolveIndexLocation(repo: string, local: boolean): string {
  if (local) {
    return repo;
  }

  const location = repo.endsWith("Packages")
    ? repo
    : `${repo.replace(/\/+$/, "")}/Packages`;

  let url: URL;
  try {
    url = new URL(location);
  } catch {
    throw new Error(`Invalid repository URL: ${repo}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`Invalid repository URL: ${repo}`);
  }

  return url.toString();
}

async function fetchIndex(url: string): Promise<string> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(
      `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
    );
  }
  return response.text();
}

/**
 * Load the raw text of a package index
 * @param source - Falls back to a local file named by APT_REPO_PATH
 */
export async function loadPackagesIndex(source: IndexSource): Promise<string> {
  const fromEnv = !source.repo;
  const repo = source.repo || process.env.APT_REPO_PATH;
  if (!repo) {
    throw new Error(
      "No package index given: pass --repo or set APT_REPO_PATH",
    );
  }

  const local = fromEnv || source.local === true;
  const location = resolveIndexLocation(repo, local);

  const cached = indexCache.get(location);
  if (cached !== undefined) {
    return cached;
  }

  if (local && !fs.existsSync(location)) {
    throw new Error(`Package index not found at ${location}`);
  }

  try {
    const text = local
      ? fs.readFileSync(location, "utf8")
      : await fetchIndex(location);

    indexCache.set(location, text);

    return text;
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Failed to load package index at ${location}: ${error.message}`,
      );
    }
    throw error;
  }
}

/**
 * Clear the package index cache
 */
export function clearPackagesIndexCache(): void {
  indexCache.clear();
}
