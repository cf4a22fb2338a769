import { parseDependencyField } from "./parser.js";
import type { PackageRecord } from "./types.js";

const PACKAGE_FIELD = "Package:";
const DEPENDS_FIELD = "Depends:";

/**
 * Parse the text of a package index ("Packages" file) into records.
 * Stanzas are separated by blank lines; only the Package and Depends fields
 * are read, and folded continuation lines are joined onto Depends.
 * Never throws: unknown or malformed lines are skipped.
 */
export function parseControlFile(text: string): PackageRecord[] {
  const records: PackageRecord[] = [];

  let name: string | null = null;
  let depends: string | null = null;
  // Continuation lines only fold into Depends while it is the latest field
  let dependsOpen = false;

  const flush = () => {
    if (name !== null) {
      records.push({
        name,
        dependencies: depends !== null ? parseDependencyField(depends) : [],
      });
    }
    name = null;
    depends = null;
    dependsOpen = false;
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

    if (line.trim().length === 0) {
      flush();
      continue;
    }

    if (line.startsWith(PACKAGE_FIELD)) {
      if (name !== null) {
        flush();
      }
      name = line.substring(PACKAGE_FIELD.length).trim();
      dependsOpen = false;
    } else if (line.startsWith(DEPENDS_FIELD)) {
      depends = line.substring(DEPENDS_FIELD.length).trim();
      dependsOpen = true;
    } else if (/^\s/.test(line)) {
      if (dependsOpen && depends !== null) {
        depends += ` ${line.trim()}`;
      }
    } else {
      dependsOpen = false;
    }
  }

  flush();

  return records;
}
