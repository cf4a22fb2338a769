/**
 * Parse a Depends field into dependency names
 * @param field - Folded field value like "libc6 (>= 2.34), debconf | debconf-2.0"
 * @returns Names in first-seen order, without version constraints or duplicates
 */
export function parseDependencyField(field: string): string[] {
  const result: string[] = [];
  const normalized = field.replace(/\s+/g, " ").trim();

  if (normalized.length === 0) {
    return result;
  }

  const add = (name: string) => {
    if (name.length > 0 && !result.includes(name)) {
      result.push(name);
    }
  };

  for (const term of normalized.split(",")) {
    // Drop version constraints like "(>= 1.0)"
    const stripped = term.replace(/\(.*?\)/g, "").trim();

    if (stripped.includes("|")) {
      // Keep every alternative, no resolution happens here
      stripped.split("|").forEach((alternative) => add(alternative.trim()));
    } else {
      add(stripped);
    }
  }

  return result;
}
