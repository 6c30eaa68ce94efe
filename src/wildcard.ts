const compiled = new Map<string, RegExp>();

function toRegExp(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  let source = "";
  for (const char of pattern) {
    if (char === "*") source += ".*";
    else if (char === "?") source += ".";
    else source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  }

  const regex = new RegExp(`^${source}$`, "is");
  compiled.set(pattern, regex);
  return regex;
}

/** Case-insensitive glob match: `*` is any run of characters, `?` exactly one. */
export function matchesWildcard(value: string, pattern: string): boolean {
  return toRegExp(pattern).test(value);
}

export function matchesAnyWildcard(value: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) return true;
  return patterns.some((pattern) => matchesWildcard(value, pattern));
}

export function parsePatternList(raw: string | boolean | undefined): string[] {
  if (typeof raw !== "string") return [];
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
