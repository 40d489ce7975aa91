type IgnoreRule = { regex: RegExp; negated: boolean };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function globToRegexSource(pattern: string): string {
  let out = "";
  let i = 0;
  while (i < pattern.length) {
    if (pattern.startsWith("**/", i)) {
      out += "(?:.*/)?";
      i += 3;
    } else if (pattern.startsWith("**", i)) {
      out += ".*";
      i += 2;
    } else if (pattern[i] === "*") {
      out += "[^/]*";
      i += 1;
    } else if (pattern[i] === "?") {
      out += "[^/]";
      i += 1;
    } else {
      out += escapeRegExp(pattern[i]);
      i += 1;
    }
  }
  return out;
}

function compileRule(raw: string): IgnoreRule | null {
  const negated = raw.startsWith("!");
  const pattern = (negated ? raw.slice(1) : raw)
    .replace(/\\/g, "/")
    .replace(/^\.\/+/, "")
    .replace(/\/+$/, "");
  if (!pattern) return null;

  // `dir/**` also matches `dir` itself.
  const regex = pattern.endsWith("/**")
    ? new RegExp(`^${globToRegexSource(pattern.slice(0, -3))}(?:/.*)?$`)
    : new RegExp(`^${globToRegexSource(pattern)}$`);
  return { regex, negated };
}

/**
 * Builds a matcher over POSIX paths relative to the working directory.
 * Patterns are applied in order and the last one that matches decides, so
 * `!docs/generated/keep.md` can re-include a file under an ignored glob.
 */
export function buildIgnoreMatcher(
  patterns: string[],
): (relPath: string) => boolean {
  const rules = patterns
    .map((pattern) => compileRule(pattern.trim()))
    .filter((rule): rule is IgnoreRule => rule !== null);
  if (rules.length === 0) return () => false;

  return (relPath: string): boolean => {
    const normalized = relPath.replace(/\\/g, "/");
    let ignored = false;
    for (const rule of rules) {
      if (rule.regex.test(normalized)) ignored = !rule.negated;
    }
    return ignored;
  };
}
