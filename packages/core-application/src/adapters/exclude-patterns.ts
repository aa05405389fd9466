export type ExcludeMatcher = (relativePath: string, isDirectory: boolean) => boolean;

type CompiledPattern = {
  regex: RegExp;
  directoryOnly: boolean;
  anchored: boolean;
  /** Pattern has a slash (other than a trailing one), so it is matched against paths, not names. */
  matchesPath: boolean;
};

function globToRegexSource(glob: string): string {
  let out = "";
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === "*") {
      if (glob[i + 1] === "*") {
        out += ".*";
        i++;
      } else {
        out += "[^/]*";
      }
    } else if (ch === "?") {
      out += "[^/]";
    } else {
      out += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return out;
}

function compile(pattern: string): CompiledPattern | null {
  let p = pattern.trim();
  if (p.length === 0) return null;

  const directoryOnly = p.endsWith("/");
  if (directoryOnly) p = p.replace(/\/+$/, "");

  const anchored = p.startsWith("/");
  if (anchored) p = p.replace(/^\/+/, "");
  if (p.length === 0) return null;

  return {
    regex: new RegExp(`^${globToRegexSource(p)}$`),
    directoryOnly,
    anchored,
    matchesPath: p.includes("/") || p.includes("**"),
  };
}

function matches(compiled: CompiledPattern, relativePath: string): boolean {
  if (compiled.anchored) return compiled.regex.test(relativePath);

  const segments = relativePath.split("/");
  if (!compiled.matchesPath) {
    return compiled.regex.test(segments[segments.length - 1] ?? "");
  }

  // unanchored path patterns may match any trailing run of segments
  for (let start = 0; start < segments.length; start++) {
    if (compiled.regex.test(segments.slice(start).join("/"))) return true;
  }
  return false;
}

/**
 * Builds a matcher for rsync-style exclude patterns. Paths are relative to the
 * mirror root, posix separated, without a leading slash.
 */
export function createExcludeMatcher(patterns: readonly string[]): ExcludeMatcher {
  const compiled = patterns
    .map(compile)
    .filter((c): c is CompiledPattern => c !== null);

  return (relativePath: string, isDirectory: boolean) => {
    const rel = relativePath.replaceAll("\\", "/").replace(/^\/+/, "");
    if (rel.length === 0) return false;

    return compiled.some((c) => {
      if (c.directoryOnly && !isDirectory) return false;
      return matches(c, rel);
    });
  };
}
