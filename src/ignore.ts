// src/ignore.ts
import ignore from "ignore";

export type Ignorer = {
  ignoresFile: (name: string) => boolean;
};

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

/** commander collector: repeatable and comma-separated. */
export function collectIgnoreOption(
  value: string,
  previous: string[] = [],
): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

/**
 * gitignore-style matcher over entry names of the (flat) input directory.
 */
export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return { ignoresFile: () => false };
  }
  const ig = ignore().add(cleaned);
  return {
    ignoresFile: (name) => ig.ignores(name),
  };
}

export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}
