// src/ai/lang/normalize.ts

/**
 * Matching normalization used by the menu matcher.
 *  - lower-cases (ASCII folding is enough here)
 *  - drops every character outside [a-z0-9 ]
 *
 * Spaces are kept as they are: "french  fries" stays with two spaces.
 * Idempotent: normalize(normalize(s)) === normalize(s).
 */
export function normalize(raw: string): string {
  if (!raw) return "";
  return String(raw).toLowerCase().replace(/[^a-z0-9 ]/g, "");
}

// Whitespace tokens of an already-normalized string
export function tokens(normalized: string): string[] {
  return normalized.split(/\s+/).filter(Boolean);
}
