export const PLACEHOLDER = "—";

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Collapse internal whitespace; null or blank input becomes `fallback`.
 */
export function normalizeText(text: string | null | undefined, fallback = PLACEHOLDER): string {
  if (text == null) return fallback;
  return collapseWhitespace(text) || fallback;
}
