import type { Feat, InventoryItem, Skill } from "../catalog/types.js";
import { collapseWhitespace, normalizeText, PLACEHOLDER } from "../utils/text.js";

const EMPTY_MARKERS = new Set(["", "-", PLACEHOLDER]);

// Feats named "Таблица …" are table headers, not names worth repeating
const GENERIC_NAME_PREFIX = "таблица";

/**
 * "12500" -> "¥12 500"
 */
export function formatPrice(price: number): string {
  const sign = price < 0 ? "-" : "";
  const grouped = String(Math.abs(Math.trunc(price))).replace(/\B(?=(\d{3})+(?!\d))/g, " ");
  return `¥${sign}${grouped}`;
}

export function describeFeat(feat: Feat | null): string {
  if (!feat) return PLACEHOLDER;

  let description = collapseWhitespace(feat.description);
  if (EMPTY_MARKERS.has(description)) description = "";
  const name = collapseWhitespace(feat.name);

  if (!description) return normalizeText(name);
  if (!name || name.toLowerCase().startsWith(GENERIC_NAME_PREFIX)) return normalizeText(description);
  if (description.toLowerCase().startsWith(name.toLowerCase())) return normalizeText(description);
  return normalizeText(`${name} — ${description}`);
}

export function describeItem(item: InventoryItem | null): string {
  if (!item) return PLACEHOLDER;

  const parts = [normalizeText(item.name)];
  const description = collapseWhitespace(item.description);
  if (!EMPTY_MARKERS.has(description)) parts.push(description);
  if (item.price !== null) parts.push(formatPrice(item.price));
  return normalizeText(parts.join(" — "));
}

export function describeSkill(skill: Skill): string {
  const name = normalizeText(skill.name);
  const description = normalizeText(skill.description);
  if (description === PLACEHOLDER) return name;
  if (description.toLowerCase().startsWith(name.toLowerCase())) return description;
  return `${name} — ${description}`;
}
