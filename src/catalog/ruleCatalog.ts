import {
  AUGMENTATION_CATEGORY,
  CATALOG_SECTIONS,
  FEAT_CATEGORY,
  ITEM_CATEGORY,
  type AugmentationClass,
  type FeatCategory,
  type ItemCategory,
} from "./categories.js";
import { MalformedCatalogError } from "./errors.js";
import { cleanCell } from "./tableStore.js";
import type { Feat, InventoryItem, Rank, Row, Skill, Tables } from "./types.js";

const INTEGER_RE = /^[+-]?\d+$/;

function field(row: Row, name: string): string {
  return (row[name] ?? "").trim();
}

// Digits past 2^53 would round silently, so those count as malformed too
function parseExactInt(raw: string): number | null {
  if (!INTEGER_RE.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : null;
}

function requireId(row: Row, section: string): number {
  const raw = field(row, "ID");
  const id = parseExactInt(raw);
  if (id === null) {
    throw new MalformedCatalogError(section, "ID", raw);
  }
  return id;
}

export function parseOptionalInt(value: string | undefined): number | null {
  return parseExactInt((value ?? "").trim());
}

function rowsOf(tables: Tables, section: string): Row[] {
  return tables.get(section) ?? [];
}

/**
 * Read-only, typed view over the parsed catalog tables.
 * Every query returns a fresh array in source order.
 */
export class RuleCatalog {
  constructor(
    readonly feats: readonly Feat[],
    readonly inventory: readonly InventoryItem[],
    readonly skills: readonly Skill[],
    readonly ranks: readonly Rank[]
  ) {}

  static fromTables(tables: Tables): RuleCatalog {
    const featSection = CATALOG_SECTIONS.feats;
    const feats = rowsOf(tables, featSection).map(
      (row): Feat =>
        Object.freeze({
          id: requireId(row, featSection),
          name: field(row, "name"),
          description: cleanCell(row.description),
          type: field(row, "type"),
          rollCode: field(row, "roll_code"),
        })
    );

    const inventorySection = CATALOG_SECTIONS.inventory;
    const inventory = rowsOf(tables, inventorySection).map(
      (row): InventoryItem =>
        Object.freeze({
          id: requireId(row, inventorySection),
          name: field(row, "name"),
          description: cleanCell(row.description),
          type: field(row, "type"),
          price: parseOptionalInt(row.price),
        })
    );

    const skillSection = CATALOG_SECTIONS.skills;
    const skills = rowsOf(tables, skillSection).map(
      (row): Skill =>
        Object.freeze({
          id: requireId(row, skillSection),
          name: field(row, "name"),
          description: cleanCell(row.description),
          rollCode: field(row, "roll_code"),
        })
    );

    const rankSection = CATALOG_SECTIONS.ranks;
    const ranks = rowsOf(tables, rankSection).map(
      (row): Rank =>
        Object.freeze({
          id: requireId(row, rankSection),
          name: field(row, "name"),
          benefit: field(row, "benefit"),
          mercenary: field(row, "mercenary"),
          xpNeeded: field(row, "xp_needed"),
        })
    );

    return new RuleCatalog(
      Object.freeze(feats),
      Object.freeze(inventory),
      Object.freeze(skills),
      Object.freeze(ranks)
    );
  }

  featsByType(type: string): Feat[] {
    return this.feats.filter((feat) => feat.type === type);
  }

  featsByTypePrefix(prefix: string): Feat[] {
    return this.feats.filter((feat) => feat.type.startsWith(prefix));
  }

  featsWithNamePrefix(type: string, prefix: string): Feat[] {
    return this.feats.filter((feat) => feat.type === type && feat.name.startsWith(prefix));
  }

  inventoryByType(type: string): InventoryItem[] {
    return this.inventory.filter((item) => item.type === type);
  }

  // Registry-keyed lookups used by the assembler

  featsIn(category: FeatCategory): Feat[] {
    return this.featsByType(FEAT_CATEGORY[category]);
  }

  augmentations(cls: AugmentationClass): Feat[] {
    return this.featsByType(AUGMENTATION_CATEGORY[cls]);
  }

  itemsIn(category: ItemCategory): InventoryItem[] {
    return this.inventoryByType(ITEM_CATEGORY[category]);
  }

  counts(): { feats: number; inventory: number; skills: number; ranks: number } {
    return {
      feats: this.feats.length,
      inventory: this.inventory.length,
      skills: this.skills.length,
      ranks: this.ranks.length,
    };
  }
}
