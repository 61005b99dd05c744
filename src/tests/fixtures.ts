import { CATALOG_SECTIONS } from "../catalog/categories.js";
import { parseCatalog } from "../catalog/catalogRepository.js";
import type { RuleCatalog } from "../catalog/ruleCatalog.js";
import type { RandomSource } from "../generator/random.js";

export type FeatRow = { name: string; type: string; description?: string };
export type ItemRow = { name: string; type: string; description?: string; price?: string };
export type SkillRow = { name: string; description?: string };
export type RankRow = { id: number; name: string; benefit?: string; xp?: string };

export type CatalogFixture = {
  feats?: FeatRow[];
  items?: ItemRow[];
  skills?: SkillRow[];
  ranks?: RankRow[];
};

/** Minimal feats for every mandatory sheet field. */
export const MANDATORY_FEATS: FeatRow[] = [
  { name: "Кэндзи", type: "Мужские имена", description: "Второй сын" },
  { name: "Юки", type: "Женские имена", description: "Снег" },
  { name: "Инфильтратор", type: "Концепт" },
  { name: "Дитя улиц", type: "Предыстория", description: "Вырос среди неона" },
  { name: "Месть", type: "Мотивация", description: "Кто-то должен заплатить" },
  { name: "Плащ", type: "Одежда", description: "Длинный и потёртый" },
];

function table(header: string[], rows: string[][]): string {
  return [
    `| ${header.join(" | ")} |`,
    `|${header.map(() => "---").join("|")}|`,
    ...rows.map((row) => `| ${row.join(" | ")} |`),
  ].join("\n");
}

export function catalogMarkdown(fixture: CatalogFixture): string {
  const feats = (fixture.feats ?? []).map((f, i) => [String(i + 1), f.name, f.description ?? "", f.type, ""]);
  const items = (fixture.items ?? []).map((it, i) => [
    String(i + 1),
    it.name,
    it.description ?? "",
    it.type,
    it.price ?? "",
  ]);
  const skills = (fixture.skills ?? []).map((s, i) => [String(i + 1), s.name, s.description ?? "", ""]);
  const ranks = (fixture.ranks ?? []).map((r) => [String(r.id), r.name, r.benefit ?? "", "", r.xp ?? ""]);

  return [
    `## ${CATALOG_SECTIONS.feats}`,
    table(["ID", "name", "description", "type", "roll_code"], feats),
    "",
    `## ${CATALOG_SECTIONS.inventory}`,
    table(["ID", "name", "description", "type", "price"], items),
    "",
    `## ${CATALOG_SECTIONS.skills}`,
    table(["ID", "name", "description", "roll_code"], skills),
    "",
    `## ${CATALOG_SECTIONS.ranks}`,
    table(["ID", "name", "benefit", "mercenary", "xp_needed"], ranks),
    "",
  ].join("\n");
}

export function buildCatalog(fixture: CatalogFixture): RuleCatalog {
  return parseCatalog(catalogMarkdown(fixture), "fixture");
}

export function constantRandom(value: number): RandomSource {
  return () => value;
}
