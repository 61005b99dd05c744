/**
 * Category registry: symbolic keys -> the exact type labels used in DATABASE.md.
 *
 * Assembly code only ever goes through these keys, so a misspelled category is a
 * compile error instead of a silently empty pool.
 */

export const FEAT_CATEGORY = {
  maleNames: "Мужские имена",
  femaleNames: "Женские имена",
  concept: "Концепт",
  background: "Предыстория",
  motivation: "Мотивация",
  clothing: "Одежда",
  features: "Особые черты",
  problems: "Личностные проблемы",
} as const;

// Class A is spelled with the Cyrillic "А" in the catalog; B, C and D are Latin.
export const AUGMENTATION_CATEGORY = {
  A: "Аугментации класса А",
  B: "Аугментации класса B",
  C: "Аугментации класса C",
  D: "Аугментации класса D",
} as const;

export const ITEM_CATEGORY = {
  armor: "Броня",
  heavyWeapon: "Тяжелое оружие",
  lightWeapon: "Лёгкое оружие",
  meleeWeapon: "Холодное оружие",
  cyberdeck: "Кибердека",
  program: "Программа",
  security: "Охранное оборудование",
  tech: "Техника",
  medical: "Медицинские товары и услуги",
  explosives: "Взрывчатка",
  computer: "Компьютер",
  lifestyle: "Образ жизни",
  transport: "Транспорт",
} as const;

export type FeatCategory = keyof typeof FEAT_CATEGORY;
export type AugmentationClass = keyof typeof AUGMENTATION_CATEGORY;
export type ItemCategory = keyof typeof ITEM_CATEGORY;

/** Background entry that is not a background at all but the feud table. */
export const FEUD_TABLE_NAME = "Таблица вражды";
export const FEUD_REQUIRED_TOKEN = "нужна";
export const FEUD_NOT_REQUIRED_TOKEN = "не нужна";

/** Catalog section headings. */
export const CATALOG_SECTIONS = {
  feats: "Черты и таблицы (shinobiSite_feat)",
  inventory: "Снаряжение и услуги (shinobiSite_inventory)",
  skills: "Навыки (shinobiSite_skill)",
  ranks: "Ранги (shinobiSite_rang)",
} as const;

// Both spellings occur in rulebooks (ё / е).
export const HEAVY_WEAPON_SKILLS: ReadonlySet<string> = new Set(["Тяжёлое оружие", "Тяжелое оружие"]);

export const MELEE_SKILLS: ReadonlySet<string> = new Set([
  "Айкидо",
  "Будзюцу",
  "Чанбара",
  "Иайдо",
  "Карате",
  "Некоде",
]);

/** Skill -> support gear categories, in priority order. */
export const SUPPORT_SKILL_CATEGORIES: ReadonlyArray<readonly [string, readonly ItemCategory[]]> = [
  ["Киберпространство", ["cyberdeck", "program"]],
  ["Контрбезопасность", ["security"]],
  ["Технологии", ["tech"]],
  ["Медицина", ["medical"]],
  ["Взрывчатка", ["explosives"]],
];

export const DEFAULT_SUPPORT_CATEGORIES: readonly ItemCategory[] = ["tech", "computer"];
