import type { CharacterSheet } from "../generator/types.js";
import { normalizeText, PLACEHOLDER } from "../utils/text.js";
import { describeFeat, describeItem, describeSkill } from "./describe.js";

export type SectionKey =
  | "biography"
  | "motivation"
  | "appearance"
  | "personality"
  | "augmentations"
  | "skills"
  | "gear"
  | "lifestyle"
  | "transport"
  | "rank";

export type Sections = Record<SectionKey, string[]>;

export const SECTION_ORDER: readonly SectionKey[] = [
  "biography",
  "motivation",
  "appearance",
  "personality",
  "augmentations",
  "skills",
  "gear",
  "lifestyle",
  "transport",
  "rank",
];

export const SECTION_TITLES: Record<SectionKey, string> = {
  biography: "Биография",
  motivation: "Мотивация",
  appearance: "Внешность",
  personality: "Черты характера",
  augmentations: "Аугментации",
  skills: "Навыки",
  gear: "Снаряжение",
  lifestyle: "Образ жизни",
  transport: "Транспорт",
  rank: "Ранг",
};

export function genderLabel(sheet: CharacterSheet): string {
  return sheet.gender === "Ж" ? "Женский" : "Мужской";
}

function orPlaceholder(lines: string[]): string[] {
  return lines.length > 0 ? lines : [PLACEHOLDER];
}

/**
 * Display lines per section; shared by the text and HTML layouts.
 */
export function buildSections(sheet: CharacterSheet): Sections {
  let biography = describeFeat(sheet.background);
  if (sheet.feud) {
    const feudText = sheet.feud.description || sheet.feud.name;
    biography = `${biography}; Вражда: ${normalizeText(feudText)}`;
  }

  const gear = [
    normalizeText(`Броня: ${describeItem(sheet.armor)}`),
    normalizeText(`Основное оружие: ${describeItem(sheet.primaryWeapon)}`),
    normalizeText(`Запасное оружие: ${describeItem(sheet.backupWeapon)}`),
    ...sheet.supportItems.map((item, index) => normalizeText(`Поддержка ${index + 1}: ${describeItem(item)}`)),
  ];

  const { rank } = sheet;
  const rankLine = normalizeText(
    `${normalizeText(rank.name)} (бонус: ${normalizeText(rank.benefit)}, опыт: ${normalizeText(rank.xpNeeded, "0")})`
  );

  return {
    biography: [biography],
    motivation: [describeFeat(sheet.motivation)],
    appearance: [describeFeat(sheet.clothing), ...sheet.features.map(describeFeat)],
    personality: orPlaceholder(sheet.problems.map(describeFeat)),
    augmentations: [`Бросок d6 на аугментации: ${sheet.augmentationRoll}`, ...sheet.augmentations.map(describeFeat)],
    skills: orPlaceholder(sheet.skills.map(describeSkill)),
    gear,
    lifestyle: [describeItem(sheet.lifestyle)],
    transport: [describeItem(sheet.transport)],
    rank: [rankLine],
  };
}
