import {
  DEFAULT_SUPPORT_CATEGORIES,
  FEAT_CATEGORY,
  FEUD_NOT_REQUIRED_TOKEN,
  FEUD_REQUIRED_TOKEN,
  FEUD_TABLE_NAME,
  HEAVY_WEAPON_SKILLS,
  MELEE_SKILLS,
  SUPPORT_SKILL_CATEGORIES,
  type AugmentationClass,
  type ItemCategory,
} from "../catalog/categories.js";
import { NoCandidatesError } from "../catalog/errors.js";
import type { RuleCatalog } from "../catalog/ruleCatalog.js";
import type { Feat, InventoryItem, Rank, Skill } from "../catalog/types.js";
import { log } from "../utils/logger.js";
import { normalizeText } from "../utils/text.js";
import type { RandomSource } from "./random.js";
import { pickOne, pickUnique, requireOne, rollDie } from "./select.js";
import type { CharacterSheet, Gender } from "./types.js";

const generatorLog = log.withScope("generator");

export type AugmentationPlan = ReadonlyArray<readonly [AugmentationClass, number]>;

const PLACEHOLDER_RANK: Rank = Object.freeze({ id: 0, name: "", benefit: "", mercenary: "", xpNeeded: "" });

/**
 * d6 -> which augmentation classes to draw and how many of each.
 */
export function augmentationPlan(roll: number): AugmentationPlan {
  switch (roll) {
    case 1:
      return [["A", 1]];
    case 2:
      return [
        ["B", 1],
        ["D", 1],
      ];
    case 3:
      return [["C", 2]];
    case 4:
      return [
        ["C", 1],
        ["D", 2],
      ];
    default:
      return [["D", 4]];
  }
}

function chooseName(catalog: RuleCatalog, rng: RandomSource): { entry: Feat; gender: Gender } {
  const maleNames = catalog.featsIn("maleNames");
  const femaleNames = catalog.featsIn("femaleNames");
  const rolled: Gender = rng() < 0.5 ? "М" : "Ж";

  if (rolled === "М" && maleNames.length > 0) {
    return { entry: requireOne(rng, maleNames, FEAT_CATEGORY.maleNames), gender: "М" };
  }
  if (femaleNames.length > 0) {
    return { entry: requireOne(rng, femaleNames, FEAT_CATEGORY.femaleNames), gender: "Ж" };
  }
  // Female roll with no female names: keep the rolled tag, draw from the male pool
  const entry = pickOne(rng, maleNames);
  if (!entry) {
    throw new NoCandidatesError(`${FEAT_CATEGORY.maleNames} / ${FEAT_CATEGORY.femaleNames}`);
  }
  return { entry, gender: rolled };
}

function chooseBackground(catalog: RuleCatalog, rng: RandomSource): { background: Feat; feud: Feat | null } {
  const history = catalog.featsIn("background");
  const backgrounds = history.filter((feat) => feat.name !== FEUD_TABLE_NAME);
  const feudTable = history.filter((feat) => feat.name === FEUD_TABLE_NAME);

  const background = requireOne(rng, backgrounds, FEAT_CATEGORY.background);
  const name = background.name.toLowerCase();
  const needsFeud = name.includes(FEUD_REQUIRED_TOKEN) && !name.includes(FEUD_NOT_REQUIRED_TOKEN);

  return { background, feud: needsFeud ? pickOne(rng, feudTable) : null };
}

function rollAugmentations(catalog: RuleCatalog, rng: RandomSource): { roll: number; augmentations: Feat[] } {
  const roll = rollDie(rng, 6);
  const augmentations: Feat[] = [];
  for (const [cls, count] of augmentationPlan(roll)) {
    augmentations.push(...pickUnique(rng, catalog.augmentations(cls), count));
  }
  return { roll, augmentations };
}

function chooseWeapons(
  catalog: RuleCatalog,
  rng: RandomSource,
  skillNames: ReadonlySet<string>
): { primary: InventoryItem | null; backup: InventoryItem | null } {
  const heavy = [...HEAVY_WEAPON_SKILLS].some((name) => skillNames.has(name));
  const melee = [...MELEE_SKILLS].some((name) => skillNames.has(name));

  let primary = heavy ? pickOne(rng, catalog.itemsIn("heavyWeapon")) : null;
  primary ??= pickOne(rng, catalog.itemsIn("lightWeapon"));

  let backup = melee ? pickOne(rng, catalog.itemsIn("lightWeapon")) : null;
  backup ??= pickOne(rng, catalog.itemsIn("meleeWeapon"));

  return { primary, backup };
}

export function supportCategories(skillNames: ReadonlySet<string>): ItemCategory[] {
  const categories: ItemCategory[] = [];
  const append = (types: readonly ItemCategory[]) => {
    for (const type of types) {
      if (!categories.includes(type)) categories.push(type);
    }
  };

  for (const [skill, types] of SUPPORT_SKILL_CATEGORIES) {
    if (skillNames.has(skill)) append(types);
  }
  if (categories.length === 0) append(DEFAULT_SUPPORT_CATEGORIES);

  return categories;
}

function chooseSupportItems(catalog: RuleCatalog, rng: RandomSource, skillNames: ReadonlySet<string>): InventoryItem[] {
  const support: InventoryItem[] = [];
  for (const category of supportCategories(skillNames)) {
    const item = pickOne(rng, catalog.itemsIn(category));
    if (item) support.push(item);
  }
  return support;
}

export function startingRank(ranks: readonly Rank[]): Rank {
  if (ranks.length === 0) return PLACEHOLDER_RANK;
  return ranks.reduce((lowest, rank) => (rank.id < lowest.id ? rank : lowest));
}

/**
 * Assemble a character from the catalog.
 *
 * Draw order is fixed (name, concept, background/feud, motivation, clothing,
 * features, problems, augmentations, skills, armor, weapons, support, lifestyle,
 * transport) so a seeded source always produces the same sheet.
 *
 * Name, concept, background, motivation and clothing are mandatory and throw
 * NoCandidatesError on an empty category; everything else degrades to null / [].
 */
export function generateSheet(catalog: RuleCatalog, rng: RandomSource): CharacterSheet {
  const { entry: nameEntry, gender } = chooseName(catalog, rng);
  const concept = requireOne(rng, catalog.featsIn("concept"), FEAT_CATEGORY.concept);
  const { background, feud } = chooseBackground(catalog, rng);
  const motivation = requireOne(rng, catalog.featsIn("motivation"), FEAT_CATEGORY.motivation);
  const clothing = requireOne(rng, catalog.featsIn("clothing"), FEAT_CATEGORY.clothing);
  const features = pickUnique(rng, catalog.featsIn("features"), 2);
  const problems = pickUnique(rng, catalog.featsIn("problems"), 2);
  const { roll, augmentations } = rollAugmentations(catalog, rng);
  const skills: Skill[] = pickUnique(rng, catalog.skills, 6);
  const rank = startingRank(catalog.ranks);
  const armor = pickOne(rng, catalog.itemsIn("armor"));

  const skillNames = new Set(skills.map((skill) => skill.name));
  const { primary, backup } = chooseWeapons(catalog, rng, skillNames);
  const supportItems = chooseSupportItems(catalog, rng, skillNames);
  const lifestyle = pickOne(rng, catalog.itemsIn("lifestyle"));
  const transport = pickOne(rng, catalog.itemsIn("transport"));

  const sheet: CharacterSheet = {
    name: normalizeText(nameEntry.name),
    gender,
    nameMeaning: normalizeText(nameEntry.description),
    concept,
    background,
    feud,
    motivation,
    clothing,
    features: Object.freeze(features),
    problems: Object.freeze(problems),
    augmentations: Object.freeze(augmentations),
    augmentationRoll: roll,
    skills: Object.freeze(skills),
    rank,
    armor,
    primaryWeapon: primary,
    backupWeapon: backup,
    supportItems: Object.freeze(supportItems),
    lifestyle,
    transport,
  };

  generatorLog.debug("Generated sheet", { name: sheet.name, gender, augmentationRoll: roll });
  return Object.freeze(sheet);
}
