import type { Feat, InventoryItem, Rank, Skill } from "../catalog/types.js";

export type Gender = "М" | "Ж";

export type CharacterSheet = {
  readonly name: string;
  readonly gender: Gender;
  readonly nameMeaning: string;
  readonly concept: Feat;
  readonly background: Feat;
  readonly feud: Feat | null;
  readonly motivation: Feat;
  readonly clothing: Feat;
  readonly features: readonly Feat[];
  readonly problems: readonly Feat[];
  readonly augmentations: readonly Feat[];
  readonly augmentationRoll: number; // d6
  readonly skills: readonly Skill[];
  readonly rank: Rank;
  readonly armor: InventoryItem | null;
  readonly primaryWeapon: InventoryItem | null;
  readonly backupWeapon: InventoryItem | null;
  readonly supportItems: readonly InventoryItem[];
  readonly lifestyle: InventoryItem | null;
  readonly transport: InventoryItem | null;
};
