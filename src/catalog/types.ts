export type Row = Record<string, string>;

/** Section title -> rows of every table under that heading, in source order. */
export type Tables = Map<string, Row[]>;

export type Feat = {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly type: string;
  readonly rollCode: string; // rule annotation, never evaluated here
};

export type InventoryItem = {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly type: string;
  readonly price: number | null;
};

export type Skill = {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly rollCode: string;
};

export type Rank = {
  readonly id: number;
  readonly name: string;
  readonly benefit: string;
  readonly mercenary: string;
  readonly xpNeeded: string;
};

export type SkippedRow = {
  section: string;
  line: number; // 1-based
  expected: number;
  actual: number;
};
