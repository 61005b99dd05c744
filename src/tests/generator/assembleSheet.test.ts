import { describe, expect, test } from "vitest";
import { NoCandidatesError } from "../../catalog/errors.js";
import { augmentationPlan, generateSheet, startingRank, supportCategories } from "../../generator/assembleSheet.js";
import { createRandomSource, type RandomSource } from "../../generator/random.js";
import { buildCatalog, constantRandom, MANDATORY_FEATS, type FeatRow, type ItemRow } from "../fixtures.js";

function withoutType(type: string): FeatRow[] {
  return MANDATORY_FEATS.filter((feat) => feat.type !== type);
}

const SLOTS = 64;

/** Draw k returns (k + 0.5) / SLOTS, so a SLOTS-sized pool yields entry k. */
function countingRandom(): { rng: RandomSource; draws: () => number } {
  let draws = 0;
  return { rng: () => (draws++ + 0.5) / SLOTS, draws: () => draws };
}

function numbered<T>(build: (i: number) => T): T[] {
  return Array.from({ length: SLOTS }, (_, i) => build(i));
}

function featPool(label: string, type: string): FeatRow[] {
  return numbered((i) => ({ name: `${label} ${i}`, type }));
}

function itemPool(label: string, type: string): ItemRow[] {
  return numbered((i) => ({ name: `${label} ${i}`, type }));
}

describe("augmentationPlan", () => {
  test("maps every d6 face to its fixed class plan", () => {
    expect(augmentationPlan(1)).toEqual([["A", 1]]);
    expect(augmentationPlan(2)).toEqual([
      ["B", 1],
      ["D", 1],
    ]);
    expect(augmentationPlan(3)).toEqual([["C", 2]]);
    expect(augmentationPlan(4)).toEqual([
      ["C", 1],
      ["D", 2],
    ]);
    expect(augmentationPlan(5)).toEqual([["D", 4]]);
    expect(augmentationPlan(6)).toEqual([["D", 4]]);
  });
});

describe("generateSheet", () => {
  test("a catalog with only mandatory categories still yields a full sheet", () => {
    const sheet = generateSheet(buildCatalog({ feats: MANDATORY_FEATS }), constantRandom(0));

    expect(sheet).toMatchObject({
      name: "Кэндзи",
      gender: "М",
      nameMeaning: "Второй сын",
      feud: null,
      features: [],
      problems: [],
      augmentations: [],
      augmentationRoll: 1,
      skills: [],
      rank: { id: 0, name: "", benefit: "", mercenary: "", xpNeeded: "" },
      armor: null,
      primaryWeapon: null,
      backupWeapon: null,
      supportItems: [],
      lifestyle: null,
      transport: null,
    });
    expect(sheet.concept.name).toBe("Инфильтратор");
    expect(sheet.background.name).toBe("Дитя улиц");
    expect(sheet.motivation.name).toBe("Месть");
    expect(sheet.clothing.name).toBe("Плащ");
  });

  test("a background that needs a feud draws from the feud table", () => {
    const catalog = buildCatalog({
      feats: [
        ...withoutType("Предыстория"),
        { name: "Вражда нужна", type: "Предыстория" },
        { name: "Таблица вражды", type: "Предыстория", description: "Старый враг" },
      ],
    });

    const sheet = generateSheet(catalog, constantRandom(0));
    expect(sheet.concept.name).toBe("Инфильтратор");
    expect(sheet.concept.description).toBe("");
    expect(sheet.background.name).toBe("Вражда нужна");
    expect(sheet.feud?.description).toBe("Старый враг");
  });

  test("the feud table itself is never picked as a background", () => {
    const catalog = buildCatalog({
      feats: [
        ...withoutType("Предыстория"),
        { name: "Таблица вражды", type: "Предыстория" },
        { name: "Вражда не нужна", type: "Предыстория" },
      ],
    });

    const sheet = generateSheet(catalog, constantRandom(0));
    expect(sheet.background.name).toBe("Вражда не нужна");
    expect(sheet.feud).toBeNull();
  });

  test("an empty mandatory category fails with NoCandidatesError", () => {
    const catalog = buildCatalog({ feats: withoutType("Мотивация") });
    expect(() => generateSheet(catalog, constantRandom(0))).toThrow(NoCandidatesError);
    expect(() => generateSheet(catalog, constantRandom(0))).toThrow('"Мотивация"');
  });

  test("a rolled gender with no names falls back to the other pool", () => {
    const femaleOnly = buildCatalog({ feats: withoutType("Мужские имена") });
    expect(generateSheet(femaleOnly, constantRandom(0))).toMatchObject({ name: "Юки", gender: "Ж" });

    // Female roll, male-only names: the rolled tag is kept
    const maleOnly = buildCatalog({ feats: withoutType("Женские имена") });
    expect(generateSheet(maleOnly, constantRandom(0.99))).toMatchObject({ name: "Кэндзи", gender: "Ж" });

    const nameless = buildCatalog({ feats: withoutType("Мужские имена").filter((f) => f.type !== "Женские имена") });
    expect(() => generateSheet(nameless, constantRandom(0))).toThrow(NoCandidatesError);
  });

  test("a six on the augmentation die draws four class D augmentations", () => {
    const catalog = buildCatalog({
      feats: [
        ...MANDATORY_FEATS,
        ...["Ночное зрение", "Слух", "Коммуникатор", "Фильтр", "Рефлексы"].map((name) => ({
          name,
          type: "Аугментации класса D",
        })),
        { name: "Нейроусилитель", type: "Аугментации класса А" },
      ],
    });

    const sheet = generateSheet(catalog, constantRandom(0.99));
    expect(sheet.augmentationRoll).toBe(6);
    expect(sheet.augmentations).toHaveLength(4);
    expect(new Set(sheet.augmentations.map((feat) => feat.name)).size).toBe(4);
    expect(sheet.augmentations.every((feat) => feat.type === "Аугментации класса D")).toBe(true);
  });

  test("a heavy weapon skill arms the character with a heavy weapon and melee skills pick a light backup", () => {
    const catalog = buildCatalog({
      feats: MANDATORY_FEATS,
      skills: [{ name: "Тяжелое оружие" }, { name: "Карате" }],
      items: [
        { name: "Рельсотрон", type: "Тяжелое оружие" },
        { name: "Пистолет", type: "Лёгкое оружие" },
        { name: "Катана", type: "Холодное оружие" },
      ],
    });

    const sheet = generateSheet(catalog, constantRandom(0));
    expect(sheet.skills.map((skill) => skill.name)).toEqual(["Тяжелое оружие", "Карате"]);
    expect(sheet.primaryWeapon?.name).toBe("Рельсотрон");
    expect(sheet.backupWeapon?.name).toBe("Пистолет");
  });

  test("a melee skill without light weapons falls back to a blade backup", () => {
    const catalog = buildCatalog({
      feats: MANDATORY_FEATS,
      skills: [{ name: "Айкидо" }],
      items: [{ name: "Катана", type: "Холодное оружие" }],
    });

    const sheet = generateSheet(catalog, constantRandom(0));
    expect(sheet.primaryWeapon).toBeNull();
    expect(sheet.backupWeapon?.name).toBe("Катана");
  });

  test("weapons fall back to light primary and blade backup", () => {
    const catalog = buildCatalog({
      feats: MANDATORY_FEATS,
      skills: [{ name: "Тяжёлое оружие" }],
      items: [
        { name: "Пистолет", type: "Лёгкое оружие" },
        { name: "Катана", type: "Холодное оружие" },
      ],
    });

    const sheet = generateSheet(catalog, constantRandom(0));
    expect(sheet.primaryWeapon?.name).toBe("Пистолет");
    expect(sheet.backupWeapon?.name).toBe("Катана");
  });

  test("support gear follows the skill priority order", () => {
    const catalog = buildCatalog({
      feats: MANDATORY_FEATS,
      skills: [{ name: "Медицина" }, { name: "Киберпространство" }],
      items: [
        { name: "Аптечка", type: "Медицинские товары и услуги" },
        { name: "Дека", type: "Кибердека" },
        { name: "Ледоруб", type: "Программа" },
        { name: "Дрон", type: "Техника" },
      ],
    });

    const sheet = generateSheet(catalog, constantRandom(0));
    expect(sheet.supportItems.map((item) => item.name)).toEqual(["Дека", "Ледоруб", "Аптечка"]);
  });

  test("without support skills the default categories are used", () => {
    const catalog = buildCatalog({
      feats: MANDATORY_FEATS,
      skills: [{ name: "Скрытность" }],
      items: [
        { name: "Дрон", type: "Техника" },
        { name: "Аптечка", type: "Медицинские товары и услуги" },
      ],
    });

    expect(generateSheet(catalog, constantRandom(0)).supportItems.map((item) => item.name)).toEqual(["Дрон"]);
  });

  test("six distinct skills are chosen when more are available", () => {
    const catalog = buildCatalog({
      feats: MANDATORY_FEATS,
      skills: ["a", "b", "c", "d", "e", "f", "g", "h"].map((name) => ({ name })),
    });

    const sheet = generateSheet(catalog, createRandomSource("skills"));
    expect(sheet.skills).toHaveLength(6);
    expect(new Set(sheet.skills.map((skill) => skill.id)).size).toBe(6);
  });

  test("fields consume random draws in a fixed order", () => {
    const catalog = buildCatalog({
      feats: [
        ...featPool("Имя", "Мужские имена"),
        ...featPool("Имя", "Женские имена"),
        ...featPool("Концепт", "Концепт"),
        ...featPool("Вражда нужна", "Предыстория"),
        ...numbered((i) => ({ name: "Таблица вражды", type: "Предыстория", description: `Враг ${i}` })),
        ...featPool("Мотивация", "Мотивация"),
        ...featPool("Одежда", "Одежда"),
        ...featPool("Черта", "Особые черты"),
        ...featPool("Проблема", "Личностные проблемы"),
        ...featPool("А", "Аугментации класса А"),
        ...featPool("B", "Аугментации класса B"),
        ...featPool("C", "Аугментации класса C"),
        ...featPool("D", "Аугментации класса D"),
      ],
      skills: numbered((i) => ({ name: `Навык ${i}` })),
      items: [
        ...itemPool("Броня", "Броня"),
        ...itemPool("Тяжёлое", "Тяжелое оружие"),
        ...itemPool("Лёгкое", "Лёгкое оружие"),
        ...itemPool("Холодное", "Холодное оружие"),
        ...itemPool("Техника", "Техника"),
        ...itemPool("Компьютер", "Компьютер"),
        ...itemPool("Образ жизни", "Образ жизни"),
        ...itemPool("Транспорт", "Транспорт"),
      ],
    });
    const { rng, draws } = countingRandom();
    const names = (entries: readonly { name: string }[]) => entries.map((entry) => entry.name);

    const sheet = generateSheet(catalog, rng);

    // draw 0 < 0.5 rolls male
    expect(sheet.gender).toBe("М");
    expect(sheet.name).toBe("Имя 1");
    expect(sheet.concept.name).toBe("Концепт 2");
    expect(sheet.background.name).toBe("Вражда нужна 3");
    expect(sheet.feud?.description).toBe("Враг 4");
    expect(sheet.motivation.name).toBe("Мотивация 5");
    expect(sheet.clothing.name).toBe("Одежда 6");
    // Second pick of a pair lands one slot further after the Fisher-Yates offset
    expect(names(sheet.features)).toEqual(["Черта 7", "Черта 9"]);
    expect(names(sheet.problems)).toEqual(["Проблема 9", "Проблема 11"]);
    // draw 11: 1 + floor(11.5 / 64 * 6) = 2 -> one B, one D
    expect(sheet.augmentationRoll).toBe(2);
    expect(names(sheet.augmentations)).toEqual(["B 12", "D 13"]);
    expect(names(sheet.skills)).toEqual(["Навык 14", "Навык 16", "Навык 17", "Навык 19", "Навык 21", "Навык 22"]);
    expect(sheet.armor?.name).toBe("Броня 20");
    expect(sheet.primaryWeapon?.name).toBe("Лёгкое 21");
    expect(sheet.backupWeapon?.name).toBe("Холодное 22");
    expect(names(sheet.supportItems)).toEqual(["Техника 23", "Компьютер 24"]);
    expect(sheet.lifestyle?.name).toBe("Образ жизни 25");
    expect(sheet.transport?.name).toBe("Транспорт 26");
    expect(draws()).toBe(27);
  });

  test("the returned sheet and its lists are frozen", () => {
    const catalog = buildCatalog({
      feats: [...MANDATORY_FEATS, { name: "Шрам", type: "Особые черты" }],
      skills: [{ name: "Медицина" }],
      items: [{ name: "Аптечка", type: "Медицинские товары и услуги" }],
    });

    const sheet = generateSheet(catalog, constantRandom(0));
    expect(Object.isFrozen(sheet)).toBe(true);
    for (const list of [sheet.features, sheet.problems, sheet.augmentations, sheet.skills, sheet.supportItems]) {
      expect(Object.isFrozen(list)).toBe(true);
    }
    expect(() => Reflect.apply(Array.prototype.push, sheet.skills, [sheet.skills[0]])).toThrow(TypeError);
    expect(sheet.skills).toHaveLength(1);
  });

  test("the same seed reproduces the same sheet", () => {
    const catalog = buildCatalog({
      feats: [...MANDATORY_FEATS, { name: "Шрам", type: "Особые черты" }, { name: "Оптика", type: "Особые черты" }],
      skills: ["a", "b", "c", "d", "e", "f", "g"].map((name) => ({ name })),
    });

    expect(generateSheet(catalog, createRandomSource("same"))).toEqual(
      generateSheet(catalog, createRandomSource("same"))
    );
  });
});

test("supportCategories accumulates without duplicates", () => {
  expect(supportCategories(new Set(["Медицина", "Киберпространство"]))).toEqual(["cyberdeck", "program", "medical"]);
  expect(supportCategories(new Set(["Айкидо"]))).toEqual(["tech", "computer"]);
});

test("startingRank picks the lowest id", () => {
  const ranks = [
    { id: 2, name: "Чунин", benefit: "", mercenary: "", xpNeeded: "10" },
    { id: 1, name: "Генин", benefit: "", mercenary: "", xpNeeded: "0" },
    { id: 3, name: "Дзёнин", benefit: "", mercenary: "", xpNeeded: "25" },
  ];
  expect(startingRank(ranks).name).toBe("Генин");
  expect(startingRank([]).id).toBe(0);
});
