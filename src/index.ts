export * from "./catalog/categories.js";
export { CatalogRepository, loadCatalog, parseCatalog } from "./catalog/catalogRepository.js";
export { CatalogNotFoundError, MalformedCatalogError, NoCandidatesError, type CatalogError } from "./catalog/errors.js";
export { RuleCatalog } from "./catalog/ruleCatalog.js";
export { cleanCell, parseTables, readCatalogSource, splitCells } from "./catalog/tableStore.js";
export type { Feat, InventoryItem, Rank, Row, Skill, SkippedRow, Tables } from "./catalog/types.js";
export { augmentationPlan, generateSheet, startingRank, supportCategories } from "./generator/assembleSheet.js";
export { createRandomSource, type RandomSource } from "./generator/random.js";
export { pickOne, pickUnique, requireOne, rollDie } from "./generator/select.js";
export type { CharacterSheet, Gender } from "./generator/types.js";
export { buildSections, SECTION_ORDER, SECTION_TITLES, type SectionKey, type Sections } from "./render/sections.js";
export { renderDocument } from "./render/htmlSheet.js";
export { renderText, SHEET_WIDTH } from "./render/textSheet.js";
export { renderYaml } from "./render/yamlSheet.js";
export { DEFAULT_CATALOG_PATH, generateDossier, RENDERERS, type DossierOptions } from "./dossier.js";
