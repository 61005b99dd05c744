import { CatalogRepository } from "./catalog/catalogRepository.js";
import type { OutputFormat } from "./config/types.js";
import { generateSheet } from "./generator/assembleSheet.js";
import { createRandomSource } from "./generator/random.js";
import type { CharacterSheet } from "./generator/types.js";
import { renderDocument } from "./render/htmlSheet.js";
import { renderText } from "./render/textSheet.js";
import { renderYaml } from "./render/yamlSheet.js";

export const DEFAULT_CATALOG_PATH = "./data/DATABASE.md";

const defaultRepository = new CatalogRepository();

export const RENDERERS: Record<OutputFormat, (sheet: CharacterSheet) => string> = {
  text: renderText,
  html: renderDocument,
  yaml: renderYaml,
};

export type DossierOptions = {
  seed?: string | number;
  catalogPath?: string;
  format?: OutputFormat;
  repository?: CatalogRepository;
};

/**
 * One-call generation: load (cached) catalog, roll a sheet, render it.
 */
export function generateDossier(opts: DossierOptions = {}): { sheet: CharacterSheet; output: string } {
  const repository = opts.repository ?? defaultRepository;
  const catalog = repository.load(opts.catalogPath ?? DEFAULT_CATALOG_PATH);
  const sheet = generateSheet(catalog, createRandomSource(opts.seed));
  return { sheet, output: RENDERERS[opts.format ?? "text"](sheet) };
}
