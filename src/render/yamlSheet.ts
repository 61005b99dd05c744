import yaml from "yaml";
import type { CharacterSheet } from "../generator/types.js";

/**
 * Machine-readable export of a sheet, record objects kept whole.
 */
export function renderYaml(sheet: CharacterSheet): string {
  return yaml.stringify({ version: 1, sheet }, { lineWidth: 0 });
}
