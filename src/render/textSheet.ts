import type { CharacterSheet } from "../generator/types.js";
import { normalizeText } from "../utils/text.js";
import { padRight, wrapText } from "./layout.js";
import { buildSections, genderLabel, SECTION_ORDER, SECTION_TITLES } from "./sections.js";

export const SHEET_WIDTH = 60;

const LABEL_WIDTH = 18;
const BODY_WIDTH = SHEET_WIDTH - 4; // "║ " + body + " ║"
const VALUE_WIDTH = SHEET_WIDTH - LABEL_WIDTH - 5; // "║ " + label + " " + value + " ║"

const BORDER_TOP = `╔${"═".repeat(SHEET_WIDTH - 2)}╗`;
const BORDER_MID = `╠${"═".repeat(SHEET_WIDTH - 2)}╣`;
const BORDER_SEP = `╟${"─".repeat(SHEET_WIDTH - 2)}╢`;
const BORDER_BOTTOM = `╚${"═".repeat(SHEET_WIDTH - 2)}╝`;

const TITLE = "SHINOBI // CYBERPUNK DOSSIER";

function bodyRow(text: string): string {
  return `║ ${padRight(text, BODY_WIDTH)} ║`;
}

function fieldRows(label: string, value: string): string[] {
  const labelCell = padRight(`${label}:`, LABEL_WIDTH);
  const blankCell = " ".repeat(LABEL_WIDTH);
  return wrapText(normalizeText(value), VALUE_WIDTH).map(
    (line, index) => `║ ${index === 0 ? labelCell : blankCell} ${padRight(line, VALUE_WIDTH)} ║`
  );
}

function listRows(title: string, items: readonly string[]): string[] {
  const rows = [bodyRow(title)];
  for (const item of items) {
    for (const line of wrapText(`• ${item}`, BODY_WIDTH)) {
      rows.push(bodyRow(line));
    }
  }
  return rows;
}

/**
 * Fixed-width boxed sheet. Every line is exactly SHEET_WIDTH code points.
 */
export function renderText(sheet: CharacterSheet): string {
  const lines: string[] = [
    BORDER_TOP,
    bodyRow(TITLE),
    BORDER_MID,
    ...fieldRows("Имя", sheet.name),
    ...fieldRows("Пол", genderLabel(sheet)),
    ...fieldRows("Значение", sheet.nameMeaning),
    ...fieldRows("Концепт", sheet.concept.name),
    BORDER_SEP,
  ];

  const sections = buildSections(sheet);
  SECTION_ORDER.forEach((key, index) => {
    lines.push(...listRows(SECTION_TITLES[key], sections[key]));
    if (index < SECTION_ORDER.length - 1) lines.push(BORDER_SEP);
  });
  lines.push(BORDER_BOTTOM);

  return lines.join("\n");
}
