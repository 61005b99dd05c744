import fs from "node:fs";
import { decodeHTML } from "entities";
import { CatalogNotFoundError } from "./errors.js";
import type { Row, SkippedRow, Tables } from "./types.js";

const SECTION_PREFIX = "## ";
const SEPARATOR_MARKER = "---";
const LINE_BREAK_RE = /<br\s*\/?>/gi;

export type ParseTablesOptions = {
  onSkippedRow?: (skipped: SkippedRow) => void;
};

/**
 * Split a pipe-delimited Markdown table line into trimmed cells.
 * "| a | b |" -> ["a", "b"]
 */
export function splitCells(line: string): string[] {
  return line
    .trim()
    .replace(/^\|+|\|+$/g, "")
    .split("|")
    .map((cell) => cell.trim());
}

/**
 * Normalize a free-text cell: <br> markup becomes a newline, HTML entities are decoded.
 */
export function cleanCell(value: string | undefined): string {
  if (!value) return "";
  return decodeHTML(value.replace(LINE_BREAK_RE, "\n")).trim();
}

/**
 * Parse every level-2 section of a Markdown document into its table rows.
 *
 * A table is a `|` header line directly followed by a `---` separator line.
 * Rows whose cell count does not match the header are dropped and reported via
 * `onSkippedRow`; the scan resumes on the next line. Tables sharing a heading
 * are concatenated.
 */
export function parseTables(text: string, opts: ParseTablesOptions = {}): Tables {
  const tables: Tables = new Map();
  const lines = text.split(/\r?\n/);
  let currentSection: string | null = null;
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];

    if (line.startsWith(SECTION_PREFIX)) {
      currentSection = line.slice(SECTION_PREFIX.length).trim();
      i++;
      continue;
    }

    if (!line.startsWith("|") || !currentSection) {
      i++;
      continue;
    }

    if (i + 1 >= lines.length) break;

    if (!lines[i + 1].includes(SEPARATOR_MARKER)) {
      // Not a header after all
      i++;
      continue;
    }

    const headers = splitCells(line);
    const rows = tables.get(currentSection) ?? [];
    tables.set(currentSection, rows);

    i += 2;
    while (i < lines.length && lines[i].startsWith("|")) {
      const cells = splitCells(lines[i]);
      if (cells.length !== headers.length) {
        opts.onSkippedRow?.({
          section: currentSection,
          line: i + 1,
          expected: headers.length,
          actual: cells.length,
        });
        i++;
        continue;
      }

      const row: Row = {};
      headers.forEach((header, index) => {
        row[header] = cells[index];
      });
      rows.push(row);
      i++;
    }
  }

  return tables;
}

/**
 * Read the catalog document. Any read failure is fatal: there is no catalog without it.
 */
export function readCatalogSource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err: unknown) {
    throw new CatalogNotFoundError(filePath, { cause: err });
  }
}
