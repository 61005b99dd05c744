import type { CharacterSheet } from "../generator/types.js";
import { normalizeText, PLACEHOLDER } from "../utils/text.js";
import { escapeHtml } from "./layout.js";
import { buildSections, genderLabel, SECTION_ORDER, SECTION_TITLES } from "./sections.js";

const STYLE = `
      :root {
        color-scheme: dark;
        --bg: #04020c;
        --panel: rgba(25, 17, 48, 0.85);
        --accent: #7df9ff;
        --accent-2: #ff00ff;
        --text: #e4f1ff;
        --muted: #8ca1c1;
      }
      * { box-sizing: border-box; }
      body {
        margin: 0;
        padding: 24px 12px 48px;
        font-family: "Orbitron", "Segoe UI", sans-serif;
        background: radial-gradient(circle at top, #120a28, var(--bg) 60%);
        color: var(--text);
      }
      .dossier {
        max-width: 720px;
        margin: 0 auto;
        padding: 24px 20px;
        background: var(--panel);
        border: 2px solid var(--accent);
        border-radius: 18px;
        box-shadow: 0 0 30px rgba(125, 249, 255, 0.25);
      }
      header { text-align: center; margin-bottom: 24px; }
      header h1 {
        margin: 0 0 6px;
        letter-spacing: 0.28em;
        color: var(--accent);
        text-shadow: 0 0 16px rgba(125, 249, 255, 0.6);
      }
      header p { margin: 0; color: var(--muted); letter-spacing: 0.16em; text-transform: uppercase; }
      .info-grid {
        display: grid;
        grid-template-columns: repeat(auto-fit, minmax(180px, 1fr));
        gap: 12px;
        margin-bottom: 24px;
      }
      .info-row {
        display: flex;
        flex-direction: column;
        gap: 6px;
        padding: 12px;
        background: rgba(12, 9, 26, 0.9);
        border: 1px solid rgba(125, 249, 255, 0.35);
        border-radius: 12px;
      }
      .label { font-size: 0.7rem; letter-spacing: 0.22em; text-transform: uppercase; color: var(--muted); }
      .value { font-size: 1.05rem; }
      .block {
        margin-bottom: 22px;
        padding: 16px 14px;
        background: rgba(10, 6, 24, 0.9);
        border: 1px solid rgba(255, 0, 255, 0.25);
        border-radius: 12px;
      }
      .block h2 { margin: 0 0 12px; font-size: 1rem; letter-spacing: 0.32em; text-transform: uppercase; color: var(--accent-2); }
      .block ul { list-style: none; margin: 0; padding: 0; display: flex; flex-direction: column; gap: 10px; }
      .block li { display: flex; gap: 10px; align-items: flex-start; line-height: 1.45; }
      .bullet {
        flex-shrink: 0;
        width: 8px;
        height: 8px;
        margin-top: 6px;
        border-radius: 50%;
        background: linear-gradient(135deg, var(--accent), var(--accent-2));
      }`;

function infoRows(sheet: CharacterSheet): Array<[string, string]> {
  return [
    ["Имя", normalizeText(sheet.name)],
    ["Пол", genderLabel(sheet)],
    ["Значение имени", normalizeText(sheet.nameMeaning)],
    ["Концепт", normalizeText(sheet.concept.name)],
  ];
}

function renderInfoRow(label: string, value: string): string {
  return (
    `<div class="info-row">` +
    `<span class="label">${escapeHtml(label)}</span>` +
    `<span class="value">${escapeHtml(value || PLACEHOLDER)}</span>` +
    `</div>`
  );
}

function renderBlock(title: string, items: readonly string[]): string {
  const normalized = items.length > 0 ? items.map((item) => normalizeText(item)) : [PLACEHOLDER];
  const listItems = normalized
    .map((item) => `<li><span class="bullet"></span><span>${escapeHtml(item)}</span></li>`)
    .join("");
  return `<section class="block"><h2>${escapeHtml(title)}</h2><ul>${listItems}</ul></section>`;
}

/**
 * Standalone HTML page for the sheet. All catalog text is escaped.
 */
export function renderDocument(sheet: CharacterSheet): string {
  const sections = buildSections(sheet);
  const infoCards = infoRows(sheet)
    .map(([label, value]) => renderInfoRow(label, value))
    .join("");
  const blocks = SECTION_ORDER.map((key) => renderBlock(SECTION_TITLES[key], sections[key])).join("");

  return `<!DOCTYPE html>
<html lang="ru">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>Shinobi Dossier</title>
    <style>${STYLE}
    </style>
  </head>
  <body>
    <main class="dossier">
      <header>
        <h1>SHINOBI DOSSIER</h1>
        <p>Cyberpunk операционный файл</p>
      </header>
      <section class="info-grid">${infoCards}</section>
      ${blocks}
    </main>
  </body>
</html>
`;
}
