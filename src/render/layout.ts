/** Width in code points; box-drawing and Cyrillic are single units. */
export function displayWidth(text: string): number {
  return [...text].length;
}

export function padRight(text: string, width: number): string {
  const missing = width - displayWidth(text);
  return missing > 0 ? text + " ".repeat(missing) : text;
}

/**
 * Greedy word wrap. Words wider than `width` are split across lines.
 * Always returns at least one (possibly empty) line.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    let chars = [...word];

    if (chars.length > width) {
      if (current) {
        lines.push(current);
        current = "";
      }
      while (chars.length > width) {
        lines.push(chars.slice(0, width).join(""));
        chars = chars.slice(width);
      }
      if (chars.length === 0) continue;
    }

    const piece = chars.join("");
    if (!current) {
      current = piece;
    } else if (displayWidth(current) + 1 + chars.length <= width) {
      current = `${current} ${piece}`;
    } else {
      lines.push(current);
      current = piece;
    }
  }

  if (current) lines.push(current);
  return lines.length > 0 ? lines : [""];
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
