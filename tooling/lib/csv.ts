/**
 * Quoted CSV output for generated prompts
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { GeneratedItem } from "./types";

export const CSV_HEADER = ["ID", "Prompt"] as const;
export const CSV_LINE_ENDING = "\r\n";

export function quoteField(value: string | number): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

export function formatRow(fields: (string | number)[]): string {
  return fields.map(quoteField).join(",");
}

/**
 * Render header plus one row per item, every field quoted
 */
export function formatPromptsCsv(items: readonly GeneratedItem[]): string {
  const rows = [formatRow([...CSV_HEADER]), ...items.map((item) => formatRow([item.id, item.text]))];
  return rows.map((row) => row + CSV_LINE_ENDING).join("");
}

/**
 * Write items to `path`, replacing any existing file
 */
export function writePromptsCsv(path: string, items: readonly GeneratedItem[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, formatPromptsCsv(items), "utf8");
}

/**
 * Parse CSV text into rows. Handles quoted fields containing commas,
 * doubled quotes and line breaks.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += char;
      }
      i += 1;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\r" || char === "\n") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      if (char === "\r" && text[i + 1] === "\n") {
        i += 1;
      }
    } else {
      field += char;
    }
    i += 1;
  }

  if (inQuotes) {
    throw new Error("Unterminated quoted field in CSV input");
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}
