import { basename } from "path";
import { formatCaptureDate, type CaptureDate } from "./date";
import type { DateSource } from "../sources/types";

export interface DateRow {
  index: number;
  path: string;
  current?: CaptureDate;
  updated?: CaptureDate;
  source?: DateSource;
  note?: string;
}

const DATE_WIDTH = 19;
const DEFAULT_FILENAME_WIDTH = 40;

function formatDate(date?: CaptureDate): string {
  if (!date) return " ".repeat(DATE_WIDTH);
  return formatCaptureDate(date);
}

export function describeSource(source?: DateSource): string {
  if (!source) return "";
  return source.kind === "exif" ? source.tag : "file time";
}

function truncate(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 3) + "..." : value.padEnd(width);
}

/**
 * Render rows as text lines. The "New date" column is shown only when a row has one.
 */
export function formatDateTable(rows: DateRow[], filenameWidth: number = DEFAULT_FILENAME_WIDTH): string[] {
  const showUpdated = rows.some((r) => r.updated !== undefined);

  let header = `  #  ${"File".padEnd(filenameWidth)} ${"Current date".padEnd(DATE_WIDTH)}`;
  if (showUpdated) header += `    ${"New date".padEnd(DATE_WIDTH)}`;
  header += "  Source";

  const lines = [header, "─".repeat(header.length)];

  for (const row of rows) {
    let line = ` ${String(row.index).padStart(2)}  ${truncate(basename(row.path), filenameWidth)} ${formatDate(row.current)}`;
    if (showUpdated) {
      line += row.updated ? ` -> ${formatDate(row.updated)}` : `    ${formatDate()}`;
    }
    line += `  ${describeSource(row.source)}`;
    if (row.note) line += `  (${row.note})`;
    lines.push(line.trimEnd());
  }

  return lines;
}

export function printDateTable(rows: DateRow[], filenameWidth?: number): void {
  for (const line of formatDateTable(rows, filenameWidth)) {
    console.log(line);
  }
}
