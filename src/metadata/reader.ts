import { statSync } from "fs";
import { createLogger } from "../logger";
import { IOError, errorMessage } from "../errors";
import { fromLocalDate, parseExifDateTime, type CaptureDate } from "../utils/date";
import type { DateSource, DateTagName } from "../sources/types";
import type { DateTags, DateTagStore } from "./types";

const log = createLogger("reader");

/** Tags consulted in order; the first parseable one wins */
export const DATE_TAG_ORDER: readonly DateTagName[] = [
  "DateTime",
  "DateTimeOriginal",
  "DateTimeDigitized",
];

export type NotFoundReason = "no-date-tag" | "malformed" | "metadata-unavailable";

export type ReadResult =
  | { kind: "found"; date: CaptureDate; tag: DateTagName }
  | { kind: "not-found"; reason: NotFoundReason }
  | { kind: "read-failed"; error: IOError };

export interface ResolvedDate {
  date: CaptureDate;
  source: DateSource;
}

export function pickCaptureDate(tags: DateTags): ReadResult {
  let sawMalformed = false;
  for (const tag of DATE_TAG_ORDER) {
    const text = tags[tag];
    if (text === undefined) continue;
    const date = parseExifDateTime(text);
    if (date) {
      return { kind: "found", date, tag };
    }
    sawMalformed = true;
  }
  return { kind: "not-found", reason: sawMalformed ? "malformed" : "no-date-tag" };
}

export async function readCaptureDate(filePath: string, store: DateTagStore): Promise<ReadResult> {
  try {
    statSync(filePath);
  } catch (error) {
    return { kind: "read-failed", error: new IOError(filePath, errorMessage(error), error) };
  }

  if (!(await store.isAvailable())) {
    return { kind: "not-found", reason: "metadata-unavailable" };
  }

  let tags: DateTags;
  try {
    tags = await store.readDateTags(filePath);
  } catch (error) {
    return {
      kind: "read-failed",
      error: new IOError(filePath, `Failed to read metadata: ${errorMessage(error)}`, error),
    };
  }

  const result = pickCaptureDate(tags);
  if (result.kind === "not-found") {
    log.debug({ filePath, reason: result.reason }, "No capture date in metadata");
  }
  return result;
}

/**
 * File modification time, truncated to whole seconds.
 */
export function readModificationDate(filePath: string): CaptureDate {
  try {
    return fromLocalDate(statSync(filePath).mtime);
  } catch (error) {
    throw new IOError(filePath, errorMessage(error), error);
  }
}

/**
 * Capture date from metadata, falling back to the file modification time.
 * Throws IOError when the file cannot be read.
 */
export async function resolveCaptureDate(filePath: string, store: DateTagStore): Promise<ResolvedDate> {
  const result = await readCaptureDate(filePath, store);

  switch (result.kind) {
    case "found":
      return { date: result.date, source: { kind: "exif", tag: result.tag } };
    case "not-found":
      log.info({ filePath, reason: result.reason }, "Using file modification time");
      return {
        date: readModificationDate(filePath),
        source: { kind: "file-mtime", reason: result.reason },
      };
    case "read-failed":
      throw result.error;
  }
}
