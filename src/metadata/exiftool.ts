import { ExifDateTime, ExifTool } from "exiftool-vendored";
import { createLogger } from "../logger";
import type { DateTags, DateTagStore } from "./types";

const log = createLogger("exiftool");

export interface ExiftoolStoreOptions {
  taskTimeoutMillis: number;
}

export function toExifText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (value instanceof ExifDateTime) return value.rawValue ?? value.toExifString();
  return undefined;
}

const JPEG_MIME_TYPE = "image/jpeg";

/**
 * DateTagStore backed by a single exiftool worker process.
 * ExifTool names the IFD0 DateTime tag "ModifyDate" and DateTimeDigitized "CreateDate".
 *
 * Tag names are left unqualified. On read, exiftool reports the EXIF copy ahead of
 * an XMP duplicate; on write, it creates the tag in EXIF and also updates any XMP
 * copy already present, so both stay in step.
 */
export class ExiftoolTagStore implements DateTagStore {
  name = "exiftool";
  private exiftool: ExifTool;
  private available?: boolean;

  constructor(options: ExiftoolStoreOptions) {
    this.exiftool = new ExifTool({
      maxProcs: 1,
      taskTimeoutMillis: options.taskTimeoutMillis,
    });
  }

  async isAvailable(): Promise<boolean> {
    if (this.available === undefined) {
      try {
        const version = await this.exiftool.version();
        log.debug({ version }, "exiftool ready");
        this.available = true;
      } catch (error) {
        log.debug({ error }, "exiftool could not be started");
        this.available = false;
      }
    }
    return this.available;
  }

  async readDateTags(filePath: string): Promise<DateTags> {
    const tags = await this.exiftool.read(filePath);
    if (tags.errors && tags.errors.length > 0) {
      throw new Error(tags.errors.join("; "));
    }
    if (tags.Error) {
      throw new Error(tags.Error);
    }
    if (tags.MIMEType !== JPEG_MIME_TYPE) {
      throw new Error(`Not a valid JPEG (file type: ${tags.FileType ?? "unknown"})`);
    }

    const result: DateTags = {};
    const dateTime = toExifText(tags.ModifyDate);
    const original = toExifText(tags.DateTimeOriginal);
    const digitized = toExifText(tags.CreateDate);
    if (dateTime !== undefined) result.DateTime = dateTime;
    if (original !== undefined) result.DateTimeOriginal = original;
    if (digitized !== undefined) result.DateTimeDigitized = digitized;

    log.debug({ filePath, tags: result }, "Read date tags");
    return result;
  }

  async writeDateTags(filePath: string, exifText: string): Promise<void> {
    await this.exiftool.write(
      filePath,
      {
        ModifyDate: exifText,
        DateTimeOriginal: exifText,
        CreateDate: exifText,
      },
      { writeArgs: ["-overwrite_original"] }
    );
    log.debug({ filePath, exifText }, "Wrote date tags");
  }

  async close(): Promise<void> {
    await this.exiftool.end();
  }
}
