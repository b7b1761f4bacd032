import type { DateTagName } from "../sources/types";

export type DateTags = Partial<Record<DateTagName, string>>;

/**
 * Access to the capture-date tags embedded in an image.
 */
export interface DateTagStore {
  name: string;
  /** False when the backing tool cannot run; writes are then skipped */
  isAvailable(): Promise<boolean>;
  /** Raw EXIF text of each date tag present. Throws when the file cannot be read. */
  readDateTags(filePath: string): Promise<DateTags>;
  /** Sets DateTime, DateTimeOriginal and DateTimeDigitized to the given EXIF text */
  writeDateTags(filePath: string, exifText: string): Promise<void>;
  close(): Promise<void>;
}

export interface ImageEncoder {
  name: string;
  /** Decode and re-encode as JPEG, keeping the metadata container */
  reencode(sourcePath: string, destinationPath: string, quality: number): Promise<void>;
}
