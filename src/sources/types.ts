import type { CaptureDate } from "../utils/date";

export type DateTagName = "DateTime" | "DateTimeOriginal" | "DateTimeDigitized";

export type DateSource =
  | { kind: "exif"; tag: DateTagName }
  | { kind: "file-mtime"; reason: string };

export interface ImageRecord {
  path: string;
  captureDate?: CaptureDate;
  source?: DateSource;
}
