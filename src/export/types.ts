import type { CaptureDate } from "../utils/date";

export interface WriteRequest {
  source: string;
  /** Same as source for an in-place edit */
  destination: string;
  date: CaptureDate;
}

export interface WriteReport {
  destination: string;
  reencoded: boolean;
  metadataWritten: boolean;
  warnings: string[];
}
