import { copyFileSync, existsSync, mkdirSync, utimesSync } from "fs";
import { dirname, resolve } from "path";
import { createLogger } from "../logger";
import { IOError, errorMessage } from "../errors";
import { formatExifDateTime, toLocalDate } from "../utils/date";
import type { Config, ReencodePolicy } from "../config";
import type { DateTagStore, ImageEncoder } from "../metadata/types";
import type { WriteReport, WriteRequest } from "./types";

const log = createLogger("writer");

export const METADATA_UNAVAILABLE_WARNING =
  "Metadata tool unavailable: date tags were not rewritten, only the file time was updated";

/**
 * Writes a new capture date into an image and its file timestamps.
 * Not transactional: a failure part way through can leave the destination
 * with new content but old tags or timestamps.
 */
export class DateWriter {
  private store: DateTagStore;
  private encoder: ImageEncoder;
  private jpegQuality: number;
  private reencode: ReencodePolicy;

  constructor(store: DateTagStore, encoder: ImageEncoder, config: Config["writer"]) {
    this.store = store;
    this.encoder = encoder;
    this.jpegQuality = config.jpegQuality;
    this.reencode = config.reencode;
  }

  async write(request: WriteRequest): Promise<WriteReport> {
    const { source, destination, date } = request;
    const inPlace = resolve(source) === resolve(destination);
    const report: WriteReport = {
      destination,
      reencoded: false,
      metadataWritten: false,
      warnings: [],
    };

    report.reencoded = await this.prepareDestination(source, destination, inPlace);

    const exifText = formatExifDateTime(date);
    if (await this.store.isAvailable()) {
      try {
        await this.store.writeDateTags(destination, exifText);
      } catch (error) {
        throw new IOError(destination, `Failed to write metadata: ${errorMessage(error)}`, error);
      }
      report.metadataWritten = true;
    } else {
      log.debug({ destination, store: this.store.name }, "Skipping date tags, metadata tool unavailable");
      report.warnings.push(METADATA_UNAVAILABLE_WARNING);
    }

    const time = toLocalDate(date);
    try {
      utimesSync(destination, time, time);
    } catch (error) {
      throw new IOError(destination, `Failed to set file time: ${errorMessage(error)}`, error);
    }

    log.debug({ source, destination, exifText, reencoded: report.reencoded }, "Wrote capture date");
    return report;
  }

  /** Returns whether the image was re-encoded */
  private async prepareDestination(source: string, destination: string, inPlace: boolean): Promise<boolean> {
    const shouldReencode =
      this.reencode === "always" || (this.reencode === "copy" && !inPlace);

    if (inPlace && !shouldReencode) {
      return false;
    }

    try {
      const dir = dirname(destination);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        log.debug({ dir }, "Created output directory");
      }

      if (shouldReencode) {
        await this.encoder.reencode(source, destination, this.jpegQuality);
        return true;
      }
      copyFileSync(source, destination);
      return false;
    } catch (error) {
      throw new IOError(destination, `Failed to write image: ${errorMessage(error)}`, error);
    }
  }
}
