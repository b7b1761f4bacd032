import { statSync } from "fs";
import { basename, join, relative } from "path";
import { createLogger } from "../logger";
import {
  InvalidArgumentError,
  IOError,
  NotFoundError,
  RedateError,
  errorMessage,
} from "../errors";
import { findJpegFiles, isJpegFile, DEFAULT_EXTENSIONS } from "../sources/local";
import { resolveCaptureDate } from "../metadata/reader";
import type { DateTagStore } from "../metadata/types";
import type { DateWriter } from "../export/writer";
import type { DateSource, ImageRecord } from "../sources/types";
import type { CaptureDate } from "../utils/date";
import { substituteDate, validateSubstitution, type DateSubstitution } from "./transform";

const log = createLogger("redater");

export type FileStatus = "succeeded" | "failed" | "planned";

export interface FileOutcome {
  path: string;
  outputPath: string;
  status: FileStatus;
  original?: CaptureDate;
  updated?: CaptureDate;
  source?: DateSource;
  metadataWritten?: boolean;
  warnings: string[];
  error?: RedateError;
}

export interface BatchResult {
  readonly succeeded: number;
  readonly failed: number;
  readonly total: number;
  readonly outcomes: readonly FileOutcome[];
}

export interface InspectedImage extends ImageRecord {
  error?: RedateError;
}

export type RedateEvent =
  | { type: "discovered"; folder: string; count: number; recursive: boolean }
  | { type: "file-start"; path: string; index: number; total: number }
  | { type: "file-done"; outcome: FileOutcome; index: number; total: number };

export type EventCallback = (event: RedateEvent) => void;

export interface RedaterOptions {
  extensions?: string[];
  onEvent?: EventCallback;
}

export interface FileOptions {
  /** Output file, or an existing folder to write into */
  output?: string;
  dryRun?: boolean;
}

export interface FolderOptions {
  /** Output folder; the source tree is mirrored beneath it */
  output?: string;
  recursive?: boolean;
  dryRun?: boolean;
}

function toRedateError(filePath: string, error: unknown): RedateError {
  if (error instanceof RedateError) return error;
  return new IOError(filePath, errorMessage(error), error);
}

/**
 * Applies a year/month substitution to single files or whole folders.
 * Files are handled one at a time, in sorted order.
 */
export class Redater {
  private store: DateTagStore;
  private writer: DateWriter;
  private extensions: string[];
  private onEvent?: EventCallback;

  constructor(store: DateTagStore, writer: DateWriter, options: RedaterOptions = {}) {
    this.store = store;
    this.writer = writer;
    this.extensions = options.extensions ?? DEFAULT_EXTENSIONS;
    this.onEvent = options.onEvent;
  }

  /**
   * Redate one file. Any failure is thrown.
   */
  async processFile(
    filePath: string,
    substitution: DateSubstitution,
    options: FileOptions = {}
  ): Promise<FileOutcome> {
    validateSubstitution(substitution);
    this.checkImageFile(filePath);

    let outputPath = filePath;
    if (options.output) {
      outputPath = isDirectory(options.output)
        ? join(options.output, basename(filePath))
        : options.output;
    }

    const outcome = this.newOutcome(filePath, outputPath);
    await this.redate(outcome, substitution, options.dryRun ?? false);
    return outcome;
  }

  /**
   * Redate every JPEG in a folder. Per-file failures are recorded and the batch continues.
   */
  async processFolder(
    folderPath: string,
    substitution: DateSubstitution,
    options: FolderOptions = {}
  ): Promise<BatchResult> {
    validateSubstitution(substitution);
    const recursive = options.recursive ?? false;
    const dryRun = options.dryRun ?? false;

    const files = findJpegFiles(folderPath, { recursive, extensions: this.extensions });
    this.onEvent?.({ type: "discovered", folder: folderPath, count: files.length, recursive });
    log.debug({ folderPath, count: files.length, recursive, dryRun }, "Discovered files");

    const outcomes: FileOutcome[] = [];
    let succeeded = 0;
    let failed = 0;

    for (const [i, filePath] of files.entries()) {
      const index = i + 1;
      this.onEvent?.({ type: "file-start", path: filePath, index, total: files.length });

      const outputPath = options.output
        ? join(options.output, relative(folderPath, filePath))
        : filePath;
      const outcome = this.newOutcome(filePath, outputPath);

      try {
        await this.redate(outcome, substitution, dryRun);
        succeeded++;
      } catch (error) {
        outcome.status = "failed";
        outcome.error = toRedateError(filePath, error);
        failed++;
        log.debug({ filePath, error: outcome.error.message, code: outcome.error.code }, "Failed to redate file");
      }

      Object.freeze(outcome.warnings);
      outcomes.push(Object.freeze(outcome));
      this.onEvent?.({ type: "file-done", outcome, index, total: files.length });
    }

    return Object.freeze({
      succeeded,
      failed,
      total: files.length,
      outcomes: Object.freeze(outcomes),
    });
  }

  /**
   * Current capture date of a file, or of every JPEG in a folder. Nothing is modified.
   */
  async inspect(targetPath: string, options: { recursive?: boolean } = {}): Promise<InspectedImage[]> {
    if (!isDirectory(targetPath)) {
      this.checkImageFile(targetPath);
      const { date, source } = await resolveCaptureDate(targetPath, this.store);
      return [{ path: targetPath, captureDate: date, source }];
    }

    const files = findJpegFiles(targetPath, {
      recursive: options.recursive ?? false,
      extensions: this.extensions,
    });

    const images: InspectedImage[] = [];
    for (const filePath of files) {
      try {
        const { date, source } = await resolveCaptureDate(filePath, this.store);
        images.push({ path: filePath, captureDate: date, source });
      } catch (error) {
        images.push({ path: filePath, error: toRedateError(filePath, error) });
      }
    }
    return images;
  }

  private checkImageFile(filePath: string): void {
    let stats;
    try {
      stats = statSync(filePath);
    } catch {
      throw new NotFoundError(filePath);
    }
    if (!stats.isFile() || !isJpegFile(filePath, this.extensions)) {
      throw new InvalidArgumentError(`Not a JPEG file: ${filePath}`);
    }
  }

  private newOutcome(filePath: string, outputPath: string): FileOutcome {
    return { path: filePath, outputPath, status: "failed", warnings: [] };
  }

  /** Fills in the outcome as it goes, so a failure keeps what was learned */
  private async redate(outcome: FileOutcome, substitution: DateSubstitution, dryRun: boolean): Promise<void> {
    const { date, source } = await resolveCaptureDate(outcome.path, this.store);
    outcome.original = date;
    outcome.source = source;

    outcome.updated = substituteDate(date, substitution);

    if (dryRun) {
      outcome.status = "planned";
      return;
    }

    const report = await this.writer.write({
      source: outcome.path,
      destination: outcome.outputPath,
      date: outcome.updated,
    });
    outcome.metadataWritten = report.metadataWritten;
    outcome.warnings.push(...report.warnings);
    outcome.status = "succeeded";
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
