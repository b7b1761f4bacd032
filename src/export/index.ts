import type { Config } from "../config";
import type { DateTagStore, ImageEncoder } from "../metadata/types";
import { ExiftoolTagStore } from "../metadata/exiftool";
import { DateWriter } from "./writer";
import { SharpEncoder } from "./encoder";

export function createTagStore(config: Config): DateTagStore {
  return new ExiftoolTagStore(config.exiftool);
}

export function createWriter(
  config: Config,
  store: DateTagStore,
  encoder: ImageEncoder = new SharpEncoder()
): DateWriter {
  return new DateWriter(store, encoder, config.writer);
}

export * from "./types";
export { DateWriter, METADATA_UNAVAILABLE_WARNING } from "./writer";
export { SharpEncoder } from "./encoder";
