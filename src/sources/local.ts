import { readdirSync, statSync, type Dirent } from "fs";
import { join, extname } from "path";
import { createLogger } from "../logger";
import { InvalidArgumentError, IOError, NotFoundError, errorMessage } from "../errors";

const logger = createLogger("local-source");

export const DEFAULT_EXTENSIONS = [".jpg", ".jpeg"];

export interface FindOptions {
  recursive?: boolean;
  extensions?: string[];
}

export function isJpegFile(filePath: string, extensions: string[] = DEFAULT_EXTENSIONS): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext !== "" && extensions.some((e) => e.toLowerCase() === ext);
}

/**
 * List JPEG files under a folder, sorted by full path.
 */
export function findJpegFiles(folderPath: string, options: FindOptions = {}): string[] {
  let stats;
  try {
    stats = statSync(folderPath);
  } catch {
    throw new NotFoundError(folderPath, "Folder");
  }
  if (!stats.isDirectory()) {
    throw new InvalidArgumentError(`Not a folder: ${folderPath}`);
  }

  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  const files: string[] = [];
  collectFiles(folderPath, extensions, options.recursive ?? false, files, true);

  // Code-unit order, independent of locale
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function collectFiles(
  dirPath: string,
  extensions: string[],
  recursive: boolean,
  files: string[],
  isRoot: boolean
): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    if (isRoot) throw new IOError(dirPath, errorMessage(error), error);
    logger.warn({ directory: dirPath, error }, "Directory not readable, skipping");
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);

    // Linked folders are not followed, linked files are
    if (entry.isDirectory()) {
      if (recursive) {
        collectFiles(fullPath, extensions, recursive, files, false);
      }
    } else if (isFile(entry, fullPath) && isJpegFile(entry.name, extensions)) {
      files.push(fullPath);
    }
  }
}

function isFile(entry: Dirent, fullPath: string): boolean {
  if (!entry.isSymbolicLink()) return entry.isFile();
  try {
    return statSync(fullPath).isFile();
  } catch {
    return false;
  }
}
