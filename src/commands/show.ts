import ora from "ora";
import { loadConfig } from "../config";
import { createTagStore, createWriter } from "../export";
import { errorMessage } from "../errors";
import { Redater } from "../pipeline/redater";
import { formatCaptureDate } from "../utils/date";
import { printDateTable } from "../utils/table";
import { checkTagStore } from "./set";

export interface ShowOptions {
  recursive?: boolean;
  json?: boolean;
}

/**
 * show - Print the current capture date of a file or of every JPEG in a folder
 */
export async function showCommand(target: string, options: ShowOptions = {}): Promise<void> {
  const config = loadConfig();
  const spinner = ora({ isSilent: options.json });
  const store = createTagStore(config);

  try {
    await checkTagStore(store, spinner);

    const redater = new Redater(store, createWriter(config, store), {
      extensions: config.files.extensions,
    });
    const images = await redater.inspect(target, { recursive: options.recursive });

    if (images.some((image) => image.error)) {
      process.exitCode = 1;
    }

    if (options.json) {
      const rows = images.map((image) => ({
        path: image.path,
        date: image.captureDate ? formatCaptureDate(image.captureDate) : null,
        source: image.source ?? null,
        error: image.error ? { code: image.error.code, message: image.error.message } : null,
      }));
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    if (images.length === 0) {
      console.log(`No JPEG files found in ${target}`);
      return;
    }

    printDateTable(
      images.map((image, i) => ({
        index: i + 1,
        path: image.path,
        current: image.captureDate,
        source: image.source,
        note: image.error?.message,
      })),
      config.display.columns.filename
    );
  } catch (error) {
    spinner.fail(errorMessage(error));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}
