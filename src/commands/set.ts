import ora from "ora";
import cliProgress from "cli-progress";
import { existsSync, statSync } from "fs";
import { basename } from "path";
import { loadConfig, type Config } from "../config";
import { createTagStore, createWriter } from "../export";
import { errorMessage } from "../errors";
import { Redater, type BatchResult, type FileOutcome, type RedateEvent } from "../pipeline/redater";
import { validateSubstitution, type DateSubstitution } from "../pipeline/transform";
import type { DateTagStore } from "../metadata/types";
import { formatCaptureDate } from "../utils/date";
import { describeSource, printDateTable } from "../utils/table";

export type Spinner = ReturnType<typeof ora>;

export interface SetOptions {
  output?: string;
  recursive?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

export function outcomeToJson(outcome: FileOutcome): Record<string, unknown> {
  return {
    path: outcome.path,
    outputPath: outcome.outputPath,
    status: outcome.status,
    original: outcome.original ? formatCaptureDate(outcome.original) : null,
    updated: outcome.updated ? formatCaptureDate(outcome.updated) : null,
    source: outcome.source ?? null,
    metadataWritten: outcome.metadataWritten ?? null,
    warnings: outcome.warnings,
    error: outcome.error ? { code: outcome.error.code, message: outcome.error.message } : null,
  };
}

/**
 * set - Change the year (and optionally month) of one file or a folder of files
 */
export async function setCommand(
  target: string,
  year: number,
  month: number | undefined,
  options: SetOptions = {}
): Promise<void> {
  const config = loadConfig();
  const spinner = ora({ isSilent: options.json });
  const substitution: DateSubstitution = { year, month };

  try {
    validateSubstitution(substitution);
  } catch (error) {
    spinner.fail(errorMessage(error));
    process.exitCode = 1;
    return;
  }

  if (!existsSync(target)) {
    spinner.fail(`Path not found: ${target}`);
    process.exitCode = 1;
    return;
  }

  const store = createTagStore(config);
  try {
    await checkTagStore(store, spinner);

    if (statSync(target).isDirectory()) {
      await setFolder(target, substitution, options, config, store);
    } else {
      await setFile(target, substitution, options, config, store, spinner);
    }
  } catch (error) {
    spinner.fail(errorMessage(error));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

export async function checkTagStore(store: DateTagStore, spinner: Spinner): Promise<void> {
  spinner.start("Starting metadata tool...");
  if (await store.isAvailable()) {
    spinner.succeed(`Metadata tool ready (${store.name})`);
  } else {
    spinner.warn(`${store.name} unavailable: dates fall back to file times and tags are not rewritten`);
  }
}

async function setFile(
  target: string,
  substitution: DateSubstitution,
  options: SetOptions,
  config: Config,
  store: DateTagStore,
  spinner: Spinner
): Promise<void> {
  const redater = new Redater(store, createWriter(config, store), {
    extensions: config.files.extensions,
  });

  const outcome = await redater.processFile(target, substitution, {
    output: options.output,
    dryRun: options.dryRun,
  });

  if (options.json) {
    console.log(JSON.stringify(outcomeToJson(outcome), null, 2));
    return;
  }

  const from = outcome.original ? formatCaptureDate(outcome.original) : "?";
  const to = outcome.updated ? formatCaptureDate(outcome.updated) : "?";
  const source = describeSource(outcome.source);

  if (outcome.status === "planned") {
    console.log("[Dry run] No changes will be made");
    console.log(`Would change: ${from} -> ${to} (${source})`);
    return;
  }

  for (const warning of outcome.warnings) {
    spinner.warn(warning);
  }
  spinner.succeed(`${basename(outcome.outputPath)}: ${from} -> ${to} (${source})`);
}

async function setFolder(
  target: string,
  substitution: DateSubstitution,
  options: SetOptions,
  config: Config,
  store: DateTagStore
): Promise<void> {
  const spinner = ora({ isSilent: options.json });
  const showProgress = !options.dryRun && !options.json;

  const progressBar = new cliProgress.SingleBar(
    {
      format: "Redating |{bar}| {percentage}% | {value}/{total} | Failed: {failed} | {file}",
      barsize: config.display.progressBarWidth,
    },
    cliProgress.Presets.shades_classic
  );
  let failedSoFar = 0;

  const onEvent = (event: RedateEvent): void => {
    switch (event.type) {
      case "discovered":
        spinner.info(
          `Found ${event.count} JPEG files in ${event.folder}${event.recursive ? " (recursive)" : ""}`
        );
        if (showProgress && event.count > 0) {
          progressBar.start(event.count, 0, { failed: 0, file: "" });
        }
        break;
      case "file-start":
        if (showProgress) progressBar.update({ file: basename(event.path) });
        break;
      case "file-done":
        if (event.outcome.status === "failed") failedSoFar++;
        if (showProgress) progressBar.increment({ failed: failedSoFar });
        break;
    }
  };

  const redater = new Redater(store, createWriter(config, store), {
    extensions: config.files.extensions,
    onEvent,
  });

  const result: BatchResult = await redater
    .processFolder(target, substitution, {
      output: options.output,
      recursive: options.recursive,
      dryRun: options.dryRun,
    })
    .finally(() => progressBar.stop());

  if (result.failed > 0) {
    process.exitCode = 1;
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          succeeded: result.succeeded,
          failed: result.failed,
          total: result.total,
          outcomes: result.outcomes.map(outcomeToJson),
        },
        null,
        2
      )
    );
    return;
  }

  if (result.total === 0) {
    console.log("No JPEG files found.");
    return;
  }

  if (options.dryRun) {
    console.log("\n[Dry run] No changes will be made");
    printDateTable(
      result.outcomes.map((o, i) => ({
        index: i + 1,
        path: o.path,
        current: o.original,
        updated: o.updated,
        source: o.source,
        note: o.error?.message,
      })),
      config.display.columns.filename
    );
    console.log(`\nWould change ${result.succeeded} of ${result.total} files.`);
    return;
  }

  const failures = result.outcomes.filter((o) => o.status === "failed");
  if (failures.length > 0) {
    console.log("\nFailed:");
    for (const outcome of failures) {
      console.log(`  ✗ ${outcome.path}: ${outcome.error?.message ?? "unknown error"}`);
    }
  }

  const skippedTags = result.outcomes.filter((o) => o.status === "succeeded" && !o.metadataWritten);
  if (skippedTags.length > 0) {
    console.log(`\n${skippedTags.length} file(s) had only their file time updated (metadata tool unavailable).`);
  }

  console.log("\nSummary:");
  console.log(`  Total files: ${result.total}`);
  console.log(`  Succeeded:   ${result.succeeded}`);
  console.log(`  Failed:      ${result.failed}`);
}
