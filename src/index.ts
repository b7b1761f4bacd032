#!/usr/bin/env node

import { Command, InvalidArgumentError as CommanderArgumentError } from "commander";
import { initCommand } from "./commands/init";
import { setCommand, type SetOptions } from "./commands/set";
import { showCommand } from "./commands/show";

const program = new Command();

program
  .name("redate")
  .description("Change the year and month of JPEG capture dates, keeping day and time")
  .version("0.1.0");

// Parse a whole number argument
function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new CommanderArgumentError(`Not a whole number: ${value}`);
  }
  return parseInt(value, 10);
}

program
  .command("set")
  .description("Set the year (and optionally month) of a JPEG file or every JPEG in a folder")
  .argument("<path>", "JPEG file or folder")
  .argument("<year>", "New year (1900-2100)", parseInteger)
  .argument("[month]", "New month (1-12), keeps the original month if omitted", parseInteger)
  .option("-o, --output <path>", "Write to this file or folder instead of overwriting")
  .option("-r, --recursive", "Process subfolders")
  .option("-d, --dry-run", "Show what would change without modifying anything")
  .option("--json", "Output as JSON")
  .action((path: string, year: number, month: number | undefined, options: SetOptions) =>
    setCommand(path, year, month, options)
  );

program
  .command("show")
  .description("Show the current capture date of a JPEG file or every JPEG in a folder")
  .argument("<path>", "JPEG file or folder")
  .option("-r, --recursive", "Process subfolders")
  .option("--json", "Output as JSON")
  .action(showCommand);

program
  .command("init")
  .description("Create a config file with the default settings")
  .option("--local", "Create redate.yaml in the current directory instead of the global location")
  .action(initCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
