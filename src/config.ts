import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

const configSchema = z.object({
  files: z
    .object({
      extensions: z.array(z.string().startsWith(".")).min(1).default([".jpg", ".jpeg"]),
    })
    .default({}),
  writer: z
    .object({
      jpegQuality: z.number().int().min(1).max(100).default(95),
      reencode: z.enum(["copy", "always", "never"]).default("copy"),
    })
    .default({}),
  exiftool: z
    .object({
      taskTimeoutMillis: z.number().min(1000).max(600000).default(20000),
    })
    .default({}),
  display: z
    .object({
      progressBarWidth: z.number().min(10).max(100).default(20),
      columns: z
        .object({
          filename: z.number().min(10).max(100).default(40),
        })
        .default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ReencodePolicy = Config["writer"]["reencode"];

const CONFIG_FILENAME = "config.yaml";
const LOCAL_CONFIG_FILENAME = "redate.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "redate");

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getLocalConfigPath(): string {
  return join(process.cwd(), LOCAL_CONFIG_FILENAME);
}

export function getConfigPath(): string {
  if (process.env.REDATE_CONFIG) {
    return process.env.REDATE_CONFIG;
  }
  const localPath = getLocalConfigPath();
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw ?? {});
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!existsSync(configPath)) {
    // Return defaults if no config exists
    return parseConfig({});
  }

  const content = readFileSync(configPath, "utf-8");
  return parseConfig(parseYaml(content));
}

export function getDefaultConfig(): string {
  return `# redate configuration

files:
  extensions:               # Matched case-insensitively
    - ".jpg"
    - ".jpeg"

writer:
  jpegQuality: 95           # Quality used when re-encoding (1-100)
  reencode: copy            # "copy": re-encode only when writing to --output
                            # "always": re-encode in place too
                            # "never": copy bytes, only rewrite metadata

exiftool:
  taskTimeoutMillis: 20000  # Per-file timeout for metadata reads and writes

display:
  progressBarWidth: 20      # Width of progress bar in characters
  columns:
    filename: 40            # Filename column width
`;
}
