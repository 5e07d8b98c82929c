import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { ConfigFileSchema, DEFAULT_TEMPLATE } from "./types.js";
import type { ElapsedConfig } from "./types.js";
import { log } from "./utils/logger.js";

export const CONFIG_FILE_NAME = "elapsed.yaml";

export const DEFAULT_CONFIG: ElapsedConfig = { template: DEFAULT_TEMPLATE };

// ─── Config File Loading ─────────────────────────────────────────────────────

export function loadConfig(configPath?: string): ElapsedConfig {
  // If explicit path provided, it must exist
  if (configPath) {
    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return parseConfigFile(configPath);
  }

  const autoPath = path.join(getProjectRoot(), CONFIG_FILE_NAME);
  if (fs.existsSync(autoPath)) {
    log.dim(`Loading config from ${autoPath}`);
    return parseConfigFile(autoPath);
  }

  return DEFAULT_CONFIG;
}

export function parseConfig(content: string): ElapsedConfig {
  // An empty file parses to null; treat it as an empty mapping
  const raw: unknown = parse(content) ?? {};
  const result = ConfigFileSchema.safeParse(raw);

  if (!result.success) {
    throw new Error(`Invalid config file: ${result.error.message}`);
  }

  return result.data;
}

function parseConfigFile(filePath: string): ElapsedConfig {
  return parseConfig(fs.readFileSync(filePath, "utf-8"));
}

// ─── Paths ───────────────────────────────────────────────────────────────────

export function getProjectRoot(): string {
  return process.cwd();
}
