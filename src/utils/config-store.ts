/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { ConfigError } from "./errors.js";

/** Schema for ~/.canvas-mcp/config.json */
export const ConfigStoreSchema = z.object({
  apiUrl: z.string().optional(),
  apiToken: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  logLevel: z.enum(["DEBUG", "INFO", "WARN", "ERROR"]).optional(),
});

export type ConfigStoreData = z.infer<typeof ConfigStoreSchema>;

const CONFIG_DIR = path.join(os.homedir(), ".canvas-mcp");
const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");

export function configStoreExists(filePath: string = CONFIG_FILE): boolean {
  return fs.existsSync(filePath);
}

export function loadConfigStore(filePath: string = CONFIG_FILE): ConfigStoreData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `could not read ${filePath}`,
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = ConfigStoreSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid settings in ${filePath}: ${issues.join(", ")}`);
  }
  return parsed.data;
}

export function getConfigStorePath(): string {
  return CONFIG_FILE;
}
