/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { LOG_LEVELS } from "../types/index.js";
import type { AppConfig, LogLevel } from "../types/index.js";
import { ConfigError } from "./errors.js";
import {
  configStoreExists,
  getConfigStorePath,
  loadConfigStore,
  type ConfigStoreData,
} from "./config-store.js";

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  argv?: string[];
  /** Candidate .env files, first existing one wins */
  envFiles?: string[];
  configStorePath?: string;
}

/**
 * .env lookup order: working directory, home directory, project root.
 */
export function defaultEnvFiles(): string[] {
  return [
    path.join(process.cwd(), ".env"),
    path.join(os.homedir(), ".env"),
    path.join(projectRoot, ".env"),
  ];
}

/**
 * Resolve configuration from the environment, a discovered .env file and
 * ~/.canvas-mcp/config.json, in that order of precedence.
 *
 * @throws ConfigError if the API URL or token is missing or malformed
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const argv = options.argv ?? process.argv.slice(2);
  const envFiles = options.envFiles ?? defaultEnvFiles();

  // Variables already set in the environment take precedence over the file
  const envFile = envFiles.find((file) => fs.existsSync(file));
  const values: Record<string, string | undefined> = envFile
    ? { ...dotenv.parse(fs.readFileSync(envFile)), ...definedOnly(env) }
    : { ...env };

  const storePath = options.configStorePath ?? getConfigStorePath();
  const store: ConfigStoreData = configStoreExists(storePath) ? loadConfigStore(storePath) : {};

  const apiUrl = (values.CANVAS_API_URL || store.apiUrl || "").trim();
  const apiToken = (values.CANVAS_API_TOKEN || store.apiToken || "").trim();

  if (!apiUrl || !apiToken) {
    const missing = [
      !apiUrl ? "CANVAS_API_URL" : null,
      !apiToken ? "CANVAS_API_TOKEN" : null,
    ].filter((name): name is string => name !== null);
    throw new ConfigError(
      `${missing.join(" and ")} must be set. ` +
        `Export them, add them to a .env file in ${envFiles.join(", ")}, ` +
        `or set apiUrl/apiToken in ${storePath}.`,
    );
  }

  assertHttpUrl(apiUrl);

  return {
    apiUrl,
    apiToken,
    timeoutMs: parseTimeout(values.CANVAS_TIMEOUT_MS) ?? store.timeoutMs,
    logLevel: resolveLogLevel(values.CANVAS_LOG_LEVEL, argv) ?? store.logLevel ?? "INFO",
    envFile,
  };
}

function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function assertHttpUrl(apiUrl: string): void {
  let parsed: URL;
  try {
    parsed = new URL(apiUrl);
  } catch (error) {
    throw new ConfigError(
      `CANVAS_API_URL is not a valid URL: ${apiUrl}`,
      error instanceof Error ? error : undefined,
    );
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ConfigError(`CANVAS_API_URL must use http or https, got ${parsed.protocol}`);
  }
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const timeoutMs = Number(raw);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`CANVAS_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return timeoutMs;
}

function resolveLogLevel(raw: string | undefined, argv: string[]): LogLevel | undefined {
  if (argv.includes("--verbose") || argv.includes("-v")) return "DEBUG";
  if (raw === undefined || raw.trim() === "") return undefined;
  const level = LOG_LEVELS.find((l) => l === raw.trim().toUpperCase());
  if (!level) {
    throw new ConfigError(`CANVAS_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
  }
  return level;
}

export type { AppConfig };
