import path from "node:path";

import { readBool, readEnum, readInt, readOptionalString, readString, type EnvSource } from "./env.js";

/** How a batch load reacts to a unit that fails. */
export const LOAD_FAILURE_MODES = ["abort", "isolate"] as const;
export type LoadFailureMode = (typeof LOAD_FAILURE_MODES)[number];

/** Resolved configuration of an {@link EntityHost}. */
export interface HostConfig {
  /** Absolute directory scanned by `start` and `refresh`. */
  readonly pluginsDir: string;
  readonly failureMode: LoadFailureMode;
  /** Whether executable module units (`.mjs`, `.js`) may be imported. */
  readonly allowModuleUnits: boolean;
  readonly logFile: string | null;
  readonly logMaxFileBytes: number;
}

const DEFAULT_PLUGINS_DIR = "plugins";
const DEFAULT_LOG_MAX_FILE_BYTES = 5 * 1024 * 1024;

/**
 * Builds the host configuration from environment variables:
 *
 * - `ENTITY_PLUGINS_DIR` (default `plugins`, resolved against `cwd`)
 * - `ENTITY_LOAD_FAILURE_MODE` (`abort` | `isolate`, default `abort`)
 * - `ENTITY_ALLOW_MODULE_UNITS` (default `false`)
 * - `ENTITY_LOG_FILE` (unset disables the file mirror)
 * - `ENTITY_LOG_MAX_BYTES` (rotation threshold, default 5 MiB)
 */
export function resolveHostConfig(env: EnvSource = process.env, cwd: string = process.cwd()): HostConfig {
  const pluginsDir = path.resolve(cwd, readString("ENTITY_PLUGINS_DIR", DEFAULT_PLUGINS_DIR, env));
  const logFile = readOptionalString("ENTITY_LOG_FILE", env);
  return {
    pluginsDir,
    failureMode: readEnum("ENTITY_LOAD_FAILURE_MODE", LOAD_FAILURE_MODES, "abort", env),
    allowModuleUnits: readBool("ENTITY_ALLOW_MODULE_UNITS", false, env),
    logFile: logFile ? path.resolve(cwd, logFile) : null,
    logMaxFileBytes: readInt("ENTITY_LOG_MAX_BYTES", DEFAULT_LOG_MAX_FILE_BYTES, { min: 1 }, env),
  };
}
