import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getDispatchContext, type DispatchContext } from "./infra/dispatchContext.js";

/** Placeholder inserted when a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling redaction despite configured tokens. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are replaced when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "cookie",
  "set-cookie",
]);

/**
 * Parses the `ENTITY_LOG_REDACT` directives. The value is a comma-separated
 * list mixing toggles (`on`, `off`, ...) and literal substrings to scrub from
 * string values, e.g. `"on,sk-"`. Custom substrings without an explicit toggle
 * enable redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  if (directives.length === 0) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  // Toggles and substrings may be mixed in any order; the last toggle wins.
  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  if (enabled === undefined) {
    enabled = tokens.length > 0;
  }

  // Deduplicate while preserving insertion order so each pattern is applied once.
  return { enabled, tokens: Array.from(new Set(tokens)) };
}

/** Default size (bytes) of the mirrored log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

/** Default number of log files kept, the active one included. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  dispatch_id?: string;
  entity?: string;
  transform?: string;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Substrings or patterns scrubbed from string values when redaction is on. */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Explicit toggle for payload redaction. When omitted the logger follows
   * the `ENTITY_LOG_REDACT` environment variable.
   */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/** Extracts the `code` of Node's errno-flavoured errors. */
function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Structured logger emitting JSON lines on stdout and optionally mirroring
 * them to a file. File writes are queued sequentially to keep ordering.
 */
export class StructuredLogger {
  /** Mirror destination; `undefined` keeps the logger on stdout only. */
  private readonly logFile?: string;
  private readonly maxFileSizeBytes?: number;
  private readonly maxFileCount: number;
  /** Environment tokens merged with the constructor patterns. */
  private readonly redactSecrets: Array<string | RegExp>;
  /**
   * Tail of the sequential file writes. Every entry chains onto it so lines
   * land in emission order even though each append is asynchronous.
   */
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory holding {@link logFile} has been created. */
  private logDirectoryReady = false;
  /** Optional listener invoked with a copy of every entry. */
  private readonly entryListener?: (entry: LogEntry) => void;
  /** Explicit option first, then the `ENTITY_LOG_REDACT` toggle. */
  private readonly redactionEnabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.ENTITY_LOG_REDACT);
    const combined = new Set<string | RegExp>(directives.tokens);
    for (const entry of options.redactSecrets ?? []) {
      combined.add(entry);
    }
    this.redactSecrets = [...combined];
    this.entryListener = options.onEntry;
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Waits for pending file writes; tests use it before reading the mirror. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const dispatch = getDispatchContext();
    const safePayload = payload !== undefined ? this.redactStructuredValue(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.correlationFields(dispatch),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);
    // Listeners get a clone so they cannot alter what reaches the file mirror.
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const target = this.logFile;
    if (!target) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(target);
          await this.rotateIfNeeded(target, Buffer.byteLength(line, "utf8"));
          await appendFile(target, line, "utf8");
        } catch (err) {
          this.reportInternalFailure("log_file_write_failed", err);
          // Let the next entry retry directory creation.
          this.logDirectoryReady = false;
        }
      })
      .catch((err: unknown) => {
        // Already reported; restart the chain for later writes.
        this.reportInternalFailure("log_queue_failed", err);
        this.writeQueue = Promise.resolve();
      });
  }

  private correlationFields(dispatch: DispatchContext | undefined): Partial<LogEntry> {
    if (!dispatch) {
      return {};
    }
    return { dispatch_id: dispatch.dispatchId, entity: dispatch.entity, transform: dispatch.transform };
  }

  /** Failures of the logger itself go to stderr, never to the file mirror. */
  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: error instanceof Error ? { message: error.message } : { error: String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active file when appending `pendingBytes` would exceed the
   * size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    if (!this.maxFileSizeBytes) {
      return;
    }

    // A missing file means nothing has been written since the last rotation.
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      this.reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  /**
   * Shifts archives up by one, oldest first, so no rename overwrites a file
   * that has not moved yet: `.N-1` is dropped, `.i` becomes `.i+1`, and the
   * active file becomes `.1`.
   */
  private async performRotation(logFile: string): Promise<void> {
    const keep = this.maxFileCount;
    // Keeping a single file means truncating the active one.
    if (keep === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${keep - 1}`, { force: true });

    for (let index = keep - 2; index >= 1; index -= 1) {
      await this.renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await this.renameIfPresent(logFile, `${logFile}.1`);
  }

  /** Archives may have gaps when earlier rotations were interrupted. */
  private async renameIfPresent(source: string, target: string): Promise<void> {
    try {
      await rename(source, target);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw error;
      }
    }
  }

  private redactStructuredValue(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  /**
   * Walks arrays and plain objects. Values under sensitive keys are replaced
   * wholesale; every other string is scrubbed of the configured secrets.
   */
  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  /** String patterns replace every occurrence; regexes follow their own flags. */
  private scrub(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}
