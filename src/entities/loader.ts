import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";

import type { LoadFailureMode } from "../config/hostConfig.js";
import { describeError, LoadFailureError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import { parseEntityDefinition } from "./define.js";
import { compileManifest, type HandlerCatalog } from "./manifest.js";
import { entityRegistry, type EntityRegistry, type RegistrySnapshot } from "./registry.js";
import type { EntityDescriptor, EntitySource, EntityUnitFormat } from "./types.js";

/** Extensions of data-only units, parsed and never executed. */
export const MANIFEST_EXTENSIONS: readonly string[] = [".yaml", ".yml", ".json"];

/** Extensions of executable units, imported only when modules are allowed. */
export const MODULE_EXTENSIONS: readonly string[] = [".mjs", ".js"];

export interface EntityLoaderOptions {
  readonly registry?: EntityRegistry;
  readonly logger?: StructuredLogger;
  readonly handlers?: HandlerCatalog;
  readonly failureMode?: LoadFailureMode;
  readonly allowModules?: boolean;
}

/** A unit skipped by an `isolate` load. */
export interface LoadFailure {
  readonly unit: string;
  readonly file: string;
  readonly error: LoadFailureError;
}

/** Outcome of a directory load or reload. */
export interface LoadReport {
  /** Registry state once the load was committed. */
  readonly snapshot: RegistrySnapshot;
  /** Units that loaded, in load order. */
  readonly units: readonly string[];
  /** Descriptors contributed by `units`. */
  readonly descriptors: number;
  /** Module units present on disk but not imported because modules are disabled. */
  readonly skipped: readonly string[];
  readonly failures: readonly LoadFailure[];
}

interface UnitFile {
  readonly unit: string;
  readonly file: string;
  readonly format: Exclude<EntityUnitFormat, "inline">;
}

function compareNames(left: UnitFile, right: UnitFile): number {
  const a = path.basename(left.file);
  const b = path.basename(right.file);
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Reads `default` (or `entities`) off a module namespace. */
function exportedDefinitions(namespace: unknown): unknown[] {
  if (typeof namespace !== "object" || namespace === null) {
    return [];
  }
  const exported: unknown = Reflect.get(namespace, "default") ?? Reflect.get(namespace, "entities");
  if (exported === undefined || exported === null) {
    return [];
  }
  return Array.isArray(exported) ? exported : [exported];
}

/**
 * Discovers definition units and registers the entities they declare.
 *
 * Units are files in a flat directory, loaded in file-name order and named
 * after their stem. Manifest units are parsed with YAML and bound to the
 * handler catalog. Module units are imported natively when `allowModules`
 * is set; otherwise they are reported as skipped.
 *
 * With `failureMode: "abort"` the first failing unit stops the batch and a
 * {@link LoadFailureError} is thrown; units loaded before it remain
 * registered by {@link loadFromDirectory}, while {@link reloadFromDirectory}
 * leaves the registry untouched. With `"isolate"` failing units are logged,
 * reported and skipped.
 */
export class EntityLoader {
  private readonly registry: EntityRegistry;
  private readonly logger: StructuredLogger;
  private readonly handlers: HandlerCatalog;
  private readonly failureMode: LoadFailureMode;
  private readonly allowModules: boolean;

  constructor(options: EntityLoaderOptions = {}) {
    this.registry = options.registry ?? entityRegistry;
    this.logger = options.logger ?? new StructuredLogger();
    this.handlers = options.handlers ?? {};
    this.failureMode = options.failureMode ?? "abort";
    this.allowModules = options.allowModules ?? false;
  }

  /**
   * Registers the entities declared by a manifest document. The text is
   * parsed as data; it is never evaluated.
   *
   * @throws LoadFailureError when the text cannot be parsed or bound.
   */
  loadFromSource(unit: string, text: string): RegistrySnapshot {
    const source: EntitySource = { unit, format: "manifest", text };
    let descriptors: EntityDescriptor[];
    try {
      descriptors = compileManifest(text, this.handlers, source);
    } catch (error) {
      const failure = new LoadFailureError({ unit }, error);
      this.logger.error("entity_unit_load_failed", { unit, error: describeError(failure) });
      throw failure;
    }
    const snapshot = this.registry.registerAll(descriptors);
    this.logger.info("entity_unit_loaded", { unit, format: "manifest", entities: descriptors.length });
    return snapshot;
  }

  /** Appends every unit of `directory` to the registry. Loads are not idempotent. */
  loadFromDirectory(directory: string): Promise<LoadReport> {
    return this.registry.runExclusive(async () => {
      const outcome = await this.loadUnits(directory, (descriptors) => {
        this.registry.registerAll(descriptors);
      });
      return { ...outcome, snapshot: this.registry.snapshot() };
    });
  }

  /**
   * Loads `directory` off to the side and publishes it as the whole registry
   * in one swap. Readers see the previous registry until the swap.
   */
  reloadFromDirectory(directory: string): Promise<LoadReport> {
    return this.registry.runExclusive(async () => {
      const staged: EntityDescriptor[] = [];
      const outcome = await this.loadUnits(directory, (descriptors) => {
        staged.push(...descriptors);
      });
      return { ...outcome, snapshot: this.registry.replace(staged) };
    });
  }

  private async loadUnits(
    directory: string,
    accept: (descriptors: EntityDescriptor[]) => void,
  ): Promise<Omit<LoadReport, "snapshot">> {
    const { files, skipped } = await this.discover(directory);
    const units: string[] = [];
    const failures: LoadFailure[] = [];
    let descriptorCount = 0;

    for (const file of files) {
      let descriptors: EntityDescriptor[];
      try {
        descriptors = await this.loadUnit(file);
      } catch (error) {
        const failure = new LoadFailureError({ unit: file.unit, file: file.file }, error);
        this.logger.error("entity_unit_load_failed", {
          unit: file.unit,
          file: file.file,
          failure_mode: this.failureMode,
          error: describeError(failure),
        });
        if (this.failureMode === "abort") {
          throw failure;
        }
        failures.push({ unit: file.unit, file: file.file, error: failure });
        continue;
      }
      accept(descriptors);
      units.push(file.unit);
      descriptorCount += descriptors.length;
      this.logger.debug("entity_unit_loaded", { unit: file.unit, format: file.format, entities: descriptors.length });
    }

    this.logger.info("entity_directory_loaded", {
      directory,
      units: units.length,
      entities: descriptorCount,
      skipped: skipped.length,
      failures: failures.length,
    });
    return { units, descriptors: descriptorCount, skipped, failures };
  }

  private async discover(directory: string): Promise<{ files: UnitFile[]; skipped: string[] }> {
    const entries = await readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
      throw new LoadFailureError({ unit: path.basename(directory), file: directory }, error);
    });

    const files: UnitFile[] = [];
    const skipped: string[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || entry.name.startsWith(".")) {
        continue;
      }
      const extension = path.extname(entry.name).toLowerCase();
      const unit = path.basename(entry.name, path.extname(entry.name));
      const file = path.join(directory, entry.name);
      if (MANIFEST_EXTENSIONS.includes(extension)) {
        files.push({ unit, file, format: "manifest" });
      } else if (MODULE_EXTENSIONS.includes(extension)) {
        if (this.allowModules) {
          files.push({ unit, file, format: "module" });
        } else {
          skipped.push(unit);
          this.logger.warn("entity_module_unit_skipped", { unit, file, reason: "module units are disabled" });
        }
      }
    }
    files.sort(compareNames);
    return { files, skipped };
  }

  private async loadUnit(file: UnitFile): Promise<EntityDescriptor[]> {
    const text = await readFile(file.file, "utf8");
    const source: EntitySource = { unit: file.unit, format: file.format, file: file.file, text };
    if (file.format === "manifest") {
      return compileManifest(text, this.handlers, source);
    }

    // ESM caches by URL: the modification time makes an edited unit load fresh.
    const { mtimeMs } = await stat(file.file);
    const url = `${pathToFileURL(file.file).href}?mtime=${Math.trunc(mtimeMs)}`;
    const namespace: unknown = await import(url);
    const definitions = exportedDefinitions(namespace);
    if (definitions.length === 0) {
      throw new Error("module exports no entity definition (expected a default or `entities` export)");
    }
    return definitions.map((definition) => parseEntityDefinition(definition, source));
  }
}
