import { stat } from "node:fs/promises";

import { resolveHostConfig, type HostConfig } from "./config/hostConfig.js";
import type { EnvSource } from "./config/env.js";
import { compileBlueprint } from "./entities/blueprint.js";
import { EntityInstance, TransformDispatcher, type TransformLabel } from "./entities/dispatcher.js";
import { EntityLoader, type LoadReport } from "./entities/loader.js";
import type { HandlerCatalog } from "./entities/manifest.js";
import { entityRegistry, summarizeDescriptor, type EntityRegistry } from "./entities/registry.js";
import type {
  Blueprint,
  EntityDescriptor,
  EntityRecord,
  EntitySummary,
  EntityUnitFormat,
  ExecutionContext,
} from "./entities/types.js";
import { parseGraphNode } from "./entities/wire.js";
import { StructuredLogger } from "./logger.js";

export interface EntityHostOptions {
  readonly config: HostConfig;
  readonly logger?: StructuredLogger;
  readonly registry?: EntityRegistry;
  readonly handlers?: HandlerCatalog;
}

/** Row of the operator listing of registered entities. */
export interface EntityListing extends EntitySummary {
  /** Position in the registry; stable until the next reload. */
  readonly id: number;
  readonly available: boolean;
  readonly unit: string | null;
  readonly format: EntityUnitFormat;
  readonly file: string | null;
  /** ISO timestamp of the unit file's last modification. */
  readonly modifiedAt: string | null;
}

export interface EntitySourceView extends EntityListing {
  readonly source: string | null;
}

async function modificationTime(file: string | undefined): Promise<string | null> {
  if (!file) {
    return null;
  }
  try {
    const info = await stat(file);
    return info.mtime.toISOString();
  } catch {
    // The unit may have been removed since the last reload.
    return null;
  }
}

/**
 * Facade the serving layer talks to. It owns the loader and the dispatcher
 * and reads every answer from the current registry snapshot.
 */
export class EntityHost {
  readonly config: HostConfig;
  readonly registry: EntityRegistry;
  readonly loader: EntityLoader;
  private readonly logger: StructuredLogger;
  private readonly dispatcher: TransformDispatcher;

  constructor(options: EntityHostOptions) {
    this.config = options.config;
    this.logger = options.logger ?? new StructuredLogger();
    this.registry = options.registry ?? entityRegistry;
    this.loader = new EntityLoader({
      registry: this.registry,
      logger: this.logger,
      handlers: options.handlers,
      failureMode: options.config.failureMode,
      allowModules: options.config.allowModuleUnits,
    });
    this.dispatcher = new TransformDispatcher({ logger: this.logger });
  }

  /** Initial load of the plugins directory. */
  async start(): Promise<LoadReport> {
    this.logger.info("entity_host_starting", {
      plugins_dir: this.config.pluginsDir,
      failure_mode: this.config.failureMode,
      module_units: this.config.allowModuleUnits,
    });
    return this.loader.reloadFromDirectory(this.config.pluginsDir);
  }

  /** Reloads the plugins directory atomically and returns the UI listing. */
  async refresh(): Promise<readonly EntitySummary[]> {
    const report = await this.loader.reloadFromDirectory(this.config.pluginsDir);
    return report.snapshot.listing;
  }

  /** Every registered entity, available or not, with its unit metadata. */
  async listEntities(): Promise<EntityListing[]> {
    const { descriptors } = this.registry.snapshot();
    return Promise.all(descriptors.map((descriptor, id) => this.describe(descriptor, id)));
  }

  /** Listing row of entity `id` plus the text of its unit. */
  async entitySource(id: number): Promise<EntitySourceView | undefined> {
    if (!Number.isInteger(id) || id < 0) {
      return undefined;
    }
    const descriptor = this.registry.snapshot().descriptors.at(id);
    if (!descriptor) {
      return undefined;
    }
    const listing = await this.describe(descriptor, id);
    return { ...listing, source: descriptor.source?.text ?? null };
  }

  blueprint(label: string): Blueprint | undefined {
    const descriptor = this.registry.lookup(label);
    return descriptor ? compileBlueprint(descriptor) : undefined;
  }

  /** Transform menu of an entity; `[]` when the label is unknown. */
  transforms(label: string): TransformLabel[] {
    const descriptor = this.registry.lookup(label);
    return descriptor ? new EntityInstance(descriptor).transformLabels() : [];
  }

  /**
   * Validates `payload` as a graph node and runs the transform it names on
   * the entity it describes. An unknown entity yields `[]`.
   *
   * @throws PayloadValidationError when the payload is not a graph node.
   */
  async runTransform(payload: unknown, context: ExecutionContext): Promise<EntityRecord[]> {
    const node = parseGraphNode(payload);
    const descriptor = this.registry.lookup(node.data.label);
    if (!descriptor) {
      this.logger.warn("entity_not_found", { label: node.data.label, transform: node.transform });
      return [];
    }
    return this.dispatcher.dispatch(new EntityInstance(descriptor), node.transform, node, context);
  }

  private async describe(descriptor: EntityDescriptor, id: number): Promise<EntityListing> {
    const source = descriptor.source;
    return {
      ...summarizeDescriptor(descriptor),
      id,
      available: descriptor.isAvailable,
      unit: source?.unit ?? null,
      format: source?.format ?? "inline",
      file: source?.file ?? null,
      modifiedAt: await modificationTime(source?.file),
    };
  }
}

export interface CreateEntityHostOptions {
  readonly env?: EnvSource;
  readonly cwd?: string;
  readonly handlers?: HandlerCatalog;
  readonly registry?: EntityRegistry;
  readonly logger?: StructuredLogger;
}

/**
 * Builds a host from environment configuration. The logger mirrors to
 * `ENTITY_LOG_FILE` when it is set.
 */
export function createEntityHost(options: CreateEntityHostOptions = {}): EntityHost {
  const config = resolveHostConfig(options.env ?? process.env, options.cwd ?? process.cwd());
  const logger =
    options.logger ?? new StructuredLogger({ logFile: config.logFile, maxFileSizeBytes: config.logMaxFileBytes });
  return new EntityHost({ config, logger, registry: options.registry, handlers: options.handlers });
}
