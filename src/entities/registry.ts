import { AsyncMutex } from "../infra/mutex.js";
import { StructuredLogger } from "../logger.js";
import { normalizeLabel } from "../utils/labels.js";
import type { EntityDescriptor, EntitySummary } from "./types.js";

const DEFAULT_DESCRIPTION = "Description not available.";
const DEFAULT_AUTHOR = "Author not provided.";

/**
 * Immutable state of the registry. The three parallel structures are always
 * built together and published with a single assignment, so a reader holding
 * a snapshot never sees them disagree.
 */
export interface RegistrySnapshot {
  /** Incremented on every publication; reset and reload included. */
  readonly generation: number;
  /** Descriptors in registration order. */
  readonly descriptors: readonly EntityDescriptor[];
  /** Trimmed raw label of `descriptors[i]` at index `i`. */
  readonly labels: readonly string[];
  /** UI listing of the available descriptors, in registration order. */
  readonly listing: readonly EntitySummary[];
}

export interface EntityRegistryOptions {
  readonly logger?: StructuredLogger;
}

/** Builds the UI summary shown for an available descriptor. */
export function summarizeDescriptor(descriptor: EntityDescriptor): EntitySummary {
  const author =
    typeof descriptor.author === "string" ? descriptor.author : descriptor.author.join(", ");
  return {
    label: descriptor.label.trim(),
    description: descriptor.description.length > 0 ? descriptor.description : DEFAULT_DESCRIPTION,
    author: author.length > 0 ? author : DEFAULT_AUTHOR,
  };
}

function buildSnapshot(generation: number, descriptors: readonly EntityDescriptor[]): RegistrySnapshot {
  return Object.freeze({
    generation,
    descriptors: Object.freeze([...descriptors]),
    labels: Object.freeze(descriptors.map((descriptor) => descriptor.label.trim())),
    listing: Object.freeze(
      descriptors.filter((descriptor) => descriptor.isAvailable).map(summarizeDescriptor),
    ),
  });
}

/**
 * Ordered ledger of entity descriptors.
 *
 * Registration never rejects duplicates. Lookups scan in registration order
 * and return the first descriptor whose label matches, so when two raw labels
 * normalise identically the first registered one shadows the other. Whether
 * such shadowing is intended by plugin authors is unknown; the registry logs
 * it and keeps the first-match result stable.
 *
 * Concurrency: readers use the current snapshot without locking. Writers
 * publish a complete new snapshot. Multi-step writers (directory loads,
 * reloads) serialise through {@link runExclusive}.
 */
export class EntityRegistry {
  private state: RegistrySnapshot = buildSnapshot(0, []);
  private readonly mutex = new AsyncMutex();
  private logger: StructuredLogger;

  constructor(options: EntityRegistryOptions = {}) {
    this.logger = options.logger ?? new StructuredLogger();
  }

  /** Replaces the logger used for registry events. */
  useLogger(logger: StructuredLogger): void {
    this.logger = logger;
  }

  get generation(): number {
    return this.state.generation;
  }

  get size(): number {
    return this.state.descriptors.length;
  }

  /** Current snapshot; safe to hold across awaits. */
  snapshot(): RegistrySnapshot {
    return this.state;
  }

  list(): readonly EntityDescriptor[] {
    return this.state.descriptors;
  }

  labels(): readonly string[] {
    return this.state.labels;
  }

  listAvailable(): readonly EntitySummary[] {
    return this.state.listing;
  }

  /** Appends a descriptor; returns the snapshot that contains it. */
  register(descriptor: EntityDescriptor): RegistrySnapshot {
    return this.registerAll([descriptor]);
  }

  /** Appends a batch in one publication. */
  registerAll(descriptors: readonly EntityDescriptor[]): RegistrySnapshot {
    if (descriptors.length === 0) {
      return this.state;
    }
    const current = this.state;
    const next = buildSnapshot(current.generation + 1, [...current.descriptors, ...descriptors]);
    this.reportShadowing(current.descriptors, descriptors);
    this.state = next;
    for (const descriptor of descriptors) {
      this.logger.debug("entity_registered", {
        label: descriptor.label,
        normalized: normalizeLabel(descriptor.label),
        unit: descriptor.source?.unit ?? null,
        generation: next.generation,
      });
    }
    return next;
  }

  /**
   * First descriptor whose trimmed label equals `label`, or whose normalised
   * label equals the normalised query. `undefined` is the not-found signal.
   */
  lookup(label: string): EntityDescriptor | undefined {
    return findInSnapshot(this.state, label);
  }

  /** Alias kept for callers that spell out the normalisation. */
  lookupByNormalizedLabel(label: string): EntityDescriptor | undefined {
    return this.lookup(label);
  }

  /** Publishes an empty snapshot. */
  reset(): RegistrySnapshot {
    const next = buildSnapshot(this.state.generation + 1, []);
    this.state = next;
    this.logger.info("entity_registry_reset", { generation: next.generation });
    return next;
  }

  /**
   * Publishes a registry made only of `descriptors`, built off to the side.
   * Readers observe either the previous snapshot or this one.
   */
  replace(descriptors: readonly EntityDescriptor[]): RegistrySnapshot {
    this.reportShadowing([], descriptors);
    const next = buildSnapshot(this.state.generation + 1, descriptors);
    this.state = next;
    this.logger.info("entity_registry_replaced", { generation: next.generation, size: descriptors.length });
    return next;
  }

  /** Serialises multi-step writers. Readers never wait on it. */
  runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(operation);
  }

  private reportShadowing(existing: readonly EntityDescriptor[], incoming: readonly EntityDescriptor[]): void {
    const seen = new Map<string, string>();
    for (const descriptor of existing) {
      const key = normalizeLabel(descriptor.label);
      if (!seen.has(key)) {
        seen.set(key, descriptor.label);
      }
    }
    for (const descriptor of incoming) {
      const key = normalizeLabel(descriptor.label);
      const first = seen.get(key);
      if (first === undefined) {
        seen.set(key, descriptor.label);
        continue;
      }
      this.logger.warn("entity_label_shadowed", {
        label: descriptor.label,
        shadowed_by: first,
        normalized: key,
        unit: descriptor.source?.unit ?? null,
      });
    }
  }
}

/** Linear first-match scan over a snapshot. */
export function findInSnapshot(snapshot: RegistrySnapshot, label: string): EntityDescriptor | undefined {
  const query = label.trim();
  const normalizedQuery = normalizeLabel(label);
  for (let index = 0; index < snapshot.labels.length; index += 1) {
    const candidate = snapshot.labels[index];
    if (candidate === query || normalizeLabel(candidate) === normalizedQuery) {
      return snapshot.descriptors[index];
    }
  }
  return undefined;
}

/**
 * Process-wide registry. Plugin discovery registers into it at startup;
 * handlers read it to build blueprints of other entities.
 */
export const entityRegistry = new EntityRegistry();

/**
 * Prepares the process-wide registry: attaches the logger and, when
 * `descriptors` are given, publishes them as the only content.
 */
export function initEntityRegistry(
  options: { logger?: StructuredLogger; descriptors?: readonly EntityDescriptor[] } = {},
): EntityRegistry {
  if (options.logger) {
    entityRegistry.useLogger(options.logger);
  }
  if (options.descriptors) {
    entityRegistry.replace(options.descriptors);
  }
  return entityRegistry;
}

/** Empties the process-wide registry. */
export function resetEntityRegistry(): RegistrySnapshot {
  return entityRegistry.reset();
}
