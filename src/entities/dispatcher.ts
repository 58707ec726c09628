import { describeError } from "../errors.js";
import { createDispatchContext, runWithDispatchContext } from "../infra/dispatchContext.js";
import { StructuredLogger } from "../logger.js";
import { normalizeLabel } from "../utils/labels.js";
import { compileBlueprint, type BlueprintValues } from "./blueprint.js";
import { mapToTransformInput, type GraphNodeLike } from "./inputMapper.js";
import type {
  Blueprint,
  EntityDescriptor,
  EntityRecord,
  ExecutionContext,
  TransformDefinition,
  TransformOutput,
} from "./types.js";

/** Entry of the transform menu shown for an entity. */
export interface TransformLabel {
  readonly label: string;
  readonly icon: string;
}

/**
 * Live instance of a descriptor. The handler table is built once, here:
 * each transform is indexed by its normalised label, and a later declaration
 * replaces an earlier one that normalises identically.
 */
export class EntityInstance {
  readonly descriptor: EntityDescriptor;
  private readonly handlers: ReadonlyMap<string, TransformDefinition>;

  constructor(descriptor: EntityDescriptor) {
    this.descriptor = descriptor;
    const handlers = new Map<string, TransformDefinition>();
    for (const transform of descriptor.transforms) {
      handlers.set(normalizeLabel(transform.label), transform);
    }
    this.handlers = handlers;
  }

  get label(): string {
    return this.descriptor.label;
  }

  /** Transforms in declaration order. */
  transformLabels(): TransformLabel[] {
    return this.descriptor.transforms.map((transform) => ({ label: transform.label, icon: transform.icon }));
  }

  /** Resolves a transform by any spelling of its label. */
  resolve(identifier: string): TransformDefinition | undefined {
    return this.handlers.get(normalizeLabel(identifier));
  }

  blueprint(values: BlueprintValues = {}): Blueprint {
    return compileBlueprint(this.descriptor, values);
  }
}

export interface TransformDispatcherOptions {
  readonly logger?: StructuredLogger;
  /** Millisecond clock used for durations; injectable for tests. */
  readonly clock?: () => number;
}

function isEntityRecord(value: unknown): value is EntityRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Normalises a handler's output to a list of records. */
function toRecordList(output: TransformOutput, transform: TransformDefinition): EntityRecord[] {
  if (output === null || output === undefined) {
    return [];
  }
  const candidates: unknown[] = Array.isArray(output) ? output : [output];
  const records: EntityRecord[] = [];
  candidates.forEach((candidate, index) => {
    if (!isEntityRecord(candidate)) {
      throw new TypeError(`transform "${transform.label}" returned a non-object record at index ${index}`);
    }
    records.push(candidate);
  });
  return records;
}

/**
 * Resolves and runs transforms. A dispatch moves through
 * resolving → (not found: `[]`) | mapping → invoking → success | failure.
 * Handler errors reach the caller unchanged; nothing is retried.
 */
export class TransformDispatcher {
  private readonly logger: StructuredLogger;
  private readonly clock: () => number;

  constructor(options: TransformDispatcherOptions = {}) {
    this.logger = options.logger ?? new StructuredLogger();
    this.clock = options.clock ?? Date.now;
  }

  async dispatch(
    instance: EntityInstance,
    transformIdentifier: string,
    node: GraphNodeLike,
    context: ExecutionContext,
  ): Promise<EntityRecord[]> {
    const transform = instance.resolve(transformIdentifier);
    if (!transform) {
      this.logger.warn("transform_not_found", {
        entity: instance.label,
        transform: transformIdentifier,
        normalized: normalizeLabel(transformIdentifier),
        available: instance.transformLabels().map((entry) => entry.label),
      });
      return [];
    }

    const dispatchContext = createDispatchContext(instance.label, transform.label, this.clock);
    return runWithDispatchContext(dispatchContext, async () => {
      const input = mapToTransformInput(node);
      this.logger.debug("transform_dispatch_started", { input_keys: input.keys() });

      let output: TransformOutput;
      try {
        output = await transform.run(input, context);
      } catch (error) {
        this.logger.error("transform_dispatch_failed", {
          error: describeError(error),
          duration_ms: this.clock() - dispatchContext.startedAt,
        });
        throw error;
      }

      const records = toRecordList(output, transform);
      for (const record of records) {
        record.edge_label = transform.edgeLabel;
      }
      this.logger.info("transform_dispatch_completed", {
        records: records.length,
        edge_label: transform.edgeLabel,
        duration_ms: this.clock() - dispatchContext.startedAt,
      });
      return records;
    });
  }
}

/** One-off dispatch without keeping a dispatcher around. */
export function dispatch(
  instance: EntityInstance,
  transformIdentifier: string,
  node: GraphNodeLike,
  context: ExecutionContext,
  options: TransformDispatcherOptions = {},
): Promise<EntityRecord[]> {
  return new TransformDispatcher(options).dispatch(instance, transformIdentifier, node, context);
}
