import { ConfigurationError } from "../errors.js";
import { normalizeLabel } from "../utils/labels.js";
import { cloneJsonLike, cloneRecord, isPlainRecord } from "../utils/object.js";
import { entityRegistry, type EntityRegistry } from "./registry.js";
import {
  isLayoutRow,
  type Blueprint,
  type BlueprintElement,
  type BlueprintGroup,
  type EntityDescriptor,
  type GraphNode,
  type LayoutElement,
} from "./types.js";

/**
 * Values injected into a blueprint, keyed by normalised leaf label. A scalar
 * becomes the leaf's `value`; a plain object is merged onto the leaf.
 */
export type BlueprintValues = Readonly<Record<string, unknown>>;

function compileLeaf(
  descriptor: EntityDescriptor,
  leaf: LayoutElement,
  position: string,
  values: BlueprintValues,
): BlueprintElement {
  const kind = leaf.type;
  if (typeof kind !== "string" || kind.length === 0) {
    throw new ConfigurationError(
      `entity "${descriptor.label}" declares a layout element without a type at ${position}`,
      {
        hint: "every layout element needs a `type` naming its kind",
        details: { entity: descriptor.label, position, element: leaf.label },
      },
    );
  }

  const compiled: BlueprintElement = { ...cloneRecord(leaf), type: kind, label: leaf.label };
  const key = normalizeLabel(leaf.label);
  if (!Object.prototype.hasOwnProperty.call(values, key)) {
    return compiled;
  }
  const injected = values[key];
  if (isPlainRecord(injected)) {
    Object.assign(compiled, cloneRecord(injected));
  } else if (injected !== null && injected !== undefined) {
    compiled.value = cloneJsonLike(injected);
  }
  return compiled;
}

/**
 * Compiles the descriptor's layout into its wire schema. Rows keep their
 * grouping. The descriptor is left untouched; the result shares no object
 * with it.
 *
 * @throws ConfigurationError when a leaf has no `type`.
 */
export function compileBlueprint(descriptor: EntityDescriptor, values: BlueprintValues = {}): Blueprint {
  const elements: BlueprintGroup[] = descriptor.layout.map((group, index) => {
    if (isLayoutRow(group)) {
      return group.map((leaf, column) => compileLeaf(descriptor, leaf, `layout[${index}][${column}]`, values));
    }
    return compileLeaf(descriptor, group, `layout[${index}]`, values);
  });

  return {
    label: descriptor.label,
    color: descriptor.color,
    icon: descriptor.icon,
    data: { elements },
  };
}

/**
 * Resolves `label` in the registry and compiles its blueprint. Handlers use it
 * to build the records they return:
 *
 * ```ts
 * return createBlueprint("website", { domain: host });
 * ```
 */
export function createBlueprint(
  label: string,
  values: BlueprintValues = {},
  registry: EntityRegistry = entityRegistry,
): Blueprint | undefined {
  const descriptor = registry.lookup(label);
  return descriptor ? compileBlueprint(descriptor, values) : undefined;
}

/** Wraps a blueprint into the graph node a client sends back for a transform. */
export function toGraphNode(blueprint: Blueprint, options: { id: string | number; transform: string }): GraphNode {
  return {
    id: options.id,
    data: {
      label: blueprint.label,
      color: blueprint.color,
      icon: blueprint.icon,
      elements: blueprint.data.elements.map((group) =>
        Array.isArray(group) ? group.map((leaf) => cloneRecord(leaf)) : cloneRecord(group),
      ),
    },
    transform: options.transform,
  };
}
