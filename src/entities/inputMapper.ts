import { normalizeLabel } from "../utils/labels.js";
import { isPlainRecord, omitKeysAndEmpty } from "../utils/object.js";
import { SELECTABLE_OPTION_KIND } from "./elements.js";
import { TransformInput } from "./transformInput.js";
import type { TransformInputRecord } from "./types.js";

/** Fields that only matter to the renderer and never reach a handler. */
const RENDERING_FIELDS: ReadonlySet<string> = new Set(["label", "type", "icon", "placeholder", "style", "options"]);

/** Loose view of a node: the mapper reads only `data.elements`. */
export type GraphNodeLike = { readonly data?: { readonly elements?: readonly unknown[] } };

/**
 * Writes one wire leaf into `record`. Leaves without a string label are
 * ignored; leaves with nothing left after stripping leave no key behind.
 */
function mapLeaf(record: TransformInputRecord, leaf: unknown): void {
  if (!isPlainRecord(leaf)) {
    return;
  }
  const label = leaf.label;
  if (typeof label !== "string") {
    return;
  }
  const key = normalizeLabel(label);
  const fields = omitKeysAndEmpty(leaf, RENDERING_FIELDS);
  const names = Object.keys(fields);
  if (names.length === 0) {
    return;
  }

  if (leaf.type === SELECTABLE_OPTION_KIND) {
    record[key] = "value" in fields ? fields.value : fields[names[names.length - 1]];
    return;
  }
  if (names.length === 1 && typeof fields[names[0]] === "string") {
    record[key] = fields[names[0]];
    return;
  }
  record[key] = fields;
}

/**
 * Flattens `node.data.elements` (rows one level deep) into the record a
 * handler receives. A single remaining string field collapses to that string
 * and a dropdown collapses to its selected option; any other leaf keeps its
 * remaining fields as a nested map. Later leaves overwrite earlier ones with
 * the same normalised label.
 */
export function mapToInputRecord(node: GraphNodeLike): TransformInputRecord {
  const record: TransformInputRecord = {};
  const elements: readonly unknown[] = node.data?.elements ?? [];
  for (const group of elements) {
    if (Array.isArray(group)) {
      for (const leaf of group) {
        mapLeaf(record, leaf);
      }
    } else {
      mapLeaf(record, group);
    }
  }
  return record;
}

/** {@link mapToInputRecord} wrapped with the typed accessors handlers use. */
export function mapToTransformInput(node: GraphNodeLike): TransformInput {
  return new TransformInput(mapToInputRecord(node));
}
