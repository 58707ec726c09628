import type { TransformInput } from "./transformInput.js";

/**
 * Leaf of an entity layout. The host treats leaves as opaque records: `label`
 * is the only required field and `type` is the kind discriminator. Every
 * other field travels untouched to the blueprint.
 */
export interface LayoutElement {
  readonly label: string;
  readonly [field: string]: unknown;
}

/** Leaves rendered side by side. Rows never nest. */
export type LayoutRow = readonly LayoutElement[];

export type LayoutGroup = LayoutElement | LayoutRow;

/** Record produced by a transform, usually a blueprint of another entity. */
export type EntityRecord = { [key: string]: unknown; edge_label?: string };

/** Anything a transform may hand back: one record, several, or none. */
export type TransformOutput = EntityRecord | EntityRecord[] | null | undefined | void;

/** Handle to an external capability that must be released after use. */
export interface ScopedResource {
  close(): Promise<void> | void;
}

/** Acquires a fresh automation handle; the caller owns its release. */
export type DriverFactory<TDriver extends ScopedResource = ScopedResource> = () => Promise<TDriver> | TDriver;

/**
 * Per-invocation context supplied by the caller of a dispatch and handed to
 * the handler unchanged. The host never builds one itself.
 */
export interface ExecutionContext<TDriver extends ScopedResource = ScopedResource> {
  readonly driverFactory: DriverFactory<TDriver>;
  readonly settings: Readonly<Record<string, unknown>>;
  /** Cancellation requested by the serving layer; handlers decide how to honour it. */
  readonly signal?: AbortSignal;
}

export type TransformRun = (
  input: TransformInput,
  context: ExecutionContext,
) => TransformOutput | Promise<TransformOutput>;

/** A transform bound to one entity descriptor. */
export interface TransformDefinition {
  /** Display label; its normalised form is the dispatch key. */
  readonly label: string;
  readonly icon: string;
  /** Attached to every record the transform produces. */
  readonly edgeLabel: string;
  readonly run: TransformRun;
}

export type EntityUnitFormat = "manifest" | "module" | "inline";

/** Where a descriptor came from when it went through the loader. */
export interface EntitySource {
  readonly unit: string;
  readonly format: EntityUnitFormat;
  readonly file?: string;
  /** Raw unit text, kept for manifest units so operators can inspect them. */
  readonly text?: string;
}

/** A registered entity definition. */
export interface EntityDescriptor {
  readonly label: string;
  readonly color: string;
  readonly icon: string;
  readonly author: string | readonly string[];
  readonly description: string;
  /** Gates the UI listing only; lookups ignore it. */
  readonly isAvailable: boolean;
  readonly layout: readonly LayoutGroup[];
  readonly transforms: readonly TransformDefinition[];
  readonly source?: EntitySource;
}

/** UI-visible summary kept in the registry listing. */
export interface EntitySummary {
  readonly label: string;
  readonly description: string;
  readonly author: string;
}

/** Compiled leaf: the kind discriminator is guaranteed. */
export type BlueprintElement = { type: string; label: string; [field: string]: unknown };

export type BlueprintGroup = BlueprintElement | BlueprintElement[];

/** Wire schema of an entity, optionally pre-filled with values. */
export type Blueprint = {
  label: string;
  color: string;
  icon: string;
  data: { elements: BlueprintGroup[] };
};

/** Leaf as it travels on the wire, carrying its live `value`. */
export type WireElement = Record<string, unknown>;

export type WireGroup = WireElement | WireElement[];

/** Value-filled entity instance plus the transform requested on it. */
export interface GraphNode {
  id: string | number;
  data: {
    label: string;
    color?: string;
    icon?: string;
    elements: WireGroup[];
  };
  transform: string;
}

/**
 * Flat input of a transform: normalised leaf label to a scalar or a nested
 * field map. Unknown labels pass through; absent leaves are absent keys.
 */
export type TransformInputRecord = Record<string, unknown>;

/** Runtime guard distinguishing a row from a single leaf. */
export function isLayoutRow(group: LayoutGroup): group is LayoutRow {
  return Array.isArray(group);
}
