import { z } from "zod";

import { DefinitionError } from "../errors.js";
import { isPlainRecord } from "../utils/object.js";
import type {
  EntityDescriptor,
  EntitySource,
  LayoutElement,
  LayoutGroup,
  TransformDefinition,
  TransformRun,
} from "./types.js";

export const DEFAULT_ENTITY_COLOR = "#145070";
export const DEFAULT_ENTITY_ICON = "atom-2";
export const DEFAULT_TRANSFORM_ICON = "list";
export const DEFAULT_EDGE_LABEL = "transformed_to";

/**
 * Leaf as accepted at definition time. The kind discriminator is not checked
 * here: a missing `type` surfaces when the blueprint is compiled.
 */
export const LayoutElementSchema = z.object({ label: z.string() }).passthrough();

export const LayoutGroupSchema = z.union([LayoutElementSchema, z.array(LayoutElementSchema)]);

const TransformRunSchema = z.custom<TransformRun>((value) => typeof value === "function", {
  message: "transform run must be a function",
});

const TransformDefinitionSchema = z
  .object({
    label: z.string().refine((value) => value.trim().length > 0, "transform label must not be blank"),
    icon: z.string().min(1).default(DEFAULT_TRANSFORM_ICON),
    edgeLabel: z.string().min(1).default(DEFAULT_EDGE_LABEL),
    run: TransformRunSchema,
  })
  .strict();

const EntityDefinitionSchema = z
  .object({
    label: z.string().refine((value) => value.trim().length > 0, "entity label must not be blank"),
    color: z.string().min(1).default(DEFAULT_ENTITY_COLOR),
    icon: z.string().min(1).default(DEFAULT_ENTITY_ICON),
    author: z.union([z.string(), z.array(z.string())]).default(""),
    description: z.string().default(""),
    isAvailable: z.boolean().default(true),
    layout: z.array(LayoutGroupSchema).default([]),
    transforms: z.array(TransformDefinitionSchema).default([]),
  })
  .strict();

/** Transform as written by a definition author. */
export type TransformDefinitionInput = z.input<typeof TransformDefinitionSchema>;

/** Entity as written by a definition author; omitted metadata takes defaults. */
export interface EntityDefinition {
  readonly label: string;
  readonly color?: string;
  readonly icon?: string;
  readonly author?: string | readonly string[];
  readonly description?: string;
  readonly isAvailable?: boolean;
  readonly layout?: readonly LayoutGroup[];
  readonly transforms?: readonly TransformDefinitionInput[];
}

/** Formats zod issues as `path: message` fragments. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function freezeLayout(layout: ReadonlyArray<LayoutElement | LayoutElement[]>): readonly LayoutGroup[] {
  return Object.freeze(
    layout.map((group): LayoutGroup =>
      Array.isArray(group) ? Object.freeze(group.map((leaf) => Object.freeze({ ...leaf }))) : Object.freeze({ ...group }),
    ),
  );
}

/**
 * Validates a definition and returns the descriptor the registry stores.
 * Registration is a separate, explicit step (`registry.register`).
 *
 * ```ts
 * const url = defineEntity({
 *   label: "URL",
 *   layout: [textInput({ label: "URL", icon: "link" })],
 *   transforms: [defineTransform("To website", async (input) => ...)],
 * });
 * entityRegistry.register(url);
 * ```
 */
export function defineEntity(definition: EntityDefinition, source?: EntitySource): EntityDescriptor {
  return parseEntityDefinition(definition, source);
}

/**
 * Same as {@link defineEntity} for values of unknown shape, such as the
 * exports of a module unit.
 */
export function parseEntityDefinition(definition: unknown, source?: EntitySource): EntityDescriptor {
  const parsed = EntityDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    const label = isPlainRecord(definition) && typeof definition.label === "string" ? definition.label : "<unlabelled>";
    throw new DefinitionError(`entity "${label}" is invalid: ${formatIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
      details: { label, ...(source ? { unit: source.unit } : {}) },
    });
  }
  const value = parsed.data;
  const transforms: TransformDefinition[] = value.transforms.map((transform) =>
    Object.freeze({ label: transform.label, icon: transform.icon, edgeLabel: transform.edgeLabel, run: transform.run }),
  );
  return Object.freeze({
    label: value.label,
    color: value.color,
    icon: value.icon,
    author: Array.isArray(value.author) ? Object.freeze([...value.author]) : value.author,
    description: value.description,
    isAvailable: value.isAvailable,
    layout: freezeLayout(value.layout),
    transforms: Object.freeze(transforms),
    ...(source ? { source } : {}),
  });
}

/** Shorthand building a transform entry for {@link defineEntity}. */
export function defineTransform(
  label: string,
  run: TransformRun,
  options: { icon?: string; edgeLabel?: string } = {},
): TransformDefinitionInput {
  return { label, run, ...options };
}
