import YAML from "yaml";
import { z } from "zod";

import { DefinitionError } from "../errors.js";
import { isPlainRecord } from "../utils/object.js";
import { defineEntity, formatIssues, LayoutGroupSchema } from "./define.js";
import type { EntityDescriptor, EntitySource, TransformRun } from "./types.js";

/**
 * Name → function table binding manifest transforms to code. Manifests only
 * reference handlers by name; nothing in a manifest is ever executed.
 */
export type HandlerCatalog = Readonly<Record<string, TransformRun>>;

const NonBlankString = z.string().refine((value) => value.trim().length > 0, "must not be blank");

const ManifestTransformSchema = z
  .object({
    label: NonBlankString,
    icon: z.string().min(1).optional(),
    edge_label: z.string().min(1).optional(),
    handler: z.string().min(1),
  })
  .strict();

/**
 * One entity as written in a manifest unit. Keys follow the snake_case wire
 * vocabulary; `elements` is the layout.
 */
export const ManifestEntitySchema = z
  .object({
    label: NonBlankString,
    color: z.string().min(1).optional(),
    icon: z.string().min(1).optional(),
    author: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    is_available: z.boolean().optional(),
    elements: z.array(LayoutGroupSchema).default([]),
    transforms: z.array(ManifestTransformSchema).default([]),
  })
  .strict();

const ManifestCollectionSchema = z
  .object({
    entities: z.array(ManifestEntitySchema).min(1),
  })
  .strict();

export type ManifestEntity = z.infer<typeof ManifestEntitySchema>;

/**
 * Parses the text of a manifest unit. A document is either one entity or an
 * `entities` list. JSON documents go through the same YAML parser.
 *
 * @throws DefinitionError when the document does not match the manifest schema.
 */
export function parseManifest(text: string, unit: string): ManifestEntity[] {
  const raw: unknown = YAML.parse(text);
  const collection = isPlainRecord(raw) && "entities" in raw;
  const parsed = collection ? ManifestCollectionSchema.safeParse(raw) : ManifestEntitySchema.safeParse(raw);
  if (!parsed.success) {
    throw new DefinitionError(`manifest "${unit}" is invalid: ${formatIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
      details: { unit },
    });
  }
  return "entities" in parsed.data ? parsed.data.entities : [parsed.data];
}

/**
 * Turns a manifest entity into a descriptor, resolving every transform
 * handler in `handlers`.
 *
 * @throws DefinitionError naming the first handler missing from the catalog.
 */
export function bindManifestEntity(
  entity: ManifestEntity,
  handlers: HandlerCatalog,
  source: EntitySource,
): EntityDescriptor {
  const transforms = entity.transforms.map((transform) => {
    const run = Object.hasOwn(handlers, transform.handler) ? handlers[transform.handler] : undefined;
    if (!run) {
      throw new DefinitionError(
        `transform "${transform.label}" of entity "${entity.label}" references unknown handler "${transform.handler}"`,
        {
          hint: "register the handler in the host's handler catalog",
          details: { unit: source.unit, entity: entity.label, handler: transform.handler },
        },
      );
    }
    return { label: transform.label, icon: transform.icon, edgeLabel: transform.edge_label, run };
  });

  return defineEntity(
    {
      label: entity.label,
      color: entity.color,
      icon: entity.icon,
      author: entity.author,
      description: entity.description,
      isAvailable: entity.is_available,
      layout: entity.elements,
      transforms,
    },
    source,
  );
}

/** Parses and binds every entity of a manifest unit. */
export function compileManifest(text: string, handlers: HandlerCatalog, source: EntitySource): EntityDescriptor[] {
  return parseManifest(text, source.unit).map((entity) => bindManifestEntity(entity, handlers, source));
}
