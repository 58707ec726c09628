import YAML from "yaml";

import { normalizeLabel } from "../utils/labels.js";
import { DEFAULT_ENTITY_COLOR, DEFAULT_ENTITY_ICON, DEFAULT_TRANSFORM_ICON } from "./define.js";
import { textInput } from "./elements.js";

export interface ManifestTemplateOptions {
  readonly label: string;
  readonly description?: string;
  readonly author?: string;
}

/** Handler name the template binds its sample transform to. */
export function templateHandlerName(label: string): string {
  return `${normalizeLabel(label)}.to_example`;
}

/**
 * Renders the skeleton of a new manifest unit: one text input named
 * `Example` and one `To example` transform. The result loads through
 * `EntityLoader.loadFromSource` once the handler is in the catalog.
 */
export function renderManifestTemplate(options: ManifestTemplateOptions): string {
  const document = {
    label: options.label,
    description: options.description ?? "",
    author: options.author ?? "",
    color: DEFAULT_ENTITY_COLOR,
    icon: DEFAULT_ENTITY_ICON,
    is_available: true,
    elements: [textInput({ label: "Example" })],
    transforms: [{ label: "To example", icon: DEFAULT_TRANSFORM_ICON, handler: templateHandlerName(options.label) }],
  };
  return YAML.stringify(document);
}
