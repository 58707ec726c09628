import { z } from "zod";

import { PayloadValidationError } from "../errors.js";
import { formatIssues } from "./define.js";
import type { GraphNode } from "./types.js";

const WireElementSchema = z.record(z.unknown());

/** Graph node as sent by the serving layer. Unknown fields are kept. */
export const GraphNodeSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    data: z
      .object({
        label: z.string().refine((value) => value.trim().length > 0, "entity label must not be blank"),
        color: z.string().optional(),
        icon: z.string().optional(),
        elements: z.array(z.union([WireElementSchema, z.array(WireElementSchema)])).default([]),
      })
      .passthrough(),
    transform: z.string(),
  })
  .passthrough();

/**
 * Validates an untrusted payload as a {@link GraphNode}.
 *
 * @throws PayloadValidationError listing the offending paths.
 */
export function parseGraphNode(payload: unknown): GraphNode {
  const parsed = GraphNodeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PayloadValidationError(`graph node payload is invalid: ${formatIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
      hint: "send { id, data: { label, elements }, transform }",
    });
  }
  return parsed.data;
}
