import { z } from "zod";
import { MalformedTagSpecError } from "../errors";
import type { InstanceTagSpecification } from "../types/compute";

/**
 * Wire shape of the `tag-specifications` input, the same JSON the EC2
 * RunInstances API takes:
 * `[{"ResourceType":"instance","Tags":[{"Key":"Name","Value":"runner"}]}]`
 */
export const TagSpecificationsSchema = z.array(
  z.object({
    ResourceType: z.string().min(1),
    Tags: z
      .array(
        z.object({
          Key: z.string().min(1),
          Value: z.string().default(""),
        })
      )
      .default([]),
  })
);

/**
 * Parse the JSON-encoded tag specifications. An empty string means none.
 *
 * @throws MalformedTagSpecError on invalid JSON or an unexpected shape
 */
export function parseTagSpecifications(
  json: string | undefined
): InstanceTagSpecification[] | undefined {
  if (!json || json.trim() === "") {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedTagSpecError(detail, error);
  }

  const parsed = TagSpecificationsSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MalformedTagSpecError(detail, parsed.error);
  }

  return parsed.data.map((spec) => ({
    resourceType: spec.ResourceType,
    tags: spec.Tags.map((tag) => ({ key: tag.Key, value: tag.Value })),
  }));
}
