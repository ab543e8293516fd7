import { z } from "zod";
import { PluginContractError } from "../errors.js";
import { UNCHANGED, type ObserverResult } from "./types.js";

const MetadataValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
  z.null(),
]);

export const PluginResultSchema = z
  .object({
    metadata: z.record(z.string(), MetadataValueSchema).optional(),
    content: z.string().optional(),
    markers: z.array(z.string()).optional(),
  })
  .nullable();

export type PluginResult = z.infer<typeof PluginResultSchema>;

/**
 * Validates what a script or interpreter observer handed back. Accepts the
 * JSON text of the result or an already-decoded value; `null` means no change.
 */
export function parsePluginResult(observer: string, raw: unknown): ObserverResult {
  let value: unknown = raw ?? null;

  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch {
      throw new PluginContractError(observer, "result is not valid JSON");
    }
  }

  const parsed = PluginResultSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new PluginContractError(observer, `${where}${issue?.message ?? "unexpected shape"}`);
  }

  const result = parsed.data;
  if (!result || (result.metadata === undefined && result.content === undefined && result.markers === undefined)) {
    return UNCHANGED;
  }

  return {
    status: "modified",
    ...(result.metadata !== undefined ? { metadata: result.metadata } : {}),
    ...(result.content !== undefined ? { body: result.content } : {}),
    ...(result.markers !== undefined ? { markers: result.markers } : {}),
  };
}
