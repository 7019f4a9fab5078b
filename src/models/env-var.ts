import { z } from "zod";

export const EnvironmentVariableSchema = z
  .object({
    "@type": z.literal("env_var"),
    "@href": z.string().nullish(),
    "@representation": z.string().optional(),
    id: z.string(),
    name: z.string(),
    // Private variables come back without a value.
    value: z.string().nullish(),
    public: z.boolean(),
    branch: z.string().nullish(),
  })
  .passthrough();

export const EnvironmentVariableListSchema = z.array(EnvironmentVariableSchema);

export type EnvironmentVariable = z.infer<typeof EnvironmentVariableSchema>;

export interface EnvironmentVariableRequest {
  name: string;
  value: string;
  public: boolean;
  branch?: string | null;
}

/**
 * Write bodies use dotted keys: { "env_var.name": ..., "env_var.value": ... }.
 * Only the fields present are encoded, so the same function serves PATCH.
 */
export function encodeEnvironmentVariable(
  request: Partial<EnvironmentVariableRequest>
): Record<string, string | boolean | null> {
  const body: Record<string, string | boolean | null> = {};
  if (request.name !== undefined) {
    body["env_var.name"] = request.name;
  }
  if (request.value !== undefined) {
    body["env_var.value"] = request.value;
  }
  if (request.public !== undefined) {
    body["env_var.public"] = request.public;
  }
  if (request.branch !== undefined) {
    body["env_var.branch"] = request.branch;
  }
  return body;
}
