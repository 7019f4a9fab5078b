import { z } from "zod";
import { MinimalBuildSchema, MinimalRepositorySchema } from "./minimal.js";

export const BranchSchema = z
  .object({
    "@type": z.literal("branch"),
    "@href": z.string().nullish(),
    "@representation": z.string().optional(),
    name: z.string(),
    repository: MinimalRepositorySchema,
    default_branch: z.boolean(),
    exists_on_github: z.boolean(),
    last_build: MinimalBuildSchema.nullable(),
  })
  .passthrough();

export const BranchListSchema = z.array(BranchSchema);

export type Branch = z.infer<typeof BranchSchema>;
