import { z } from "zod";
import { MinimalBranchSchema, MinimalOwnerSchema } from "./minimal.js";

export const RepositorySchema = z
  .object({
    "@type": z.literal("repository"),
    "@href": z.string().nullish(),
    "@representation": z.string().optional(),
    id: z.number().int(),
    name: z.string(),
    slug: z.string(),
    description: z.string().nullable(),
    github_id: z.number().int().optional(),
    github_language: z.string().nullish(),
    active: z.boolean(),
    private: z.boolean(),
    owner: MinimalOwnerSchema,
    default_branch: MinimalBranchSchema,
    starred: z.boolean(),
    managed_by_installation: z.boolean().optional(),
    active_on_org: z.boolean().nullish(),
  })
  .passthrough();

export const RepositoryListSchema = z.array(RepositorySchema);

export type Repository = z.infer<typeof RepositorySchema>;
