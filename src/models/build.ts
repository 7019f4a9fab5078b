import { z } from "zod";
import {
  MinimalBranchSchema,
  MinimalBuildSchema,
  MinimalCommitSchema,
  MinimalJobSchema,
  MinimalOwnerSchema,
  MinimalRepositorySchema,
  MinimalStageSchema,
} from "./minimal.js";

export const BuildSchema = MinimalBuildSchema.extend({
  repository: MinimalRepositorySchema,
  branch: MinimalBranchSchema,
  tag: z.object({ name: z.string() }).passthrough().nullish(),
  commit: MinimalCommitSchema,
  jobs: z.array(MinimalJobSchema),
  stages: z.array(MinimalStageSchema).optional(),
  created_by: MinimalOwnerSchema.optional(),
  updated_at: z.string().optional(),
}).passthrough();

export const BuildListSchema = z.array(BuildSchema);

export type Build = z.infer<typeof BuildSchema>;
