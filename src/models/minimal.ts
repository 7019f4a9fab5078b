/**
 * Minimal representations.
 *
 * Resources embed each other as stubs carrying a subset of fields and an
 * `@href` pointing at the full representation. Some stubs (synthetic
 * entities) have no href and cannot be followed.
 */

import { z } from "zod";

function stub<K extends string>(type: K) {
  return z.object({
    "@type": z.literal(type),
    "@href": z.string().nullish(),
    "@representation": z.string().optional(),
  });
}

export const BuildState = z.enum([
  "created",
  "received",
  "started",
  "passed",
  "failed",
  "errored",
  "canceled",
]);
export type BuildState = z.infer<typeof BuildState>;

export const MinimalUserSchema = stub("user")
  .extend({
    id: z.number().int(),
    login: z.string(),
  })
  .passthrough();

export const MinimalOrganizationSchema = stub("organization")
  .extend({
    id: z.number().int(),
    login: z.string(),
  })
  .passthrough();

export const MinimalOwnerSchema = z.discriminatedUnion("@type", [
  MinimalUserSchema,
  MinimalOrganizationSchema,
]);

export const MinimalRepositorySchema = stub("repository")
  .extend({
    id: z.number().int(),
    name: z.string(),
    slug: z.string(),
  })
  .passthrough();

export const MinimalBranchSchema = stub("branch")
  .extend({
    name: z.string(),
  })
  .passthrough();

export const MinimalBuildSchema = stub("build")
  .extend({
    id: z.number().int(),
    number: z.string(),
    state: BuildState,
    duration: z.number().nullable(),
    event_type: z.string(),
    previous_state: BuildState.nullable(),
    pull_request_title: z.string().nullable(),
    pull_request_number: z.number().int().nullable(),
    started_at: z.string().nullable(),
    finished_at: z.string().nullable(),
    private: z.boolean().optional(),
  })
  .passthrough();

export const MinimalJobSchema = stub("job")
  .extend({
    id: z.number().int(),
  })
  .passthrough();

export const MinimalCommitSchema = stub("commit")
  .extend({
    id: z.number().int(),
    sha: z.string(),
    ref: z.string().nullable(),
    message: z.string(),
    compare_url: z.string(),
    committed_at: z.string(),
  })
  .passthrough();

export const MinimalStageSchema = stub("stage")
  .extend({
    id: z.number().int(),
    number: z.number().int(),
    name: z.string(),
    state: z.string(),
    started_at: z.string().nullable(),
    finished_at: z.string().nullable(),
  })
  .passthrough();

export const MinimalCronSchema = stub("cron")
  .extend({
    id: z.number().int(),
  })
  .passthrough();

export const MinimalRequestSchema = stub("request")
  .extend({
    id: z.number().int().optional(),
    state: z.string().optional(),
    result: z.string().nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

export type MinimalUser = z.infer<typeof MinimalUserSchema>;
export type MinimalOrganization = z.infer<typeof MinimalOrganizationSchema>;
export type MinimalOwner = z.infer<typeof MinimalOwnerSchema>;
export type MinimalRepository = z.infer<typeof MinimalRepositorySchema>;
export type MinimalBranch = z.infer<typeof MinimalBranchSchema>;
export type MinimalBuild = z.infer<typeof MinimalBuildSchema>;
export type MinimalJob = z.infer<typeof MinimalJobSchema>;
export type MinimalCommit = z.infer<typeof MinimalCommitSchema>;
export type MinimalStage = z.infer<typeof MinimalStageSchema>;
export type MinimalCron = z.infer<typeof MinimalCronSchema>;
export type MinimalRequest = z.infer<typeof MinimalRequestSchema>;
