/**
 * Resource models and the minimal → full pairing used to follow embedded stubs.
 */

import type { z } from "zod";
import { BranchSchema, type Branch } from "./branch.js";
import { BuildSchema, type Build } from "./build.js";
import { CronSchema, type Cron } from "./cron.js";
import { JobSchema, type Job } from "./job.js";
import { OrganizationSchema, UserSchema, type Organization, type User } from "./owner.js";
import { RepositorySchema, type Repository } from "./repository.js";

export interface FullResources {
  user: User;
  organization: Organization;
  repository: Repository;
  branch: Branch;
  build: Build;
  job: Job;
  cron: Cron;
}

export type ResourceKind = keyof FullResources;

/**
 * Anything carrying a type tag and (maybe) a link to its full representation.
 */
export interface MinimalReference<K extends ResourceKind = ResourceKind> {
  "@type": K;
  "@href"?: string | null | undefined;
}

export const FULL_RESOURCE_SCHEMAS: {
  [K in ResourceKind]: z.ZodType<FullResources[K], z.ZodTypeDef, unknown>;
} = {
  user: UserSchema,
  organization: OrganizationSchema,
  repository: RepositorySchema,
  branch: BranchSchema,
  build: BuildSchema,
  job: JobSchema,
  cron: CronSchema,
};

export function fullSchemaFor<K extends ResourceKind>(
  kind: K
): z.ZodType<FullResources[K], z.ZodTypeDef, unknown> {
  return FULL_RESOURCE_SCHEMAS[kind];
}

export * from "./minimal.js";
export * from "./owner.js";
export * from "./repository.js";
export * from "./build.js";
export * from "./job.js";
export * from "./branch.js";
export * from "./cron.js";
export * from "./env-var.js";
export * from "./setting.js";
export * from "./request.js";
export * from "./queries.js";
export * from "./error.js";
