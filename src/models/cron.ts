import { z } from "zod";
import { MinimalBranchSchema, MinimalRepositorySchema } from "./minimal.js";

export const CronInterval = z.enum(["daily", "weekly", "monthly"]);
export type CronInterval = z.infer<typeof CronInterval>;

export const CronSchema = z
  .object({
    "@type": z.literal("cron"),
    "@href": z.string().nullish(),
    "@representation": z.string().optional(),
    id: z.number().int(),
    repository: MinimalRepositorySchema,
    branch: MinimalBranchSchema,
    interval: CronInterval,
    dont_run_if_recent_build_exists: z.boolean(),
    last_run: z.string().nullable(),
    next_run: z.string().nullable(),
    created_at: z.string(),
    active: z.boolean().optional(),
  })
  .passthrough();

export const CronListSchema = z.array(CronSchema);

export type Cron = z.infer<typeof CronSchema>;

export interface CronRequest {
  interval: CronInterval;
  dontRunIfRecentBuildExists?: boolean;
}

export function encodeCron(request: CronRequest): Record<string, string | boolean> {
  const body: Record<string, string | boolean> = { "cron.interval": request.interval };
  if (request.dontRunIfRecentBuildExists !== undefined) {
    body["cron.dont_run_if_recent_build_exists"] = request.dontRunIfRecentBuildExists;
  }
  return body;
}
