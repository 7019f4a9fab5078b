import { z } from "zod";
import {
  MinimalBuildSchema,
  MinimalCommitSchema,
  MinimalOwnerSchema,
  MinimalRepositorySchema,
  MinimalStageSchema,
} from "./minimal.js";

export const JobSchema = z
  .object({
    "@type": z.literal("job"),
    "@href": z.string().nullish(),
    "@representation": z.string().optional(),
    id: z.number().int(),
    allow_failure: z.boolean().optional(),
    number: z.string(),
    state: z.string(),
    started_at: z.string().nullable(),
    finished_at: z.string().nullable(),
    build: MinimalBuildSchema,
    queue: z.string().nullish(),
    repository: MinimalRepositorySchema,
    commit: MinimalCommitSchema,
    owner: MinimalOwnerSchema.optional(),
    stage: MinimalStageSchema.nullish(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    private: z.boolean().optional(),
  })
  .passthrough();

export const JobListSchema = z.array(JobSchema);

export const LogPartSchema = z
  .object({
    content: z.string(),
    final: z.boolean(),
    number: z.number().int(),
  })
  .passthrough();

export const LogSchema = z
  .object({
    "@type": z.literal("log"),
    "@href": z.string().nullish(),
    "@raw_log_href": z.string().optional(),
    id: z.number().int(),
    content: z.string().nullable(),
    log_parts: z.array(LogPartSchema).optional(),
  })
  .passthrough();

export type Job = z.infer<typeof JobSchema>;
export type Log = z.infer<typeof LogSchema>;
export type LogPart = z.infer<typeof LogPartSchema>;
