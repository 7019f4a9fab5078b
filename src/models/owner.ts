import { z } from "zod";

const ownerFields = {
  "@href": z.string().nullish(),
  "@representation": z.string().optional(),
  id: z.number().int(),
  login: z.string(),
  name: z.string().nullable(),
  github_id: z.number().int().nullable(),
  avatar_url: z.string().nullable(),
  education: z.boolean().optional(),
  allow_migration: z.boolean().optional(),
};

export const UserSchema = z
  .object({
    "@type": z.literal("user"),
    ...ownerFields,
    email: z.string().nullish(),
    is_syncing: z.boolean().optional(),
    synced_at: z.string().nullish(),
  })
  .passthrough();

export const OrganizationSchema = z
  .object({
    "@type": z.literal("organization"),
    ...ownerFields,
  })
  .passthrough();

export const OwnerSchema = z.discriminatedUnion("@type", [UserSchema, OrganizationSchema]);

export type User = z.infer<typeof UserSchema>;
export type Organization = z.infer<typeof OrganizationSchema>;
export type Owner = z.infer<typeof OwnerSchema>;
