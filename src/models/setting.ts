import { z } from "zod";

export const SettingSchema = z
  .object({
    "@type": z.literal("setting"),
    "@href": z.string().nullish(),
    "@representation": z.string().optional(),
    name: z.string(),
    value: z.union([z.boolean(), z.number()]),
  })
  .passthrough();

export const SettingListSchema = z.array(SettingSchema);

export type Setting = z.infer<typeof SettingSchema>;
export type SettingValue = Setting["value"];

export function encodeSetting(value: SettingValue): { "setting.value": SettingValue } {
  return { "setting.value": value };
}
