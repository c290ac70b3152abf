import { z } from "zod";

const ColorStringSchema = z.string().trim().min(1);

export const RenderSettingsSchema = z
  .object({
    /** QR version 1-40; other values fail at render time with an unknown-version error. */
    version: z.number().int().positive().optional(),
    errorCorrection: z.enum(["L", "M", "Q", "H"]).optional(),
    border: z.number().int().min(0).optional(),
    supersample: z.number().int().min(1).max(8).optional(),
    moduleRadiusRatio: z.number().min(0).max(1).optional(),
    backColor: ColorStringSchema.optional(),
    logoAspect: z.number().positive().optional(),
    logoPadding: z.number().int().min(0).optional(),
  })
  .strict();

export const RenderDefaultsSchema = z
  .object({
    size: z.number().int().positive().optional(),
    fillColor: ColorStringSchema.optional(),
    eyeColor: ColorStringSchema.optional(),
    logo: z.union([z.string().trim().min(1), z.null()]).optional(),
    output: z.string().trim().min(1).optional(),
  })
  .strict();

export const QrStylerConfigSchema = z
  .object({
    render: RenderSettingsSchema.optional(),
    defaults: RenderDefaultsSchema.optional(),
  })
  .strict();

export type QrStylerConfig = z.infer<typeof QrStylerConfigSchema>;
