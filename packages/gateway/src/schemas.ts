import { z } from 'zod';

export const envelopeSchema = z.object({
  success: z.boolean(),
  result: z.unknown().optional(),
  error_code: z.string().optional(),
  msg: z.string().optional()
});

export type ApiEnvelope = z.infer<typeof envelopeSchema>;

export const apiVersionSchema = z.object({
  api_version: z.union([z.string(), z.number()]).transform((value) => String(value)),
  device_name: z.string().optional(),
  api_base_url: z.string().optional()
});

export const loginStatusSchema = z.object({
  logged_in: z.boolean().optional(),
  challenge: z.string().optional()
});

export const challengeSchema = z.object({
  challenge: z.string().min(1)
});

export const sessionSchema = z.object({
  session_token: z.string().min(1),
  permissions: z.record(z.boolean()).optional()
});

export const systemSchema = z
  .object({
    uptime: z.union([z.string(), z.number()]).optional(),
    uptime_val: z.number().optional()
  })
  .passthrough();

export const filterEntrySchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value)).optional(),
  mac: z.string(),
  type: z.string().optional(),
  comment: z.string().optional(),
  hostname: z.string().optional()
});

export const filterEntryInfoSchema = filterEntrySchema.partial();

export const rawFilterListSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]).nullish();

export const lanHostSchema = z.object({
  primary_name: z.string().optional(),
  l2ident: z
    .object({
      id: z.string(),
      type: z.string().optional()
    })
    .optional(),
  active: z.boolean().optional(),
  access: z.boolean().optional()
});

export const rawHostListSchema = z.array(z.unknown()).nullish();

export const credentialFileSchema = z
  .object({
    app_token: z.string(),
    session_token: z.string().nullish(),
    created_at: z.string().optional()
  })
  .passthrough();
