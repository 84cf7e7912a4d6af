import { z } from 'zod';

// ── Credentials ─────────────────────────────────────────────

export const credentialsSchema = z.object({
  email: z.string(),
  password: z.string(),
  display_name: z.string().optional(),
});

export type Credentials = z.infer<typeof credentialsSchema>;

// ── Registration ────────────────────────────────────────────

export const registrationDataSchema = z.object({
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  password: z.string(),
  confirm_password: z.string(),
});

export type RegistrationData = z.infer<typeof registrationDataSchema>;

// ── Full test data file ─────────────────────────────────────

export const testDataSchema = z.object({
  valid_credentials: credentialsSchema,
  invalid_credentials: credentialsSchema,
  registration: z
    .object({
      valid: registrationDataSchema,
      invalid: registrationDataSchema.optional(),
    })
    .optional(),
  expected_error_messages: z.record(z.string(), z.string()).optional().default({}),
  social_providers: z
    .record(z.string(), z.string().url())
    .optional()
    .default({
      google: 'https://accounts.google.com',
      facebook: 'https://www.facebook.com',
      apple: 'https://appleid.apple.com',
    }),
});

export type TestData = z.infer<typeof testDataSchema>;
