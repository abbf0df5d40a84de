import { z } from 'zod';

const boolFlag = z
  .string()
  .optional()
  .refine((v) => (v ? ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'].includes(v.trim().toLowerCase()) : true), 'must be a boolean flag');

const positiveInt = (name: string) =>
  z
    .string()
    .optional()
    .refine((v) => (v ? Number.isInteger(Number(v)) && Number(v) > 0 : true), `${name} must be a positive integer`);

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z
      .string()
      .optional()
      .refine((v) => (v ? !Number.isNaN(Number(v)) : true), 'PORT must be a number'),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    // Comma-separated list of allowed web origins for CORS (must be explicit when using cookies).
    ALLOWED_ORIGINS: z.string().optional().default('http://localhost:3000'),

    // Sessions are written by the login service; we only hash and look them up.
    SESSION_HMAC_SECRET: z.string().optional(),
    COOKIE_DOMAIN: z.string().optional(),

    PAGE_SIZE: positiveInt('PAGE_SIZE'),

    // Authorization / visibility policy.
    AUTH_STAFF_OVERRIDE: boolFlag,
    AUTH_DENIAL_MODE: z.string().trim().toLowerCase().pipe(z.enum(['redirect', 'forbidden'])).optional(),
    VISIBILITY_STAFF_SEES_ALL: boolFlag,

    DB_APPLY_SCHEMA: boolFlag,
    DB_CONNECT_RETRIES: positiveInt('DB_CONNECT_RETRIES'),
    DB_LOG_SLOW_QUERIES: boolFlag,
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'production') return;

    if (!env.SESSION_HMAC_SECRET || env.SESSION_HMAC_SECRET.length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_HMAC_SECRET'],
        message: 'SESSION_HMAC_SECRET is required in production (min 16 chars)',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>): z.infer<TSchema> => {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // Nest expects thrown errors to abort bootstrap.
      throw new Error(
        `Invalid environment variables:\n${parsed.error.issues
          .map((i) => `- ${i.path.join('.')}: ${i.message}`)
          .join('\n')}`,
      );
    }
    return parsed.data;
  };
}
