import { z } from 'zod';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z
    .string()
    .optional()
    .refine((v) => (v ? !Number.isNaN(Number(v)) : true), 'PORT must be a number'),
  // SQLite file. ":memory:" is accepted (tests).
  DATABASE_PATH: z.string().trim().min(1).optional().default('glowup.db'),
  // Directory that receives uploaded images; served under /uploads.
  UPLOAD_DIR: z.string().trim().min(1).optional().default('uploads'),
  // Used to build absolute image URLs when the request does not pass `request_base`.
  PUBLIC_BASE_URL: z.string().trim().url('PUBLIC_BASE_URL must be a URL').optional().default('http://localhost:8000'),
  // Comma-separated list of allowed web origins for CORS. "*" allows any origin.
  // Examples:
  // - *
  // - http://localhost:3000,https://glowup.example
  ALLOWED_ORIGINS: z.string().optional().default('*'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>) => {
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
