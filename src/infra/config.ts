import { z, ZodError } from 'zod';

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: optionalText,
  DATABASE_NAME: optionalText,
  MONGO_SERVER_SELECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  databaseName?: string;
  serverSelectionTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  try {
    const parsed = envSchema.parse(env);
    return {
      port: parsed.PORT,
      databaseUrl: parsed.DATABASE_URL,
      databaseName: parsed.DATABASE_NAME,
      serverSelectionTimeoutMs: parsed.MONGO_SERVER_SELECTION_TIMEOUT_MS,
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new Error(`Invalid configuration: ${issues}`);
    }
    throw error;
  }
}
