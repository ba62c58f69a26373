import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  app: {
    env: string;
    logLevel: LogLevel;
  };
  server: {
    port: number;
    maxUploadBytes: number;
  };
}

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(10 * 1024 * 1024),
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  return {
    app: {
      env: parsed.data.NODE_ENV,
      logLevel: parsed.data.LOG_LEVEL,
    },
    server: {
      port: parsed.data.PORT,
      maxUploadBytes: parsed.data.MAX_UPLOAD_BYTES,
    },
  };
};
