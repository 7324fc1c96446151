import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';

const DEV_JWT_SECRET = 'dev-secret';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1).optional(),
  CONTENT_DIR: z.string().min(1).optional(),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  isProduction: boolean;
  port: number;
  databaseUrl: string | undefined;
  jwtSecret: string;
  contentDir: string;
}

export function loadConfig(
  env: Record<string, string | undefined>,
  cwd: string,
  logger?: Logger,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  const isProduction = e.NODE_ENV === 'production';

  let jwtSecret = e.JWT_SECRET;
  if (!jwtSecret) {
    if (isProduction) throw new Error('JWT_SECRET is required in production');
    logger?.warn('JWT_SECRET not set, using the development secret');
    jwtSecret = DEV_JWT_SECRET;
  }
  if (!e.DATABASE_URL) {
    logger?.warn('DATABASE_URL not set, saves will fail until it is configured');
  }

  return {
    nodeEnv: e.NODE_ENV,
    isProduction,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    jwtSecret,
    contentDir: e.CONTENT_DIR ?? join(cwd, 'content', 'dynasty_v1'),
  };
}

/** process.env, read once at boot */
@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);
  private readonly config: AppConfig;

  constructor() {
    this.config = loadConfig(process.env, process.cwd(), this.logger);
  }

  get(): AppConfig {
    return this.config;
  }
}
