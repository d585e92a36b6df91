/**
 * Server configuration, read once from the environment (and .env).
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const flag = z.enum(['true', 'false']).transform((value) => value === 'true');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_DIR: z.string().min(1).default('logs'),
  LOG_TO_FILE: flag.optional(),
  SLOW_REQUEST_MS: z.coerce.number().int().min(0).default(1000),
  ALLOWED_ORIGINS: z.string().default('http://localhost:5173'),
  API_VERSION: z.string().min(1).default('1.0.0'),
  // Share of the V8 heap limit above which readiness reports degraded
  MEMORY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.9)
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  logLevel: LogLevel;
  logDir: string;
  logToFile: boolean;
  slowRequestMs: number;
  allowedOrigins: string[];
  apiVersion: string;
  memoryThreshold: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration - ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    logDir: parsed.LOG_DIR,
    // Rotating log files are noise in test runs
    logToFile: parsed.LOG_TO_FILE ?? parsed.NODE_ENV !== 'test',
    slowRequestMs: parsed.SLOW_REQUEST_MS,
    allowedOrigins: parsed.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    apiVersion: parsed.API_VERSION,
    memoryThreshold: parsed.MEMORY_THRESHOLD
  };
};

export const config = loadConfig();
