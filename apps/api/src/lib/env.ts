import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  DEFAULT_FACILITY_CODE,
  TokenAlgorithm,
} from '@medgate/shared/constants/portal.constants.js';

// Load .env from monorepo root
dotenv.config({
  path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../../.env'),
});

const TOKEN_ALGORITHMS = [
  TokenAlgorithm.HS256,
  TokenAlgorithm.HS384,
  TokenAlgorithm.HS512,
] as const;

export const envSchema = z.object({
  APP_NAME: z.string().default('Medical Records Gateway'),
  APP_VERSION: z.string().default('0.1.0'),
  SECRET_KEY: z.string().min(1),
  JWT_ALGORITHM: z.enum(TOKEN_ALGORITHMS).default(TokenAlgorithm.HS256),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60),
  DEFAULT_FACILITY_CODE: z.string().min(1).default(DEFAULT_FACILITY_CODE),
  PORTAL_BASE_URL: z.string().url(),
  ARGON2_MEMORY: z.coerce.number().default(19456),
  ARGON2_ITERATIONS: z.coerce.number().default(2),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().default(8000),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function getEnv(): Env {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
      throw new Error('Invalid environment variables');
    }
    _env = result.data;
  }
  return _env;
}

// ---------------------------------------------------------------------------
// Gateway configuration derived from the environment
// ---------------------------------------------------------------------------

export interface GatewayConfig {
  appName: string;
  appVersion: string;
  secretKey: string;
  algorithm: TokenAlgorithm;
  accessTokenExpireMinutes: number;
  defaultFacilityCode: string;
  corsOrigin: string;
  logLevel: Env['LOG_LEVEL'];
}

export function toGatewayConfig(env: Env): GatewayConfig {
  return {
    appName: env.APP_NAME,
    appVersion: env.APP_VERSION,
    secretKey: env.SECRET_KEY,
    algorithm: env.JWT_ALGORITHM,
    accessTokenExpireMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
    defaultFacilityCode: env.DEFAULT_FACILITY_CODE,
    corsOrigin: env.CORS_ORIGIN,
    logLevel: env.LOG_LEVEL,
  };
}
