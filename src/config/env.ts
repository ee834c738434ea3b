import dotenv from 'dotenv';
import path from 'path';
import { DuplicatePredictionPolicy } from '../models/prediction.types';

// Load .env from the working directory, then fall back to dotenv's default lookup
const envPath = path.resolve(process.cwd(), '.env');
const result = dotenv.config({ path: envPath });

if (result.error) {
  dotenv.config();
}

export type StoreProvider = 'memory' | 'supabase';

export interface EnvConfig {
  NODE_ENV: string;
  PORT: number;
  CORS_ORIGIN: string;
  JWT_SECRET: string;
  OWNER_ID: string;
  ORACLE_ID: string;
  MIN_STAKE: bigint;
  FEE_PERCENT: number;
  POOL_ACCOUNT_ID: string;
  STORE_PROVIDER: StoreProvider;
  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
  GENESIS_TIME: number;
  BLOCK_TIME_MS: number;
  DUPLICATE_PREDICTION_POLICY: DuplicatePredictionPolicy;
}

export type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] || defaultValue;
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getIntVar(env: Env, key: string, defaultValue: string, min: number, max: number): number {
  const raw = getEnvVar(env, key, defaultValue);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Environment variable ${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function getOneOf<T extends string>(env: Env, key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = getEnvVar(env, key, defaultValue);
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function loadConfig(env: Env = process.env): EnvConfig {
  const storeProvider = getOneOf(env, 'STORE_PROVIDER', ['memory', 'supabase'] as const, 'memory');
  const minStake = getEnvVar(env, 'MIN_STAKE', '1');
  if (!/^\d+$/.test(minStake) || BigInt(minStake) === 0n) {
    throw new Error(`Environment variable MIN_STAKE must be a positive integer, got "${minStake}"`);
  }

  return {
    NODE_ENV: getEnvVar(env, 'NODE_ENV', 'development'),
    PORT: getIntVar(env, 'PORT', '3001', 0, 65535),
    CORS_ORIGIN: getEnvVar(env, 'CORS_ORIGIN', 'http://localhost:3000'),
    JWT_SECRET: getEnvVar(env, 'JWT_SECRET'),
    OWNER_ID: getEnvVar(env, 'OWNER_ID'),
    ORACLE_ID: getEnvVar(env, 'ORACLE_ID'),
    MIN_STAKE: BigInt(minStake),
    FEE_PERCENT: getIntVar(env, 'FEE_PERCENT', '2', 0, 100),
    POOL_ACCOUNT_ID: getEnvVar(env, 'POOL_ACCOUNT_ID', 'market-pool'),
    STORE_PROVIDER: storeProvider,
    // Only required when the Supabase store is selected
    SUPABASE_URL: storeProvider === 'supabase' ? getEnvVar(env, 'SUPABASE_URL') : env.SUPABASE_URL || '',
    SUPABASE_SERVICE_ROLE_KEY:
      storeProvider === 'supabase'
        ? getEnvVar(env, 'SUPABASE_SERVICE_ROLE_KEY')
        : env.SUPABASE_SERVICE_ROLE_KEY || '',
    GENESIS_TIME: getIntVar(env, 'GENESIS_TIME', '0', 0, Number.MAX_SAFE_INTEGER),
    BLOCK_TIME_MS: getIntVar(env, 'BLOCK_TIME_MS', '12000', 1, Number.MAX_SAFE_INTEGER),
    DUPLICATE_PREDICTION_POLICY: getOneOf(
      env,
      'DUPLICATE_PREDICTION_POLICY',
      ['overwrite', 'reject'] as const,
      'overwrite'
    ),
  };
}
