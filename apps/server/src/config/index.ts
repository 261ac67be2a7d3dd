import { config as loadEnv } from 'dotenv';
import { DEFAULT_CHECK_INTERVAL_SECONDS, DEFAULT_MAX_RETRY_ATTEMPTS } from '@socialdraft/shared';
import { generateEncryptionKey, isValidEncryptionKey } from '../services/keys/encryption';

loadEnv();

const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_SQLITE_URL = 'file:./data/dev.db';
const DEFAULT_SECRET_KEY = 'change-this-secret-key';
const DEFAULT_LLM_MODEL = 'gpt-4o-mini';
const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
const DEFAULT_LLM_TEMPERATURE = 0.7;

export interface SchedulerConfig {
  checkIntervalSeconds: number;
  maxRetryAttempts: number;
  runOnStart: boolean;
}

export interface LlmConfig {
  openaiModel: string;
  geminiModel: string;
  temperature: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  host: string;
  databaseUrl: string;
  apiAuthToken: string | null;
  secretKey: string;
  encryptionKey: string | null;
  scheduler: SchedulerConfig;
  llm: LlmConfig;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | null {
  const value = env[name];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return parsed;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number (got "${raw}")`);
  }
  return parsed;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  return raw.toLowerCase() === 'true' || raw === '1';
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    nodeEnv: readString(env, 'NODE_ENV') ?? 'development',
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    host: readString(env, 'HOST') ?? DEFAULT_HOST,
    databaseUrl: readString(env, 'DATABASE_URL') ?? DEFAULT_SQLITE_URL,
    apiAuthToken: readString(env, 'API_AUTH_TOKEN'),
    secretKey: readString(env, 'SECRET_KEY') ?? DEFAULT_SECRET_KEY,
    encryptionKey: readString(env, 'ENCRYPTION_KEY'),
    scheduler: {
      checkIntervalSeconds: readPositiveInt(env, 'SCHEDULER_CHECK_INTERVAL', DEFAULT_CHECK_INTERVAL_SECONDS),
      maxRetryAttempts: readPositiveInt(env, 'MAX_RETRY_ATTEMPTS', DEFAULT_MAX_RETRY_ATTEMPTS),
      runOnStart: readBoolean(env, 'SCHEDULER_RUN_ON_START', false),
    },
    llm: {
      openaiModel: readString(env, 'DEFAULT_LLM_MODEL') ?? DEFAULT_LLM_MODEL,
      geminiModel: readString(env, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL,
      temperature: readNumber(env, 'DEFAULT_LLM_TEMPERATURE', DEFAULT_LLM_TEMPERATURE),
    },
  };
}

// Non-fatal problems, logged at startup.
export function validateConfig(config: AppConfig): string[] {
  const warnings: string[] = [];
  if (config.secretKey === DEFAULT_SECRET_KEY) {
    warnings.push('SECRET_KEY must be changed from default');
  }
  if (!config.encryptionKey) {
    warnings.push(
      'ENCRYPTION_KEY is not set; API keys are encrypted with a key derived from SECRET_KEY. ' +
        `Generate one with ENCRYPTION_KEY=${generateEncryptionKey()}`,
    );
  } else if (!isValidEncryptionKey(config.encryptionKey)) {
    warnings.push('ENCRYPTION_KEY must be 64 hex characters or base64 of 32 bytes; falling back to SECRET_KEY');
  }
  if (!config.apiAuthToken && config.nodeEnv === 'production') {
    warnings.push('API_AUTH_TOKEN is not set; /api routes will reject every request');
  }
  return warnings;
}
