import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  // Case store
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_KEY: z.string().min(1).optional(),
  CASE_TABLE: z.string().default('case_records'),

  // Single-writer lock
  REDIS_URL: z.string().default('redis://localhost:6379'),
  STORE_LOCK_KEY: z.string().default('guardian-extract:store-lock'),
  STORE_LOCK_TTL_MS: z.string().transform(Number).default('30000'),
  STORE_LOCK_CONNECT_TIMEOUT_MS: z.string().transform(Number).default('5000'),
  STORE_LOCK_MAX_RECONNECTS: z.string().transform(Number).default('3'),

  LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // OCR Configuration
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  ANTHROPIC_API_KEY: z.string().optional(),
  CLAUDE_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  OCR_TEMP_DIR: z.string().default('/tmp/guardian-ocr'),
  OCR_TESSERACT_ENABLED: z.string().transform(val => val !== 'false').default('true'),
  OCR_TESSERACT_BIN: z.string().default('tesseract'),
  OCR_CLOUD_TIMEOUT_MS: z.string().transform(Number).default('60000'),
  OCR_MAX_PAGES: z.string().transform(Number).default('2'),
  OCR_RETRY_BASE_DELAY_MS: z.string().transform(Number).default('1000'),

  // Rule tables, anchors and thresholds
  EXTRACTION_CONFIG_PATH: z.string().optional(),
});

const env = envSchema.parse(process.env);

export const config = {
  supabase: {
    url: env.SUPABASE_URL || '',
    serviceKey: env.SUPABASE_SERVICE_KEY || '',
    caseTable: env.CASE_TABLE,
  },
  redis: {
    url: env.REDIS_URL,
    lockKey: env.STORE_LOCK_KEY,
    lockTtlMs: env.STORE_LOCK_TTL_MS,
    connectTimeoutMs: env.STORE_LOCK_CONNECT_TIMEOUT_MS,
    maxReconnectAttempts: env.STORE_LOCK_MAX_RECONNECTS,
  },
  logging: {
    level: env.LOG_LEVEL,
  },
  env: env.NODE_ENV,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  ocr: {
    geminiApiKey: env.GEMINI_API_KEY,
    geminiModel: env.GEMINI_MODEL,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    claudeModel: env.CLAUDE_MODEL,
    tempDir: env.OCR_TEMP_DIR,
    tesseractEnabled: env.OCR_TESSERACT_ENABLED,
    tesseractBin: env.OCR_TESSERACT_BIN,
    cloudTimeoutMs: env.OCR_CLOUD_TIMEOUT_MS,
    maxPages: env.OCR_MAX_PAGES,
    retryBaseDelayMs: env.OCR_RETRY_BASE_DELAY_MS,
  },
  extraction: {
    configPath: env.EXTRACTION_CONFIG_PATH,
  },
};

export type AppConfig = typeof config;
