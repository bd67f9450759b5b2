/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the service reads (port, provider endpoints, credentials,
 * timeouts, prompt options) goes through this file. Nothing else touches
 * process.env; the stages receive their slice of `config` through the DI
 * container.
 *
 * dotenv loads .env, then a Zod schema validates and coerces at startup
 * ("10000" → 10000). A malformed value exits the process immediately.
 *
 * The two provider credentials are the exception: they are optional here.
 * A missing credential does not stop the server from booting; each request
 * fails with a 500 until an operator sets it (see AnalysisService).
 */
import 'dotenv/config';

import { z } from 'zod/v4';

/** An empty `PORT=` line counts as unset rather than port 0. */
const optionalPort = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.coerce.number().int().positive().optional(),
);

const envSchema = z.object({
  PORT: optionalPort,
  /** Port injected by LeanCloud-style PaaS hosts; used when PORT is unset. */
  LEANCLOUD_APP_PORT: optionalPort,
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  TIANYANCHA_TOKEN: z.string().optional(),
  REGISTRY_API_URL: z
    .url()
    .default('http://open.api.tianyancha.com/services/open/ic/baseinfoV3/2.0'),
  REGISTRY_TIMEOUT_MS: z.coerce.number().int().min(1000).max(60_000).default(10_000),
  /** Some registry gateways reject the default axios agent string. */
  REGISTRY_USER_AGENT: z.string().optional(),

  DEEPSEEK_API_KEY: z.string().optional(),
  COMPLETION_BASE_URL: z.url().default('https://api.deepseek.com'),
  COMPLETION_MODEL: z.string().min(1).default('deepseek-chat'),
  /** 0 leaves max_tokens off the request. */
  COMPLETION_MAX_TOKENS: z.coerce.number().int().min(0).default(1500),
  COMPLETION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),

  REPORT_REFERENCE_YEAR: z.coerce.number().int().min(2000).max(2100).default(2025),
  REPORT_INCLUDE_OUTLOOK: z.stringbool().default(true),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT ?? env.LEANCLOUD_APP_PORT ?? 3000,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  registry: {
    apiUrl: env.REGISTRY_API_URL,
    token: env.TIANYANCHA_TOKEN || null,
    timeoutMs: env.REGISTRY_TIMEOUT_MS,
    userAgent: env.REGISTRY_USER_AGENT || null,
  },

  completion: {
    apiKey: env.DEEPSEEK_API_KEY || null,
    baseUrl: env.COMPLETION_BASE_URL,
    model: env.COMPLETION_MODEL,
    maxTokens: env.COMPLETION_MAX_TOKENS > 0 ? env.COMPLETION_MAX_TOKENS : null,
    temperature: env.COMPLETION_TEMPERATURE,
    timeoutMs: env.COMPLETION_TIMEOUT_MS,
  },

  report: {
    referenceYear: env.REPORT_REFERENCE_YEAR,
    includeOutlook: env.REPORT_INCLUDE_OUTLOOK,
  },
} as const;

export type AppConfig = typeof config;
export type RegistryConfig = AppConfig['registry'];
export type CompletionConfig = AppConfig['completion'];
export type ReportConfig = AppConfig['report'];
