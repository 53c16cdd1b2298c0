import { z } from 'zod';
import type { LogLevel } from './logger.js';

export interface AppConfig {
  logLevel: LogLevel;
  pushAuth: {
    apiBase: string;
    bearerToken: string;
    requestTimeoutMs: number;
  };
  prompt: {
    acceptLabel: string;
    rejectLabel: string;
  };
  delivery: {
    enabled: boolean;
    host: string;
    port: number;
    path: string;
    secret: string;
    maxBodyBytes: number;
  };
}

const booleanFlag = (fallback: '0' | '1') =>
  z
    .enum(['0', '1', 'true', 'false'])
    .default(fallback)
    .transform((value) => value === '1' || value === 'true');

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PUSH_AUTH_API_BASE: z.string().url(),
  PUSH_AUTH_BEARER_TOKEN: z.string().min(1),
  PUSH_AUTH_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).max(60_000).default(10_000),
  PROMPT_ACCEPT_LABEL: z.string().trim().min(1).default('Approve'),
  PROMPT_REJECT_LABEL: z.string().trim().min(1).default('Ignore'),
  ENABLE_PUSH_WEBHOOK: booleanFlag('1'),
  PUSH_WEBHOOK_HOST: z.string().min(1).default('127.0.0.1'),
  PUSH_WEBHOOK_PORT: z.coerce.number().int().min(0).max(65535).default(8790),
  PUSH_WEBHOOK_PATH: z
    .string()
    .min(1)
    .default('/push')
    .transform((value) => (value.startsWith('/') ? value : `/${value}`)),
  PUSH_WEBHOOK_SECRET: z.string().default(''),
  PUSH_WEBHOOK_MAX_BODY_BYTES: z.coerce.number().int().min(1024).max(1_048_576).default(65_536),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.ENABLE_PUSH_WEBHOOK && parsed.PUSH_WEBHOOK_SECRET.trim().length === 0) {
    throw new Error('PUSH_WEBHOOK_SECRET is required when ENABLE_PUSH_WEBHOOK is enabled');
  }
  if (parsed.PROMPT_ACCEPT_LABEL.toLowerCase() === parsed.PROMPT_REJECT_LABEL.toLowerCase()) {
    throw new Error('PROMPT_ACCEPT_LABEL and PROMPT_REJECT_LABEL must differ');
  }

  return {
    logLevel: parsed.LOG_LEVEL,
    pushAuth: {
      apiBase: parsed.PUSH_AUTH_API_BASE,
      bearerToken: parsed.PUSH_AUTH_BEARER_TOKEN,
      requestTimeoutMs: parsed.PUSH_AUTH_REQUEST_TIMEOUT_MS,
    },
    prompt: {
      acceptLabel: parsed.PROMPT_ACCEPT_LABEL,
      rejectLabel: parsed.PROMPT_REJECT_LABEL,
    },
    delivery: {
      enabled: parsed.ENABLE_PUSH_WEBHOOK,
      host: parsed.PUSH_WEBHOOK_HOST,
      port: parsed.PUSH_WEBHOOK_PORT,
      path: parsed.PUSH_WEBHOOK_PATH,
      secret: parsed.PUSH_WEBHOOK_SECRET.trim(),
      maxBodyBytes: parsed.PUSH_WEBHOOK_MAX_BODY_BYTES,
    },
  };
}
