/**
 * @module @llmverify/verifier/config
 * Validated engine configuration from `LLMV_*` environment variables.
 *
 * @example
 * ```typescript
 * // LLMV_PROVIDERS=openai,groq
 * // LLMV_PROVIDER_OPENAI_API_KEY=env:OPENAI_API_KEY
 * // LLMV_PROVIDER_GROQ_BASE_URL=https://api.groq.com/openai/v1
 * // LLMV_PROVIDER_GROQ_ADAPTER=openai
 * const config = loadConfig(process.env, { cache: { ttlMs: 600000 } });
 *
 * const store = new ConfigStore(config);
 * store.updateProbe({ ttftCeilingMs: 5000 });
 * ```
 */

import { z } from 'zod';
import { deepFreeze } from '@llmverify/core';
import type { ProviderConfig } from '@llmverify/core';

// ═══════════════════════════════════════════════════════════════════════
// Schema
// ═══════════════════════════════════════════════════════════════════════

const positiveInt = z.number().int().positive();

export const probeSchema = z.object({
  timeoutMs: positiveInt.default(30_000),
  ttftCeilingMs: positiveInt.default(10_000),
  totalCeilingMs: positiveInt.default(60_000),
  transportEncodings: z.array(z.string().min(1)).min(1).default(['br']),
});

export const cacheSchema = z.object({
  ttlMs: positiveInt.default(3_600_000),
  sweepIntervalMs: positiveInt.default(60_000),
  maxItems: positiveInt.default(10_000),
  tierTimeoutMs: positiveInt.default(1000),
  redisUrl: z.string().url().optional(),
  keyPrefix: z.string().default('llmv:'),
});

const slackSchema = z.object({
  webhookUrl: z.string().url(),
  channel: z.string().optional(),
  username: z.string().optional(),
});

const telegramSchema = z.object({
  botToken: z.string().min(1),
  chatId: z.string().min(1),
});

const matrixSchema = z.object({
  homeserverUrl: z.string().url(),
  accessToken: z.string().min(1),
  roomId: z.string().min(1),
});

const whatsappSchema = z.object({
  accountSid: z.string().min(1),
  authToken: z.string().min(1),
  from: z.string().min(1),
  to: z.array(z.string().min(1)).min(1),
});

const emailSchema = z.object({
  from: z.string().email(),
  to: z.array(z.string().email()).min(1),
  smtp: z.object({
    host: z.string().min(1),
    port: positiveInt,
    secure: z.boolean().optional(),
    user: z.string().optional(),
    pass: z.string().optional(),
  }),
});

export const notificationsSchema = z.object({
  workers: positiveInt.default(4),
  queueCapacity: positiveInt.default(100),
  sendTimeoutMs: positiveInt.default(5000),
  deliveryTimeoutMs: positiveInt.default(10_000),
  graceMs: z.number().int().nonnegative().default(5000),
  slack: slackSchema.optional(),
  telegram: telegramSchema.optional(),
  matrix: matrixSchema.optional(),
  whatsapp: whatsappSchema.optional(),
  email: emailSchema.optional(),
});

export const providerSchema = z.object({
  name: z.string().min(1),
  baseURL: z.string().url(),
  credential: z.string().optional(),
  adapter: z.string().min(1).optional(),
});

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  pretty: z.boolean().default(false),
});

export const verifierConfigSchema = z.object({
  probe: probeSchema.default({}),
  cache: cacheSchema.default({}),
  notifications: notificationsSchema.default({}),
  providers: z.array(providerSchema).default([]),
  logging: loggingSchema.default({}),
});

export type ProbeSettings = z.infer<typeof probeSchema>;
export type CacheSettings = z.infer<typeof cacheSchema>;
export type NotificationSettings = z.infer<typeof notificationsSchema>;
export type LoggingSettings = z.infer<typeof loggingSchema>;
export type VerifierConfig = z.infer<typeof verifierConfigSchema>;

/**
 * Per-section overrides applied on top of the environment. A `providers`
 * override replaces the environment's list.
 */
export interface ConfigOverrides {
  probe?: Partial<ProbeSettings>;
  cache?: Partial<CacheSettings>;
  notifications?: Partial<NotificationSettings>;
  providers?: ProviderConfig[];
  logging?: Partial<LoggingSettings>;
}

export type Env = Record<string, string | undefined>;

/** Base URLs used when a listed provider does not set one */
export const DEFAULT_BASE_URLS: Readonly<Record<string, string>> = {
  openai: 'https://api.openai.com/v1',
  deepseek: 'https://api.deepseek.com/v1',
  anthropic: 'https://api.anthropic.com/v1',
};

const ENV_REFERENCE = 'env:';

// ═══════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════

export class ConfigValidationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

function issuesOf(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [...(prefix ? [prefix] : []), ...issue.path.map(String)].join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

// ═══════════════════════════════════════════════════════════════════════
// Loading
// ═══════════════════════════════════════════════════════════════════════

/**
 * Build the configuration from the environment plus overrides. Provider
 * credentials written as `env:VAR` are resolved against the same environment.
 * @throws ConfigValidationError listing every invalid field
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): VerifierConfig {
  const raw = {
    probe: { ...probeFromEnv(env), ...overrides.probe },
    cache: { ...cacheFromEnv(env), ...overrides.cache },
    notifications: { ...notificationsFromEnv(env), ...overrides.notifications },
    providers: overrides.providers ?? providersFromEnv(env),
    logging: { ...loggingFromEnv(env), ...overrides.logging },
  };

  const parsed = verifierConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(issuesOf(parsed.error));
  }

  const issues: string[] = [];
  const providers = parsed.data.providers.map((provider, index) => {
    const resolved = resolveCredential(provider, env);
    if (!resolved.ok) {
      issues.push(`providers.${index}.credential: ${resolved.message}`);
      return provider;
    }
    return resolved.provider;
  });
  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return deepFreeze({ ...parsed.data, providers });
}

type CredentialResolution = { ok: true; provider: ProviderConfig } | { ok: false; message: string };

function resolveCredential(provider: ProviderConfig, env: Env): CredentialResolution {
  const { credential } = provider;
  if (credential === undefined || !credential.startsWith(ENV_REFERENCE)) {
    return { ok: true, provider };
  }
  const variable = credential.slice(ENV_REFERENCE.length);
  const value = env[variable];
  if (value === undefined || value === '') {
    return { ok: false, message: `environment variable ${variable} is not set` };
  }
  return { ok: true, provider: { ...provider, credential: value } };
}

function probeFromEnv(env: Env): Record<string, unknown> {
  return compact({
    timeoutMs: int(env.LLMV_PROBE_TIMEOUT_MS),
    ttftCeilingMs: int(env.LLMV_TTFT_CEILING_MS),
    totalCeilingMs: int(env.LLMV_TOTAL_CEILING_MS),
    transportEncodings: list(env.LLMV_TRANSPORT_ENCODINGS),
  });
}

function cacheFromEnv(env: Env): Record<string, unknown> {
  return compact({
    ttlMs: int(env.LLMV_CACHE_TTL_MS),
    sweepIntervalMs: int(env.LLMV_CACHE_SWEEP_INTERVAL_MS),
    maxItems: int(env.LLMV_CACHE_MAX_ITEMS),
    tierTimeoutMs: int(env.LLMV_CACHE_TIER_TIMEOUT_MS),
    redisUrl: env.LLMV_REDIS_URL,
    keyPrefix: env.LLMV_REDIS_KEY_PREFIX,
  });
}

function notificationsFromEnv(env: Env): Record<string, unknown> {
  const slack =
    env.LLMV_SLACK_WEBHOOK_URL === undefined
      ? undefined
      : compact({
          webhookUrl: env.LLMV_SLACK_WEBHOOK_URL,
          channel: env.LLMV_SLACK_CHANNEL,
          username: env.LLMV_SLACK_USERNAME,
        });
  const telegram =
    env.LLMV_TELEGRAM_BOT_TOKEN === undefined
      ? undefined
      : { botToken: env.LLMV_TELEGRAM_BOT_TOKEN, chatId: env.LLMV_TELEGRAM_CHAT_ID };
  const matrix =
    env.LLMV_MATRIX_HOMESERVER_URL === undefined
      ? undefined
      : {
          homeserverUrl: env.LLMV_MATRIX_HOMESERVER_URL,
          accessToken: env.LLMV_MATRIX_ACCESS_TOKEN,
          roomId: env.LLMV_MATRIX_ROOM_ID,
        };
  const whatsapp =
    env.LLMV_WHATSAPP_ACCOUNT_SID === undefined
      ? undefined
      : {
          accountSid: env.LLMV_WHATSAPP_ACCOUNT_SID,
          authToken: env.LLMV_WHATSAPP_AUTH_TOKEN,
          from: env.LLMV_WHATSAPP_FROM,
          to: list(env.LLMV_WHATSAPP_TO) ?? [],
        };
  const email =
    env.LLMV_SMTP_HOST === undefined
      ? undefined
      : {
          from: env.LLMV_EMAIL_FROM,
          to: list(env.LLMV_EMAIL_TO) ?? [],
          smtp: compact({
            host: env.LLMV_SMTP_HOST,
            port: int(env.LLMV_SMTP_PORT) ?? 587,
            secure: bool(env.LLMV_SMTP_SECURE),
            user: env.LLMV_SMTP_USER,
            pass: env.LLMV_SMTP_PASS,
          }),
        };

  return compact({
    workers: int(env.LLMV_NOTIFY_WORKERS),
    queueCapacity: int(env.LLMV_NOTIFY_QUEUE_CAPACITY),
    sendTimeoutMs: int(env.LLMV_NOTIFY_SEND_TIMEOUT_MS),
    deliveryTimeoutMs: int(env.LLMV_NOTIFY_DELIVERY_TIMEOUT_MS),
    graceMs: int(env.LLMV_NOTIFY_GRACE_MS),
    slack,
    telegram,
    matrix,
    whatsapp,
    email,
  });
}

/**
 * `LLMV_PROVIDERS=openai,groq` lists the providers; each reads
 * `LLMV_PROVIDER_<NAME>_BASE_URL`, `_API_KEY` and `_ADAPTER`.
 */
function providersFromEnv(env: Env): Array<Record<string, unknown>> {
  return (list(env.LLMV_PROVIDERS) ?? []).map((name) => {
    const prefix = `LLMV_PROVIDER_${name.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_`;
    return compact({
      name,
      baseURL: env[`${prefix}BASE_URL`] ?? DEFAULT_BASE_URLS[name.toLowerCase()],
      credential: env[`${prefix}API_KEY`],
      adapter: env[`${prefix}ADAPTER`],
    });
  });
}

function loggingFromEnv(env: Env): Record<string, unknown> {
  return compact({
    level: env.LLMV_LOG_LEVEL,
    pretty: bool(env.LLMV_LOG_PRETTY),
  });
}

// Unparseable numbers come back as NaN so the schema reports them.
function int(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function bool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

// ═══════════════════════════════════════════════════════════════════════
// Typed updates
// ═══════════════════════════════════════════════════════════════════════

/**
 * Holds the current configuration. Each update validates its own section and
 * swaps in a new frozen config; earlier snapshots stay valid.
 */
export class ConfigStore {
  private config: VerifierConfig;
  private readonly env: Env;

  constructor(config: VerifierConfig, env: Env = process.env) {
    this.config = deepFreeze(config);
    this.env = env;
  }

  get current(): VerifierConfig {
    return this.config;
  }

  updateProbe(patch: Partial<ProbeSettings>): VerifierConfig {
    const probe = validate(probeSchema, { ...this.config.probe, ...patch }, 'probe');
    return this.replace({ ...this.config, probe });
  }

  updateCache(patch: Partial<CacheSettings>): VerifierConfig {
    const cache = validate(cacheSchema, { ...this.config.cache, ...patch }, 'cache');
    return this.replace({ ...this.config, cache });
  }

  updateNotifications(patch: Partial<NotificationSettings>): VerifierConfig {
    const notifications = validate(notificationsSchema, { ...this.config.notifications, ...patch }, 'notifications');
    return this.replace({ ...this.config, notifications });
  }

  /**
   * Add a provider, or replace the one with the same name (case-insensitive).
   */
  upsertProvider(provider: ProviderConfig): VerifierConfig {
    const validated = validate(providerSchema, provider, 'provider');
    const resolved = resolveCredential(validated, this.env);
    if (!resolved.ok) {
      throw new ConfigValidationError([`provider.credential: ${resolved.message}`]);
    }

    const key = validated.name.toLowerCase();
    const others = this.config.providers.filter((existing) => existing.name.toLowerCase() !== key);
    return this.replace({ ...this.config, providers: [...others, resolved.provider] });
  }

  private replace(next: VerifierConfig): VerifierConfig {
    this.config = deepFreeze(next);
    return this.config;
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, section: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigValidationError(issuesOf(parsed.error, section));
  }
  return parsed.data;
}
