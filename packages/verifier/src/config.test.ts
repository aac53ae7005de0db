import { describe, it, expect } from 'vitest';
import { ConfigStore, ConfigValidationError, loadConfig } from './config.js';

function issuesOf(run: () => unknown): readonly string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigValidationError');
}

describe('loadConfig', () => {
  it('fills every section with defaults', () => {
    const config = loadConfig({});

    expect(config.probe).toEqual({
      timeoutMs: 30_000,
      ttftCeilingMs: 10_000,
      totalCeilingMs: 60_000,
      transportEncodings: ['br'],
    });
    expect(config.cache).toEqual({
      ttlMs: 3_600_000,
      sweepIntervalMs: 60_000,
      maxItems: 10_000,
      tierTimeoutMs: 1000,
      keyPrefix: 'llmv:',
    });
    expect(config.notifications).toEqual({
      workers: 4,
      queueCapacity: 100,
      sendTimeoutMs: 5000,
      deliveryTimeoutMs: 10_000,
      graceMs: 5000,
    });
    expect(config.providers).toEqual([]);
    expect(config.logging).toEqual({ level: 'info', pretty: false });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.probe.transportEncodings)).toBe(true);
  });

  it('reads LLMV_* variables', () => {
    const config = loadConfig({
      LLMV_PROBE_TIMEOUT_MS: '15000',
      LLMV_TRANSPORT_ENCODINGS: 'br, zstd',
      LLMV_CACHE_TTL_MS: '60000',
      LLMV_REDIS_URL: 'redis://localhost:6379',
      LLMV_NOTIFY_WORKERS: '2',
      LLMV_LOG_LEVEL: 'debug',
      LLMV_LOG_PRETTY: 'true',
    });

    expect(config.probe.timeoutMs).toBe(15_000);
    expect(config.probe.transportEncodings).toEqual(['br', 'zstd']);
    expect(config.cache.ttlMs).toBe(60_000);
    expect(config.cache.redisUrl).toBe('redis://localhost:6379');
    expect(config.notifications.workers).toBe(2);
    expect(config.logging).toEqual({ level: 'debug', pretty: true });
  });

  it('builds providers and resolves env: credentials', () => {
    const config = loadConfig({
      LLMV_PROVIDERS: 'openai, groq',
      LLMV_PROVIDER_OPENAI_API_KEY: 'env:OPENAI_API_KEY',
      OPENAI_API_KEY: 'test-secret',
      LLMV_PROVIDER_GROQ_BASE_URL: 'https://api.groq.test/openai/v1',
      LLMV_PROVIDER_GROQ_API_KEY: 'test-groq-key',
      LLMV_PROVIDER_GROQ_ADAPTER: 'openai',
    });

    expect(config.providers).toEqual([
      { name: 'openai', baseURL: 'https://api.openai.com/v1', credential: 'test-secret' },
      { name: 'groq', baseURL: 'https://api.groq.test/openai/v1', credential: 'test-groq-key', adapter: 'openai' },
    ]);
  });

  it('reads notification channels', () => {
    const config = loadConfig({
      LLMV_SLACK_WEBHOOK_URL: 'https://hooks.slack.test/services/test',
      LLMV_SLACK_CHANNEL: '#llm-alerts',
      LLMV_TELEGRAM_BOT_TOKEN: 'test-token',
      LLMV_TELEGRAM_CHAT_ID: '12345',
      LLMV_MATRIX_HOMESERVER_URL: 'https://matrix.example.org',
      LLMV_MATRIX_ACCESS_TOKEN: 'test-token',
      LLMV_MATRIX_ROOM_ID: '!alerts:example.org',
      LLMV_WHATSAPP_ACCOUNT_SID: 'AC-test',
      LLMV_WHATSAPP_AUTH_TOKEN: 'test-secret',
      LLMV_WHATSAPP_FROM: '+15550000000',
      LLMV_WHATSAPP_TO: '+15550000001,+15550000002',
      LLMV_SMTP_HOST: 'smtp.example.com',
      LLMV_EMAIL_FROM: 'verifier@example.com',
      LLMV_EMAIL_TO: 'ops@example.com,oncall@example.com',
    });

    expect(config.notifications.slack).toEqual({
      webhookUrl: 'https://hooks.slack.test/services/test',
      channel: '#llm-alerts',
    });
    expect(config.notifications.telegram).toEqual({ botToken: 'test-token', chatId: '12345' });
    expect(config.notifications.matrix).toEqual({
      homeserverUrl: 'https://matrix.example.org',
      accessToken: 'test-token',
      roomId: '!alerts:example.org',
    });
    expect(config.notifications.whatsapp).toEqual({
      accountSid: 'AC-test',
      authToken: 'test-secret',
      from: '+15550000000',
      to: ['+15550000001', '+15550000002'],
    });
    expect(config.notifications.email).toEqual({
      from: 'verifier@example.com',
      to: ['ops@example.com', 'oncall@example.com'],
      smtp: { host: 'smtp.example.com', port: 587 },
    });
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig(
      { LLMV_CACHE_TTL_MS: '1000', LLMV_PROVIDERS: 'openai' },
      { cache: { ttlMs: 5000 }, providers: [{ name: 'local', baseURL: 'http://localhost:8080/v1', adapter: 'openai' }] },
    );

    expect(config.cache.ttlMs).toBe(5000);
    expect(config.providers.map((provider) => provider.name)).toEqual(['local']);
  });

  it('reports an unset credential variable', () => {
    const issues = issuesOf(() =>
      loadConfig({ LLMV_PROVIDERS: 'openai', LLMV_PROVIDER_OPENAI_API_KEY: 'env:OPENAI_API_KEY' }),
    );

    expect(issues).toEqual(['providers.0.credential: environment variable OPENAI_API_KEY is not set']);
  });

  it('reports fields the schema rejects with their paths', () => {
    expect(issuesOf(() => loadConfig({ LLMV_PROVIDERS: 'mistral' }))).toEqual(['providers.0.baseURL: Required']);
    expect(issuesOf(() => loadConfig({ LLMV_PROBE_TIMEOUT_MS: 'soon' }))).toEqual([
      expect.stringMatching(/^probe\.timeoutMs: /),
    ]);
    expect(() => loadConfig({ LLMV_TTFT_CEILING_MS: '-5' })).toThrow(ConfigValidationError);
  });
});

describe('ConfigStore', () => {
  it('applies a section update as a new frozen config', () => {
    const store = new ConfigStore(loadConfig({}));
    const before = store.current;

    const after = store.updateProbe({ ttftCeilingMs: 5000 });

    expect(after.probe.ttftCeilingMs).toBe(5000);
    expect(after.probe.totalCeilingMs).toBe(60_000);
    expect(before.probe.ttftCeilingMs).toBe(10_000);
    expect(store.current).toBe(after);
    expect(Object.isFrozen(after.probe)).toBe(true);
  });

  it('rejects an invalid update and keeps the current config', () => {
    const store = new ConfigStore(loadConfig({}));
    const before = store.current;

    expect(issuesOf(() => store.updateCache({ ttlMs: 0 }))).toEqual(['cache.ttlMs: Number must be greater than 0']);
    expect(store.current).toBe(before);
  });

  it('updates notification settings', () => {
    const store = new ConfigStore(loadConfig({}));

    const next = store.updateNotifications({ workers: 8, slack: { webhookUrl: 'https://hooks.slack.test/services/test' } });

    expect(next.notifications.workers).toBe(8);
    expect(next.notifications.slack?.webhookUrl).toBe('https://hooks.slack.test/services/test');
  });

  it('upserts providers by name and resolves their credentials', () => {
    const store = new ConfigStore(loadConfig({ LLMV_PROVIDERS: 'openai' }), { GROQ_KEY: 'test-groq-key' });

    store.upsertProvider({ name: 'groq', baseURL: 'https://api.groq.test/openai/v1', credential: 'env:GROQ_KEY' });
    const next = store.upsertProvider({ name: 'OpenAI', baseURL: 'https://gateway.test/v1' });

    expect(next.providers).toEqual([
      { name: 'groq', baseURL: 'https://api.groq.test/openai/v1', credential: 'test-groq-key' },
      { name: 'OpenAI', baseURL: 'https://gateway.test/v1' },
    ]);
  });
});
