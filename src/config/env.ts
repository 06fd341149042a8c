import { configSchema, type Config } from './schema.js';
import { ConfigError } from '../utils/errors.js';

function toInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return parseInt(value, 10);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the configuration from environment variables.
 * Throws ConfigError listing every invalid field.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Config {
  const rawConfig = {
    port: toInt(env.PORT),
    nodeEnv: nonEmpty(env.NODE_ENV),
    logLevel: nonEmpty(env.LOG_LEVEL)?.toLowerCase(),
    appVersion: nonEmpty(env.APP_VERSION),

    // WhatsApp
    verifyToken: env.VERIFY_TOKEN,
    accessToken: env.ACCESS_TOKEN,
    phoneNumberId: env.PHONE_NUMBER_ID,
    graphApiVersion: nonEmpty(env.VERSION),
    appSecret: nonEmpty(env.APP_SECRET),

    // OpenAI
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    assistantId: nonEmpty(env.ASSISTANT_ID),
    assistantTimeoutMs: toInt(env.ASSISTANT_TIMEOUT_MS),
    assistantPollIntervalMs: toInt(env.ASSISTANT_POLL_INTERVAL_MS),

    // Tickets
    ticketWebhookUrl: nonEmpty(env.ODOO_WEBHOOK_URL_TICKETS),

    // Sessions
    sessionTimeoutSeconds: toInt(env.SESSION_TIMEOUT),
    sessionWarningSeconds: toInt(env.SESSION_WARNING_TIME),
    sweepIntervalSeconds: toInt(env.SESSION_SWEEP_INTERVAL),
    snapshotIntervalSeconds: toInt(env.SESSION_SNAPSHOT_INTERVAL),
    sessionsFilePath: nonEmpty(env.SESSIONS_FILE_PATH),
    threadsFilePath: nonEmpty(env.THREADS_FILE_PATH),

    // Delivery
    deliveryMaxAttempts: toInt(env.DELIVERY_MAX_ATTEMPTS),
    deliveryRetryDelayMs: toInt(env.DELIVERY_RETRY_DELAY_MS),
    deliveryTimeoutMs: toInt(env.DELIVERY_TIMEOUT_MS),

    // Rate limit
    rateLimitMax: toInt(env.RATE_LIMIT_MAX),
    rateLimitWindowSeconds: toInt(env.RATE_LIMIT_WINDOW),
    trustProxyHops: toInt(env.TRUST_PROXY_HOPS),
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(issues);
  }

  return result.data;
}
