import { z } from 'zod';

export const configSchema = z
  .object({
    // Server
    port: z.number().min(1).max(65535).default(3000),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    appVersion: z.string().default('1.0.0'),

    // WhatsApp Cloud API
    verifyToken: z.string().min(1),
    accessToken: z.string().min(1),
    phoneNumberId: z.string().min(1),
    graphApiVersion: z.string().regex(/^v\d+\.\d+$/).default('v18.0'),
    // Without an app secret, webhook signatures are not checked
    appSecret: z.string().min(1).optional(),

    // OpenAI Assistant
    openaiApiKey: z.string().optional(),
    assistantId: z.string().optional(),
    assistantTimeoutMs: z.number().min(1000).max(300000).default(60000),
    assistantPollIntervalMs: z.number().min(100).max(10000).default(1000),

    // Ticket webhook (optional - tickets are only logged without it)
    ticketWebhookUrl: z.string().url().optional(),

    // Sessions (seconds)
    sessionTimeoutSeconds: z.number().int().min(1).default(600),
    sessionWarningSeconds: z.number().int().min(1).default(300),
    sweepIntervalSeconds: z.number().int().min(1).max(3600).default(30),
    snapshotIntervalSeconds: z.number().int().min(1).default(300),
    sessionsFilePath: z.string().min(1).default('sessions.json'),
    threadsFilePath: z.string().min(1).default('threads.json'),

    // Outbound delivery
    deliveryMaxAttempts: z.number().int().min(1).max(10).default(3),
    deliveryRetryDelayMs: z.number().int().min(0).default(1000),
    deliveryTimeoutMs: z.number().int().min(1000).default(10000),

    // Inbound rate limit (per client IP)
    rateLimitMax: z.number().int().min(1).default(100),
    rateLimitWindowSeconds: z.number().int().min(1).default(3600),
    // Reverse proxies in front of the server; 0 ignores X-Forwarded-For
    trustProxyHops: z.number().int().min(0).max(10).default(0),
  })
  .refine((c) => c.sessionWarningSeconds < c.sessionTimeoutSeconds, {
    message: 'SESSION_WARNING_TIME must be lower than SESSION_TIMEOUT',
    path: ['sessionWarningSeconds'],
  });

export type Config = z.infer<typeof configSchema>;
