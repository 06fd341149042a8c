import pino from 'pino';

export const logger = pino({
  name: 'wa-assistant-relay',
  level: process.env.LOG_LEVEL?.toLowerCase() || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  // Access tokens travel in outbound request headers
  redact: ['headers.Authorization', 'accessToken', 'appSecret', 'openaiApiKey'],
});

export type Logger = typeof logger;
