import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { SessionStore, SessionSweeper, SnapshotPersister } from './session/index.js';
import { AssistantClient } from './assistant/client.js';
import { OpenAIThreadsGateway } from './assistant/openai-gateway.js';
import { ThreadStore } from './assistant/thread-store.js';
import { WhatsAppClient } from './whatsapp/client.js';
import { WebhookTicketClient } from './tickets/client.js';
import { MessageRouter } from './chat/router.js';
import { createServer, startServer } from './webhook/server.js';

logger.info({ nodeEnv: config.nodeEnv, version: config.appVersion }, '🤖 WhatsApp assistant relay starting...');

// Log configuration (without secrets)
logger.info({
  port: config.port,
  graphApiVersion: config.graphApiVersion,
  assistantConfigured: !!(config.openaiApiKey && config.assistantId),
  signatureCheck: !!config.appSecret,
  sessionTimeoutSeconds: config.sessionTimeoutSeconds,
  sessionWarningSeconds: config.sessionWarningSeconds,
  sessionsFilePath: config.sessionsFilePath,
}, 'Configuration loaded');

async function main(): Promise<void> {
  const store = new SessionStore({ sessionTimeoutMs: config.sessionTimeoutSeconds * 1000 });
  const persister = new SnapshotPersister(config.sessionsFilePath);
  store.restore(await persister.load());

  const whatsapp = new WhatsAppClient({
    accessToken: config.accessToken,
    phoneNumberId: config.phoneNumberId,
    apiVersion: config.graphApiVersion,
    maxAttempts: config.deliveryMaxAttempts,
    retryDelayMs: config.deliveryRetryDelayMs,
    timeoutMs: config.deliveryTimeoutMs,
  });

  const assistant = new AssistantClient(
    config.openaiApiKey
      ? new OpenAIThreadsGateway({ apiKey: config.openaiApiKey, requestTimeoutMs: config.assistantTimeoutMs })
      : null,
    new ThreadStore(config.threadsFilePath),
    {
      assistantId: config.assistantId,
      timeoutMs: config.assistantTimeoutMs,
      pollIntervalMs: config.assistantPollIntervalMs,
    }
  );

  const router = new MessageRouter({
    store,
    assistant,
    notifier: whatsapp,
    tickets: new WebhookTicketClient({ webhookUrl: config.ticketWebhookUrl }),
    snapshots: persister,
  });

  const sweeper = new SessionSweeper(store, whatsapp, persister, {
    intervalMs: config.sweepIntervalSeconds * 1000,
    warningThresholdMs: config.sessionWarningSeconds * 1000,
    snapshotIntervalMs: config.snapshotIntervalSeconds * 1000,
  });

  const app = createServer({
    handler: router,
    store,
    verifyToken: config.verifyToken,
    appSecret: config.appSecret,
    rateLimit: { limit: config.rateLimitMax, windowMs: config.rateLimitWindowSeconds * 1000 },
    version: config.appVersion,
    trustProxyHops: config.trustProxyHops,
  });

  const server = await startServer(app, config.port);
  sweeper.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    await sweeper.stop();
    await persister.save(store.snapshot());
    server.close((error) => {
      if (error) {
        logger.error({ error }, 'Error closing HTTP server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start');
  process.exit(1);
});
