import express from 'express';
import type { Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AxiosAdapter } from 'axios';
import type { RelayEnv } from './config/relay.env.config';
import type { Sleeper } from './types/assistant.types';
import { AssistantService } from './services/assistant.service';
import { WhatsAppService } from './services/whatsapp.service';
import { InMemoryConversationDirectory } from './services/conversation.directory';
import type { ConversationDirectory } from './services/conversation.directory';
import { MessageOrchestrator } from './services/message.orchestrator';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { createWebhookRoutes } from './routes/webhook.routes';
import { createHealthRoutes } from './routes/health.routes';
import { errorHandlerMiddleware, notFoundMiddleware } from './middleware/relay.errorHandler.middleware';
import { httpLogStream } from './utils/relay.logger.utils';

export interface RelayComponents {
  orchestrator: MessageOrchestrator;
  directory: ConversationDirectory;
  verifyToken: string;
}

export interface RelayOverrides {
  /** Transport for both outbound clients */
  adapter?: AxiosAdapter;
  sleep?: Sleeper;
  now?: () => number;
}

/**
 * Wire the outbound clients, the directory and the orchestrator from a
 * validated environment.
 */
export function buildRelay(env: RelayEnv, overrides: RelayOverrides = {}): RelayComponents {
  const assistant = new AssistantService({
    apiKey: env.OPENAI_API_KEY,
    assistantId: env.OPENAI_ASSISTANT_ID,
    instructions: env.ASSISTANT_INSTRUCTIONS,
    pollIntervalMs: env.RUN_POLL_INTERVAL_MS,
    maxPollAttempts: env.RUN_MAX_POLL_ATTEMPTS,
    timeout: env.HTTP_TIMEOUT_MS,
    sleep: overrides.sleep,
    adapter: overrides.adapter
  });

  const gateway = new WhatsAppService({
    accessToken: env.ACCESS_TOKEN,
    phoneNumberId: env.PHONE_NUMBER_ID,
    apiVersion: env.WHATSAPP_API_VERSION,
    timeout: env.HTTP_TIMEOUT_MS,
    adapter: overrides.adapter
  });

  const directory = new InMemoryConversationDirectory(assistant, {
    ttlMs: env.CONVERSATION_TTL_SECONDS * 1000,
    maxEntries: env.CONVERSATION_MAX_ENTRIES,
    now: overrides.now
  });

  const orchestrator = new MessageOrchestrator({
    directory,
    assistant,
    gateway,
    runTimeoutMs: env.RUN_TIMEOUT_MS || undefined
  });

  return { orchestrator, directory, verifyToken: env.VERIFY_TOKEN };
}

export function createApp(components: RelayComponents): Express {
  const app: Express = express();

  app.use(helmet());
  app.use(morgan('combined', { stream: httpLogStream }));

  // Routes
  app.use(createHealthRoutes(new HealthController(components.directory)));
  app.use(createWebhookRoutes(new WebhookController(components.orchestrator, components.verifyToken)));

  app.use(notFoundMiddleware);
  app.use(errorHandlerMiddleware);

  return app;
}

export default createApp;
