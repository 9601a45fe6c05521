import type { Request, Response, NextFunction } from 'express';
import { WHATSAPP_OBJECT, webhookPayloadSchema } from '../types/whatsapp.types';
import type { HandshakeQuery, HandshakeResult, WebhookResult } from '../types/whatsapp.types';
import type { MessageOrchestrator } from '../services/message.orchestrator';
import { createLogger } from '../utils/relay.logger.utils';

const logger = createLogger('webhook-controller');

export const SUBSCRIBE_MODE = 'subscribe';

/**
 * Meta's ownership check: echo the challenge only when the mode is
 * `subscribe` and the token matches the configured secret.
 */
export function verifyHandshake(query: HandshakeQuery, verifyToken: string): HandshakeResult {
  const mode = query['hub.mode'];
  const token = query['hub.verify_token'];
  const challenge = query['hub.challenge'];

  if (mode === SUBSCRIBE_MODE && token === verifyToken) {
    return { verified: true, challenge: typeof challenge === 'string' ? challenge : '' };
  }

  return { verified: false };
}

/**
 * Walk a delivery notification and hand every message to the orchestrator,
 * one at a time. A message that throws is counted and the walk goes on.
 * Never throws.
 */
export async function processWebhookPayload(
  body: unknown,
  orchestrator: Pick<MessageOrchestrator, 'handleMessage'>
): Promise<WebhookResult> {
  if (typeof body !== 'object' || body === null || !('object' in body)) {
    return { kind: 'ignored', reason: 'missing object field' };
  }

  if (body.object !== WHATSAPP_OBJECT) {
    return { kind: 'ignored', reason: `unexpected object: ${String(body.object)}` };
  }

  const parsed = webhookPayloadSchema.safeParse(body);
  if (!parsed.success) {
    return { kind: 'malformed', reason: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }

  let messages = 0;
  let statuses = 0;
  let failed = 0;

  for (const entry of parsed.data.entry ?? []) {
    for (const change of entry.changes ?? []) {
      if (change.field !== 'messages') {
        continue;
      }

      const value = change.value ?? {};

      if (value.statuses) {
        logger.info('Received WhatsApp status update');
        statuses++;
        continue;
      }

      for (const message of value.messages ?? []) {
        try {
          await orchestrator.handleMessage(message, value.contacts ?? []);
          messages++;
        } catch (error: unknown) {
          failed++;
          logger.error('Failed to process message', {
            messageId: message.id,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      }
    }
  }

  return { kind: 'processed', messages, statuses, failed };
}

export class WebhookController {
  constructor(
    private readonly orchestrator: MessageOrchestrator,
    private readonly verifyToken: string
  ) {}

  verify = (req: Request, res: Response): void => {
    const result = verifyHandshake(req.query, this.verifyToken);

    if (result.verified) {
      logger.info('WEBHOOK_VERIFIED');
      res.status(200).type('text/plain').send(result.challenge);
      return;
    }

    logger.warn('Webhook verification failed', {
      mode: req.query['hub.mode'],
      tokenProvided: req.query['hub.verify_token'] !== undefined
    });
    res.status(403).type('text/plain').send('Forbidden');
  };

  receive = async (req: Request, res: Response): Promise<void> => {
    logger.debug('Received webhook', { body: req.body });

    const result = await processWebhookPayload(req.body, this.orchestrator);
    logger.webhookHandled(result);

    res.status(200).type('text/plain').send('OK');
  };

  /**
   * Bodies the JSON parser rejects are still acknowledged so the provider
   * does not retry them.
   */
  acknowledgeUnparsable = (error: Error, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    logger.webhookHandled({ kind: 'malformed', reason: error.message });
    res.status(200).type('text/plain').send('OK');
  };
}
