import type { AssistantClient } from '../types/assistant.types';
import type { ChatGateway, WhatsAppContact, WhatsAppInboundMessage } from '../types/whatsapp.types';
import type { ConversationDirectory } from './conversation.directory';
import { createLogger } from '../utils/relay.logger.utils';

const logger = createLogger('message-orchestrator');

export const UNKNOWN_CONTACT = 'Unknown';

export type MessageOutcome =
  | 'replied'
  | 'missing_sender'
  | 'conversation_failed'
  | 'append_failed'
  | 'no_reply'
  | 'delivery_failed';

export interface MessageOrchestratorDeps {
  directory: ConversationDirectory;
  assistant: AssistantClient;
  gateway: ChatGateway;
  /** Caller-supplied deadline for the assistant run */
  runTimeoutMs?: number;
}

/**
 * Display name of the first contact whose wa_id matches the sender.
 */
export function resolveContactName(senderId: string, contacts: WhatsAppContact[] = []): string {
  const contact = contacts.find((c) => c.wa_id === senderId);
  return contact?.profile?.name ?? UNKNOWN_CONTACT;
}

/**
 * ========================================
 * MESSAGE ORCHESTRATOR
 * ========================================
 *
 * Drives one inbound message through the assistant and back:
 * thread lookup → append → run → send.
 * Every failure ends the pipeline quietly; the user never sees an error.
 */
export class MessageOrchestrator {
  private readonly directory: ConversationDirectory;
  private readonly assistant: AssistantClient;
  private readonly gateway: ChatGateway;
  private readonly runTimeoutMs?: number;

  constructor(deps: MessageOrchestratorDeps) {
    this.directory = deps.directory;
    this.assistant = deps.assistant;
    this.gateway = deps.gateway;
    this.runTimeoutMs = deps.runTimeoutMs;
  }

  async handleMessage(
    message: WhatsAppInboundMessage,
    contacts: WhatsAppContact[] = []
  ): Promise<MessageOutcome> {
    const startTime = Date.now();
    const senderId = message.from;
    const text = message.text?.body ?? '';

    if (!senderId) {
      logger.error('No sender id in message', { messageId: message.id });
      return 'missing_sender';
    }

    const contactName = resolveContactName(senderId, contacts);
    logger.messageReceived({ userId: senderId, contactName, messageLength: text.length });

    let threadId: string;
    try {
      threadId = await this.directory.resolve(senderId);
    } catch (error: unknown) {
      logger.error('Failed to resolve conversation thread', {
        userId: senderId,
        error: error instanceof Error ? error.message : String(error)
      });
      return 'conversation_failed';
    }

    if (!(await this.assistant.appendMessage(threadId, text))) {
      logger.error('Failed to add message to thread', { userId: senderId, threadId });
      return 'append_failed';
    }

    const signal = this.runTimeoutMs ? AbortSignal.timeout(this.runTimeoutMs) : undefined;
    const reply = await this.assistant.runJob(threadId, { signal });

    if (!reply) {
      logger.error('No AI response generated', { userId: senderId, threadId });
      return 'no_reply';
    }

    if (!(await this.gateway.send(senderId, reply))) {
      logger.error(`Failed to send response to ${contactName}`, { userId: senderId });
      return 'delivery_failed';
    }

    logger.replyDelivered({
      userId: senderId,
      contactName,
      replyLength: reply.length,
      duration: Date.now() - startTime
    });
    return 'replied';
  }
}
