import { z } from 'zod';

/**
 * WhatsApp Business webhook payload, as delivered by Meta.
 * Only the fields the relay reads are declared; unknown keys pass through
 * and a null optional field is read as absent.
 */

export const WHATSAPP_OBJECT = 'whatsapp_business_account';

export const contactSchema = z.object({
  wa_id: z.string().nullish(),
  profile: z.object({
    name: z.string().nullish()
  }).passthrough().nullish()
}).passthrough();

export const inboundMessageSchema = z.object({
  from: z.string().nullish(),
  id: z.string().nullish(),
  type: z.string().nullish(),
  text: z.object({
    body: z.string().nullish()
  }).passthrough().nullish()
}).passthrough();

export const changeValueSchema = z.object({
  messaging_product: z.string().nullish(),
  contacts: z.array(contactSchema).nullish(),
  messages: z.array(inboundMessageSchema).nullish(),
  statuses: z.array(z.unknown()).nullish()
}).passthrough();

export const webhookPayloadSchema = z.object({
  object: z.string(),
  entry: z.array(z.object({
    id: z.string().nullish(),
    changes: z.array(z.object({
      field: z.string().nullish(),
      value: changeValueSchema.nullish()
    }).passthrough()).nullish()
  }).passthrough()).nullish()
}).passthrough();

export type WhatsAppContact = z.infer<typeof contactSchema>;
export type WhatsAppInboundMessage = z.infer<typeof inboundMessageSchema>;
export type WhatsAppWebhookPayload = z.infer<typeof webhookPayloadSchema>;

/** Query string of the handshake: hub.mode, hub.verify_token, hub.challenge */
export type HandshakeQuery = Record<string, unknown>;

export type HandshakeResult =
  | { verified: true; challenge: string }
  | { verified: false };

/**
 * Outcome of one webhook delivery. Every kind is acknowledged with
 * 200 OK so the provider never retries.
 */
export type WebhookResult =
  | { kind: 'ignored'; reason: string }
  | { kind: 'malformed'; reason: string }
  | { kind: 'processed'; messages: number; statuses: number; failed: number };

export interface ChatGateway {
  send(recipientId: string, text: string): Promise<boolean>;
}
