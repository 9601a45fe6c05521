import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { ChatGateway } from '../types/whatsapp.types';
import { createLogger } from '../utils/relay.logger.utils';

const logger = createLogger('whatsapp-service');

export interface WhatsAppServiceConfig {
  accessToken: string;
  phoneNumberId: string;
  apiVersion?: string;
  timeout?: number;
  /** Replaces the transport, used by tests */
  adapter?: AxiosAdapter;
}

/**
 * ========================================
 * WHATSAPP SERVICE
 * ========================================
 *
 * Sends text messages through the WhatsApp Business Cloud API.
 * Failures are logged and reported as `false`; nothing is retried.
 */
export class WhatsAppService implements ChatGateway {
  private readonly http: AxiosInstance;
  private readonly phoneNumberId: string;
  private readonly accessToken: string;

  constructor(config: WhatsAppServiceConfig) {
    if (!config.accessToken) {
      throw new Error('ACCESS_TOKEN is required');
    }

    this.phoneNumberId = config.phoneNumberId;
    this.accessToken = config.accessToken;
    this.http = axios.create({
      baseURL: `https://graph.facebook.com/${config.apiVersion ?? 'v22.0'}`,
      timeout: config.timeout ?? 30000,
      ...(config.adapter && { adapter: config.adapter })
    });
  }

  async send(recipientId: string, text: string): Promise<boolean> {
    try {
      await this.http.post(`/${this.phoneNumberId}/messages`, {
        messaging_product: 'whatsapp',
        to: recipientId,
        type: 'text',
        text: { body: text }
      }, {
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json'
        }
      });

      logger.info('Message sent successfully', { userId: recipientId });
      return true;

    } catch (error: unknown) {
      logger.error('Failed to send WhatsApp message', {
        userId: recipientId,
        error: error instanceof Error ? error.message : String(error),
        status: axios.isAxiosError(error) ? error.response?.status : undefined
      });
      return false;
    }
  }
}

export default WhatsAppService;
