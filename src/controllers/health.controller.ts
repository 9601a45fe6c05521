import type { Request, Response } from 'express';
import type { ConversationDirectory } from '../services/conversation.directory';

export const SERVICE_BANNER = {
  message: 'WhatsApp Bot with OpenAI Assistant',
  status: 'running',
  version: '2.0.0'
} as const;

export class HealthController {
  constructor(private readonly directory: Pick<ConversationDirectory, 'size'>) {}

  /**
   * Liveness plus the number of tracked conversation threads
   */
  healthCheck = (_req: Request, res: Response): void => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      threads_count: this.directory.size()
    });
  };

  home = (_req: Request, res: Response): void => {
    res.status(200).json(SERVICE_BANNER);
  };
}
