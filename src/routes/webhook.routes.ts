import express, { Router } from 'express';
import type { WebhookController } from '../controllers/webhook.controller';
import { asyncHandler } from '../middleware/relay.errorHandler.middleware';

export const createWebhookRoutes = (controller: WebhookController): Router => {
  const router: Router = Router();

  // Meta handshake
  router.get('/webhook', controller.verify);

  // Message deliveries; always answered with 200
  router.post(
    '/webhook',
    express.json({ limit: '1mb' }),
    asyncHandler(controller.receive),
    controller.acknowledgeUnparsable
  );

  return router;
};

export default createWebhookRoutes;
