import { Router } from 'express';
import { WEBHOOK_PATHS } from '../config/index.js';
import { RESOURCE_TYPES } from '../types/index.js';
import type { NotificationGateway } from '../services/gateway.js';

/**
 * Inbound change-notification endpoints, one per resource type
 */
export function createWebhooksRouter(gateway: NotificationGateway): Router {
  const router = Router();

  for (const resourceType of RESOURCE_TYPES) {
    router.all(WEBHOOK_PATHS[resourceType], async (req, res, next) => {
      try {
        const { validationToken } = req.query;
        if (typeof validationToken === 'string') {
          res
            .status(200)
            .type('text/plain')
            .send(gateway.handleValidation(resourceType, validationToken));
          return;
        }

        if (req.method !== 'POST') {
          res.status(405).set('Allow', 'POST').end();
          return;
        }

        const result = await gateway.acceptBatch(resourceType, req.body);
        res.status(202).json(result);
      } catch (error) {
        next(error);
      }
    });
  }

  return router;
}
