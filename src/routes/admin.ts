import { Router } from 'express';
import { RelayError } from '../middleware/error.js';
import { isResourceType, isSubscriptionStatus } from '../types/index.js';
import type { ResourceType, Subscription } from '../types/index.js';
import type { DispatcherStats } from '../services/dispatcher.js';
import type { SubscriptionManager } from '../services/subscription-manager.js';
import type { SubscriptionFilter } from '../services/subscription-store.js';

export interface AdminRouterContext {
  manager: SubscriptionManager;
  dispatcherStats: () => DispatcherStats;
}

/**
 * Operator view of a subscription; the clientState secret stays server-side
 */
function presentSubscription(subscription: Subscription): Omit<Subscription, 'clientState'> {
  const { clientState: _secret, ...visible } = subscription;
  return visible;
}

function optionalString(value: unknown, name: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw RelayError.badRequest(`${name} must be a non-empty string`);
  }
  return value;
}

function requireString(value: unknown, name: string): string {
  const parsed = optionalString(value, name);
  if (parsed === undefined) {
    throw RelayError.badRequest(`${name} is required`);
  }
  return parsed;
}

function optionalBoolean(value: unknown, name: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw RelayError.badRequest(`${name} must be a boolean`);
}

function requireResourceType(value: unknown): ResourceType {
  if (!isResourceType(value)) {
    throw RelayError.badRequest('resourceType must be one of Email, TeamsChat, TeamsChannel');
  }
  return value;
}

export function createAdminRouter(ctx: AdminRouterContext): Router {
  const router = Router();

  router.get('/subscriptions', (req, res, next) => {
    try {
      const filter: SubscriptionFilter = {};
      const { status, account, resourceType } = req.query;

      if (status !== undefined) {
        if (!isSubscriptionStatus(status)) {
          throw RelayError.badRequest(`Unknown status: ${String(status)}`);
        }
        filter.status = status;
      }
      filter.account = optionalString(account, 'account');
      if (resourceType !== undefined) {
        filter.resourceType = requireResourceType(resourceType);
      }

      res.json({ value: ctx.manager.listSubscriptions(filter).map(presentSubscription) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/subscriptions', async (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null) {
        throw RelayError.badRequest('Request body must be a JSON object');
      }
      const account = requireString(Reflect.get(body, 'account'), 'account');
      const resourceType = requireResourceType(Reflect.get(body, 'resourceType'));
      const resourcePath = optionalString(Reflect.get(body, 'resourcePath'), 'resourcePath');
      const changeType = optionalString(Reflect.get(body, 'changeType'), 'changeType');
      const allChannels = optionalBoolean(Reflect.get(body, 'allChannels'), 'allChannels');

      if (allChannels) {
        if (resourceType !== 'TeamsChannel') {
          throw RelayError.badRequest('allChannels only applies to TeamsChannel subscriptions');
        }
        if (resourcePath !== undefined) {
          throw RelayError.badRequest('Cannot combine resourcePath with allChannels');
        }
        const ensured = await ctx.manager.ensureTeamChannels(account, changeType);
        res.status(201).json({ value: ensured.map(presentSubscription) });
        return;
      }

      const subscription = await ctx.manager.ensureSubscription(account, resourceType, resourcePath, changeType);
      res.status(201).json(presentSubscription(subscription));
    } catch (error) {
      next(error);
    }
  });

  // Registered before /:id/renew so "revoke" is never read as an id
  router.post('/subscriptions/revoke', async (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null) {
        throw RelayError.badRequest('Request body must be a JSON object');
      }
      const account = requireString(Reflect.get(body, 'account'), 'account');
      const resourceType = requireResourceType(Reflect.get(body, 'resourceType'));

      const revoked = await ctx.manager.revoke(account, resourceType);
      res.json({ value: revoked.map(presentSubscription) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/subscriptions/:id/renew', async (req, res, next) => {
    try {
      const subscription = await ctx.manager.forceRenew(req.params.id);
      res.json(presentSubscription(subscription));
    } catch (error) {
      next(error);
    }
  });

  // Targets the renewal loop will not recreate until ensured again
  router.get('/holds', (_req, res) => {
    res.json({ value: ctx.manager.listHolds() });
  });

  router.post('/reconcile', async (_req, res, next) => {
    try {
      res.json(await ctx.manager.reconcile());
    } catch (error) {
      next(error);
    }
  });

  router.get('/dispatcher', (_req, res) => {
    res.json(ctx.dispatcherStats());
  });

  return router;
}
