/**
 * Item catalog. Reads are public; writes require a session and only touch the
 * caller's own items.
 */

import { InvalidItemError, ItemNotFoundError } from '@commerce/core';
import { CreateItemSchema, ListItemsQuerySchema, UpdateItemSchema } from '@commerce/types';
import { zValidator } from '@hono/zod-validator';
import { type Context, Hono } from 'hono';
import { requireAuth } from '../middleware/auth.js';
import type { AppServices } from '../services/index.js';
import type { AuthenticatedBindings } from '../types/context.js';

function itemErrorResponse(c: Context, error: unknown): Response {
  if (error instanceof ItemNotFoundError) {
    return c.json({ error: error.message }, 404);
  }
  if (error instanceof InvalidItemError) {
    return c.json({ error: error.message }, 400);
  }
  throw error;
}

export function createItemsRoute(services: AppServices) {
  const itemsRoute = new Hono<AuthenticatedBindings>();
  const authenticated = requireAuth(services);

  itemsRoute.get('/', zValidator('query', ListItemsQuerySchema), async (c) => {
    const query = c.req.valid('query');
    const result = await services.items.listItems({
      page: query.page,
      perPage: query.per_page,
      ...(query.user_id !== undefined && { userId: query.user_id }),
    });
    return c.json({
      items: result.items,
      total: result.total,
      page: result.page,
      perPage: result.perPage,
      hasNext: result.hasNext,
      hasPrev: result.hasPrev,
    });
  });

  itemsRoute.get('/:id', async (c) => {
    try {
      return c.json(await services.items.getItem(c.req.param('id')));
    } catch (error) {
      return itemErrorResponse(c, error);
    }
  });

  itemsRoute.post('/', authenticated, zValidator('json', CreateItemSchema), async (c) => {
    const body = c.req.valid('json');
    try {
      const item = await services.items.createItem(body, c.get('user').id);
      return c.json(item, 201);
    } catch (error) {
      return itemErrorResponse(c, error);
    }
  });

  itemsRoute.put('/:id', authenticated, zValidator('json', UpdateItemSchema), async (c) => {
    const body = c.req.valid('json');
    try {
      const item = await services.items.updateItem(c.req.param('id'), body, c.get('user').id);
      return c.json(item);
    } catch (error) {
      return itemErrorResponse(c, error);
    }
  });

  itemsRoute.delete('/:id', authenticated, async (c) => {
    try {
      await services.items.deleteItem(c.req.param('id'), c.get('user').id);
      return c.body(null, 204);
    } catch (error) {
      return itemErrorResponse(c, error);
    }
  });

  return itemsRoute;
}
