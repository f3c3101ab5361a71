import { Hono } from 'hono';
import type { Env } from '../types';
import { getTodaySession } from '../services/session';
import { sessionQuerySchema } from './schemas';

const session = new Hono<{ Bindings: Env }>();

// GET /api/session/today?limit=30
session.get('/today', (c) => {
  const { limit } = sessionQuerySchema.parse(c.req.query());
  return c.json(getTodaySession(c.env.DB, { limit, now: new Date(), timeZone: c.env.LOCAL_TZ }));
});

export default session;
