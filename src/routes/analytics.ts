import { Hono } from 'hono';
import type { Env } from '../types';
import { getOverview, getTopicStats } from '../services/analytics';
import { analyticsQuerySchema } from './schemas';

const analytics = new Hono<{ Bindings: Env }>();

analytics.get('/overview', (c) => {
  const { days } = analyticsQuerySchema.parse(c.req.query());
  return c.json(getOverview(c.env.DB, days));
});

analytics.get('/topics', (c) => {
  const { days } = analyticsQuerySchema.parse(c.req.query());
  return c.json({ days, topics: getTopicStats(c.env.DB, days) });
});

export default analytics;
