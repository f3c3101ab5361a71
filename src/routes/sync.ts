import { Hono } from 'hono';
import type { Env } from '../types';
import { exportSnapshot, importSnapshot } from '../services/sync-merge';

const sync = new Hono<{ Bindings: Env }>();

sync.get('/export', (c) => {
  return c.json(exportSnapshot(c.env.DB));
});

/**
 * POST /api/sync/import
 *
 * Request body: a snapshot as produced by /export.
 * Response: { addedVocabs, updatedVocabs, addedLogs, conflicts }
 *
 * Any schemaVersion other than "v1" is rejected with 400 before anything
 * is written.
 */
sync.post('/import', async (c) => {
  const payload: unknown = await c.req.json();
  return c.json(importSnapshot(c.env.DB, payload));
});

export default sync;
