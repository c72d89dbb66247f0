#!/usr/bin/env tsx
import express from 'express';
import { consoleLogger, loadSession, storePaths } from '@pitwall/riderpipe';
import { createRiderRouter, SessionHolder } from './routes';

export function createApp(sessions: SessionHolder): express.Express {
  const app = express();
  app.use(express.json());
  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });
  app.use('/api', createRiderRouter(sessions));
  return app;
}

if (require.main === module) {
  const PORT = parseInt(process.env.PITWALL_PORT || '4000', 10);
  const paths = storePaths();
  const sessions = new SessionHolder(() => loadSession({ paths, logger: consoleLogger }));
  void sessions.get().then(
    (session) => console.log(`[server] Loaded ${session.registry.size} riders from ${paths.root}`),
    (e: unknown) => console.error(`[server] Initial load failed: ${e instanceof Error ? e.message : String(e)}`),
  );
  createApp(sessions).listen(PORT, '0.0.0.0', () => {
    console.log(`Pitwall running on http://localhost:${PORT}`);
  });
}
