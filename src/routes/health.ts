import { Router } from 'express';

export function createHealthRouter(getActiveSessions: () => number): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ status: 'ok', active_sessions: getActiveSessions() });
  });

  return router;
}
