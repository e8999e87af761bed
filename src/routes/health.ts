import { Router } from 'express';

export function createHealthRouter(activeCalls: () => number): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ status: 'ok', active_calls: activeCalls() });
  });

  return router;
}
