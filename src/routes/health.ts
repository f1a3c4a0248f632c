import { Router } from 'express';
import type { ModelSession } from '../engine/modelSession';

export function createHealthRouter(session: ModelSession): Router {
  const router = Router();

  router.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get('/ready', (_req, res) => {
    const status = session.status();
    const ready = status.loaded && !status.corrupted;
    res.status(ready ? 200 : 503).json({ status: ready ? 'ready' : 'not_ready' });
  });

  router.get('/', (_req, res) => {
    const status = session.status();
    const healthy = status.loaded && !status.corrupted;
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      model_loaded: status.loaded,
      device: status.device,
      engine_busy: status.busy,
      queue_depth: status.queueDepth,
      uptime_s: Math.round(process.uptime()),
    });
  });

  return router;
}
