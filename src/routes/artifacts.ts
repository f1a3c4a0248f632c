import { Request, Response, Router } from 'express';
import type { ResultStore } from '../storage/resultStore';
import { asyncRoute, sendPipelineError } from './httpErrors';

export function createArtifactsRouter(store: ResultStore): Router {
  const router = Router();

  router.get('/:key', asyncRoute(async (req: Request, res: Response) => {
    const key = req.params.key;
    const artifact = await store.get(key);
    if (!artifact.ok) {
      sendPipelineError(res, artifact.error);
      return;
    }

    res.setHeader('Content-Type', 'audio/wav');
    res.setHeader('Content-Disposition', `attachment; filename="synthesis_${artifact.value.key}.wav"`);
    res.setHeader('Cache-Control', 'no-store');
    res.status(200).send(artifact.value.wav);
  }));

  router.delete('/:key', asyncRoute(async (req: Request, res: Response) => {
    const removed = await store.delete(req.params.key);
    if (!removed) {
      res.status(404).json({ error: 'not_found' });
      return;
    }
    res.status(204).end();
  }));

  return router;
}
