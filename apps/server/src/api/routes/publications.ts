import { Router, type Request, type Response } from 'express';
import { NotFoundError } from '../../errors';
import type { PublishDispatcher } from '../../services/publishing/dispatcher';
import type { PublicationStore } from '../../services/publishing/store';

export interface PublicationsRouterDeps {
  publications: PublicationStore;
  dispatcher: PublishDispatcher;
}

export function createPublicationsRouter({ publications, dispatcher }: PublicationsRouterDeps): Router {
  const router = Router();

  router.get('/:id', async (req: Request, res: Response) => {
    const publication = await publications.get(String(req.params.id));
    if (!publication) {
      throw new NotFoundError('publication', String(req.params.id));
    }
    res.status(200).json(publication);
  });

  router.post('/:id/retry', async (req: Request, res: Response) => {
    const result = await dispatcher.retryPublication(String(req.params.id));
    res.status(202).json(result);
  });

  return router;
}
