import { Router } from 'express';
import { DraftController } from '../controller/draft.controller';
import { validateRequest } from '../middleware/validation.middle';
import { draftBodySchema } from '../schemas/job.schemas';

export const createDraftRoutes = (controller: DraftController) => {
  const router = Router();

  router.get('/:id', (req, res, next) => controller.getDraft(req, res, next));

  router.put(
    '/:id',
    validateRequest(draftBodySchema),
    (req, res, next) => controller.saveDraft(req, res, next)
  );

  router.delete('/:id', (req, res, next) => controller.discardDraft(req, res, next));

  router.post('/:id/publish', (req, res, next) => controller.publishDraft(req, res, next));

  return router;
};
