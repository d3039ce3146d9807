import { Router } from 'express';
import { DraftController } from '../controller/draft.controller';

export const createJobRoutes = (controller: DraftController) => {
  const router = Router();

  router.post('/:id/draft', (req, res, next) => controller.createDraftFromJob(req, res, next));

  router.put('/:id/draft/:draftId', (req, res, next) => controller.updateJobFromDraft(req, res, next));

  return router;
};
