import { Router } from 'express';
import { ValidationController } from '../controller/validation.controller';
import { validateRequest } from '../middleware/validation.middle';
import { costRequestSchema } from '../schemas/job.schemas';

export const createCostRoutes = (controller = new ValidationController()) => {
  const router = Router();

  router.post(
    '/',
    validateRequest(costRequestSchema),
    (req, res, next) => controller.computeCost(req, res, next)
  );

  return router;
};
