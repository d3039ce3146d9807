import { Router } from 'express';
import { ValidationController } from '../controller/validation.controller';
import { validateRequest } from '../middleware/validation.middle';
import { fieldValidationSchema, jobInputSchema } from '../schemas/job.schemas';

export const createValidationRoutes = (controller = new ValidationController()) => {
  const router = Router();

  router.post(
    '/field',
    validateRequest(fieldValidationSchema),
    (req, res, next) => controller.validateField(req, res, next)
  );

  router.post(
    '/job',
    validateRequest(jobInputSchema),
    (req, res, next) => controller.validateJob(req, res, next)
  );

  return router;
};
