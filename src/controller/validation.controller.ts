import { Request, Response, NextFunction } from 'express';
import { validateFieldInput, validateJob } from '../services/validation/job.validators';
import { computeCost } from '../services/cost/cost.calculator';
import { CostRequestBody, FieldValidationBody, JobInputBody } from '../schemas/job.schemas';

/** Stateless checks the form runs while the employer types. */
export class ValidationController {
  validateField = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: FieldValidationBody = req.body;
      res.json({ success: true, data: validateFieldInput(body) });
    } catch (error) {
      next(error);
    }
  };

  validateJob = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: JobInputBody = req.body;
      res.json({ success: true, data: validateJob(body) });
    } catch (error) {
      next(error);
    }
  };

  computeCost = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { amount, amountUnit, duration, durationUnit }: CostRequestBody = req.body;
      res.json({ success: true, data: computeCost(amount, amountUnit, duration, durationUnit) });
    } catch (error) {
      next(error);
    }
  };
}
