import { Request, Response, NextFunction } from 'express';
import { DraftLifecycleCoordinator } from '../services/drafts/draft.coordinator';
import { DraftBody } from '../schemas/job.schemas';
import { AppServices } from '../types/services';
import { JobPostingDraft } from '../types/job';
import { logger } from '../utils/logger';

/** Aborts when the client goes away before the response is written. */
const abortOnDisconnect = (res: Response): AbortSignal => {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
};

export class DraftController {
  constructor(private readonly services: AppServices) {}

  private coordinatorFor(req: Request): DraftLifecycleCoordinator | null {
    const employerId = req.employer?.id;
    if (!employerId) return null;

    return new DraftLifecycleCoordinator({
      jobStore: this.services.jobStore,
      draftStore: this.services.draftStore,
      employerId,
    });
  }

  private unauthorized(res: Response) {
    return res.status(401).json({ success: false, error: 'Employer identity required' });
  }

  /**
   * Get a stored draft
   */
  getDraft = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const coordinator = this.coordinatorFor(req);
      if (!coordinator) return this.unauthorized(res);

      const result = await coordinator.getDraft(req.params.id, { signal: abortOnDisconnect(res) });
      if (!result.success) return next(result.error);

      res.json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Create or replace a draft. Drafts are scratch state and may be invalid.
   */
  saveDraft = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const coordinator = this.coordinatorFor(req);
      if (!coordinator) return this.unauthorized(res);

      const body: DraftBody = req.body;
      const draft: JobPostingDraft = { ...body, id: req.params.id, lastModified: new Date().toISOString() };

      const result = await coordinator.saveDraft(draft, { signal: abortOnDisconnect(res) });
      if (!result.success) return next(result.error);

      res.json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  };

  discardDraft = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const coordinator = this.coordinatorFor(req);
      if (!coordinator) return this.unauthorized(res);

      const result = await coordinator.discardDraft(req.params.id);
      if (!result.success) return next(result.error);

      res.json({ success: true, message: 'Draft discarded' });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Publish a draft as a new ACTIVE posting
   */
  publishDraft = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const coordinator = this.coordinatorFor(req);
      if (!coordinator) return this.unauthorized(res);

      const result = await coordinator.publishDraft(req.params.id, { signal: abortOnDisconnect(res) });
      if (!result.success) return next(result.error);

      logger.info('Draft published', { draftId: req.params.id, jobId: result.data.id });
      res.status(201).json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Open an edit draft for an existing posting
   */
  createDraftFromJob = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const coordinator = this.coordinatorFor(req);
      if (!coordinator) return this.unauthorized(res);

      const result = await coordinator.createDraftFromJob(req.params.id, { signal: abortOnDisconnect(res) });
      if (!result.success) return next(result.error);

      res.status(201).json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Apply an edit draft back onto its posting
   */
  updateJobFromDraft = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const coordinator = this.coordinatorFor(req);
      if (!coordinator) return this.unauthorized(res);

      const { id, draftId } = req.params;
      const result = await coordinator.updateJobFromDraft(id, draftId, { signal: abortOnDisconnect(res) });
      if (!result.success) return next(result.error);

      logger.info('Job updated from draft', { draftId, jobId: id });
      res.json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  };
}
