import {
  JobInput,
  JobPosting,
  JobPostingCandidate,
  JobPostingDraft,
  parseDurationUnit,
  parseJobStatus,
  parseSalaryUnit,
} from '../../types/job';
import { Result, fail, ok } from '../../types/result';
import { ValidationOutcome } from '../../types/validation';
import {
  CancelledError,
  CoreFailure,
  NotFoundError,
  StoreError,
  StoreFailureError,
  UnexpectedError,
  ValidationFailedError,
  describeError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { validateJob } from '../validation/job.validators';
import { DraftStore, JobStore } from './store.types';

const TAG = 'DraftLifecycleCoordinator';

export interface DraftCoordinatorOptions {
  jobStore: JobStore;
  draftStore: DraftStore;
  /** Employer the published postings belong to; resolved by the host. */
  employerId: string;
  now?: () => Date;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export type CoreResult<T> = Result<T, CoreFailure>;

export const draftIdForJob = (jobId: string) => `${jobId}_draft`;

type PrimaryWrite = (candidate: JobPostingCandidate) => Promise<Result<JobPosting, StoreError>>;

/**
 * Moves drafts to canonical postings and back.
 *
 * Publishing is a two-step saga, not a transaction: the posting is written
 * first, then the draft is deleted. Once the posting exists, a failed delete
 * is only logged; the caller still gets the posting.
 *
 * An aborted signal stops an operation before its primary write. After the
 * write has started the saga always runs to the end.
 *
 * Drafts and postings owned by another employer read as not found.
 */
export class DraftLifecycleCoordinator {
  private readonly jobStore: JobStore;
  private readonly draftStore: DraftStore;
  private readonly employerId: string;
  private readonly now: () => Date;

  constructor(options: DraftCoordinatorOptions) {
    this.jobStore = options.jobStore;
    this.draftStore = options.draftStore;
    this.employerId = options.employerId;
    this.now = options.now ?? (() => new Date());
  }

  async publishDraft(draftId: string, options: OperationOptions = {}): Promise<CoreResult<JobPosting>> {
    return this.runSaga('publish', draftId, options, (candidate) => this.jobStore.create(candidate));
  }

  async updateJobFromDraft(
    jobId: string,
    draftId: string,
    options: OperationOptions = {}
  ): Promise<CoreResult<JobPosting>> {
    return this.runSaga('update', draftId, options, (candidate) => this.jobStore.update(jobId, candidate), jobId);
  }

  async createDraftFromJob(jobId: string, options: OperationOptions = {}): Promise<CoreResult<JobPostingDraft>> {
    try {
      if (options.signal?.aborted) return fail(new CancelledError('createDraftFromJob'));

      const fetched = await this.fetchOwnedJob(jobId);
      if (!fetched.success) return fetched;

      const draft = this.toDraft(fetched.data);
      if (options.signal?.aborted) return fail(new CancelledError('createDraftFromJob'));

      const saved = await this.draftStore.save(draft);
      if (!saved.success) {
        logger.error(`[${TAG}] Failed to save draft`, saved.error, { jobId, draftId: draft.id });
        return fail(new StoreFailureError(saved.error));
      }

      logger.debug(`[${TAG}] Draft created from job`, { jobId, draftId: draft.id });
      return ok(draft);
    } catch (error) {
      logger.error(`[${TAG}] Unexpected error creating draft`, error, { jobId });
      return fail(new UnexpectedError(`Unexpected error creating draft from job: ${describeError(error)}`, error));
    }
  }

  async getDraft(draftId: string, options: OperationOptions = {}): Promise<CoreResult<JobPostingDraft>> {
    try {
      if (options.signal?.aborted) return fail(new CancelledError('getDraft'));
      return await this.fetchDraft(draftId);
    } catch (error) {
      return fail(new UnexpectedError(`Unexpected error loading draft: ${describeError(error)}`, error));
    }
  }

  /**
   * Persist the scratch draft, stamping `lastModified`. Drafts may be
   * invalid; nothing is validated here.
   */
  async saveDraft(draft: JobPostingDraft, options: OperationOptions = {}): Promise<CoreResult<JobPostingDraft>> {
    try {
      if (options.signal?.aborted) return fail(new CancelledError('saveDraft'));

      const claimed = await this.assertDraftOwner(draft.id);
      if (!claimed.success) return claimed;

      const stamped: JobPostingDraft = {
        ...draft,
        lastModified: this.now().toISOString(),
        employerId: this.employerId,
      };
      const saved = await this.draftStore.save(stamped);
      if (!saved.success) return fail(new StoreFailureError(saved.error));

      logger.debug(`[${TAG}] Draft saved`, { draftId: draft.id });
      return ok(stamped);
    } catch (error) {
      return fail(new UnexpectedError(`Unexpected error saving draft: ${describeError(error)}`, error));
    }
  }

  async discardDraft(draftId: string): Promise<CoreResult<void>> {
    try {
      const claimed = await this.assertDraftOwner(draftId);
      if (!claimed.success) return claimed;

      const deleted = await this.draftStore.delete(draftId);
      if (!deleted.success) return fail(new StoreFailureError(deleted.error));

      logger.debug(`[${TAG}] Draft discarded`, { draftId });
      return ok(undefined);
    } catch (error) {
      return fail(new UnexpectedError(`Unexpected error discarding draft: ${describeError(error)}`, error));
    }
  }

  /** Whole-form validation of the posting this draft would publish as. */
  validateDraft(draft: JobPostingDraft): ValidationOutcome {
    return validateJob(this.toCandidateInput(draft));
  }

  private async runSaga(
    operation: 'publish' | 'update',
    draftId: string,
    options: OperationOptions,
    write: PrimaryWrite,
    jobId?: string
  ): Promise<CoreResult<JobPosting>> {
    try {
      if (options.signal?.aborted) return fail(new CancelledError(operation));

      const loaded = await this.fetchDraft(draftId);
      if (!loaded.success) return loaded;

      const candidate = this.toCandidate(loaded.data);
      if (!candidate.success) return candidate;

      if (jobId !== undefined) {
        const target = await this.fetchOwnedJob(jobId);
        if (!target.success) return target;
      }

      if (options.signal?.aborted) return fail(new CancelledError(operation));

      const written = await write(candidate.data);
      if (!written.success) {
        logger.error(`[${TAG}] Failed to ${operation} job from draft`, written.error, {
          draftId,
          jobId,
          errorMessage: written.error.message,
        });
        return fail(new StoreFailureError(written.error));
      }

      const job = written.data;
      await this.cleanupDraft(draftId, job.id, operation);

      logger.debug(`[${TAG}] Draft ${operation === 'publish' ? 'published' : 'applied to job'}`, {
        draftId,
        jobId: job.id,
      });
      return ok(job);
    } catch (error) {
      logger.error(`[${TAG}] Unexpected error in ${operation} operation`, error, { draftId, jobId });
      return fail(new UnexpectedError(`Unexpected error during ${operation}: ${describeError(error)}`, error));
    }
  }

  /** Best-effort: the posting already exists, so failures are only logged. */
  private async cleanupDraft(draftId: string, jobId: string, operation: string): Promise<void> {
    try {
      const deleted = await this.draftStore.delete(draftId);
      if (!deleted.success) {
        logger.warn(`[${TAG}] Failed to delete draft after successful ${operation}`, {
          draftId,
          jobId,
          error: deleted.error.message,
        });
      }
    } catch (error) {
      logger.warn(`[${TAG}] Exception while deleting draft after successful ${operation}`, {
        draftId,
        jobId,
        error: describeError(error),
      });
    }
  }

  private async fetchDraft(draftId: string): Promise<CoreResult<JobPostingDraft>> {
    const fetched = await this.draftStore.get(draftId);
    if (!fetched.success) return fail(new StoreFailureError(fetched.error));
    if (fetched.data === null || fetched.data.employerId !== this.employerId) {
      return fail(new NotFoundError('Draft', draftId));
    }
    return ok(fetched.data);
  }

  /** A missing draft may be claimed; one held by another employer may not. */
  private async assertDraftOwner(draftId: string): Promise<CoreResult<void>> {
    const fetched = await this.draftStore.get(draftId);
    if (!fetched.success) return fail(new StoreFailureError(fetched.error));
    if (fetched.data !== null && fetched.data.employerId !== this.employerId) {
      logger.warn(`[${TAG}] Draft belongs to another employer`, { draftId });
      return fail(new NotFoundError('Draft', draftId));
    }
    return ok(undefined);
  }

  private async fetchOwnedJob(jobId: string): Promise<CoreResult<JobPosting>> {
    const fetched = await this.jobStore.getById(jobId);
    if (!fetched.success) {
      return fail(
        fetched.error.code === 'NOT_FOUND' ? new NotFoundError('Job', jobId) : new StoreFailureError(fetched.error)
      );
    }
    if (fetched.data.employerId !== this.employerId) {
      logger.warn(`[${TAG}] Job belongs to another employer`, { jobId });
      return fail(new NotFoundError('Job', jobId));
    }
    return ok(fetched.data);
  }

  private toCandidateInput(draft: JobPostingDraft): JobInput {
    return {
      title: draft.title.trim(),
      description: draft.description.trim(),
      salaryAmount: draft.salaryAmount,
      salaryUnit: draft.salaryUnit,
      durationAmount: draft.durationAmount,
      durationUnit: draft.durationUnit,
      location: draft.location,
      status: 'ACTIVE',
      employerId: this.employerId,
    };
  }

  private toCandidate(draft: JobPostingDraft): CoreResult<JobPostingCandidate> {
    const input = this.toCandidateInput(draft);
    const outcome = validateJob(input);
    if (!outcome.valid) return fail(new ValidationFailedError(outcome.errors));

    const salaryUnit = parseSalaryUnit(input.salaryUnit);
    const durationUnit = parseDurationUnit(input.durationUnit);
    const status = parseJobStatus(input.status ?? '');
    if (!salaryUnit || !durationUnit || !status) {
      return fail(new UnexpectedError('Validated draft has an unknown unit or status'));
    }

    const timestamp = this.now().toISOString();
    return ok({
      employerId: this.employerId,
      title: input.title,
      description: input.description,
      salaryAmount: input.salaryAmount,
      salaryUnit,
      durationAmount: input.durationAmount,
      durationUnit,
      location: { ...input.location },
      status,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
  }

  private toDraft(job: JobPosting): JobPostingDraft {
    return {
      id: draftIdForJob(job.id),
      title: job.title,
      description: job.description,
      salaryAmount: job.salaryAmount,
      salaryUnit: job.salaryUnit,
      durationAmount: job.durationAmount,
      durationUnit: job.durationUnit,
      location: { ...job.location },
      lastModified: this.now().toISOString(),
      employerId: this.employerId,
    };
  }
}
