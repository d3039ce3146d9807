import { randomUUID } from 'crypto';
import { JobPosting, JobPostingCandidate, JobPostingDraft } from '../../types/job';
import { Result, fail, ok } from '../../types/result';
import { StoreError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { DraftStore, JobStore } from './store.types';

const copyLocation = <T extends { location: JobPosting['location'] }>(value: T): T => ({
  ...value,
  location: { ...value.location },
});

export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, JobPosting>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  async create(job: JobPostingCandidate): Promise<Result<JobPosting, StoreError>> {
    const created: JobPosting = copyLocation({ ...job, id: this.generateId() });
    this.jobs.set(created.id, created);
    return ok(copyLocation(created));
  }

  async update(id: string, job: JobPostingCandidate): Promise<Result<JobPosting, StoreError>> {
    const existing = this.jobs.get(id);
    if (!existing) {
      return fail(new StoreError(`Job ${id} not found`, 'update', 'jobs', 'NOT_FOUND'));
    }

    const updated: JobPosting = copyLocation({ ...job, id, createdAt: existing.createdAt });
    this.jobs.set(id, updated);
    return ok(copyLocation(updated));
  }

  async getById(id: string): Promise<Result<JobPosting, StoreError>> {
    const job = this.jobs.get(id);
    if (!job) {
      return fail(new StoreError(`Job ${id} not found`, 'query', 'jobs', 'NOT_FOUND'));
    }
    return ok(copyLocation(job));
  }

  /** Seed a posting directly, bypassing id generation. */
  put(job: JobPosting): void {
    this.jobs.set(job.id, copyLocation(job));
  }

  get size(): number {
    return this.jobs.size;
  }
}

/**
 * Draft store bounded to `maxEntries`; when full, the least recently saved
 * draft is evicted.
 */
export class InMemoryDraftStore implements DraftStore {
  private drafts = new Map<string, JobPostingDraft>();

  constructor(private readonly maxEntries = 500) {}

  async get(id: string): Promise<Result<JobPostingDraft | null, StoreError>> {
    const draft = this.drafts.get(id);
    return ok(draft ? copyLocation(draft) : null);
  }

  async save(draft: JobPostingDraft): Promise<Result<void, StoreError>> {
    // re-insert so the Map's iteration order tracks recency
    this.drafts.delete(draft.id);
    this.drafts.set(draft.id, copyLocation(draft));

    while (this.drafts.size > this.maxEntries) {
      const oldest = this.drafts.keys().next();
      if (oldest.done) break;
      this.drafts.delete(oldest.value);
      logger.debug('Evicted draft from memory store', { draftId: oldest.value });
    }

    return ok(undefined);
  }

  async delete(id: string): Promise<Result<void, StoreError>> {
    this.drafts.delete(id);
    return ok(undefined);
  }

  get size(): number {
    return this.drafts.size;
  }
}
