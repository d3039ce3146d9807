import { JobPosting, JobPostingCandidate, JobPostingDraft } from '../../types/job';
import { Result } from '../../types/result';
import { StoreError } from '../../utils/errors';

/**
 * Canonical postings. Implementations must not throw; every failure comes
 * back as a StoreError.
 */
export interface JobStore {
  create(job: JobPostingCandidate): Promise<Result<JobPosting, StoreError>>;
  update(id: string, job: JobPostingCandidate): Promise<Result<JobPosting, StoreError>>;
  /** A missing posting is a StoreError with code NOT_FOUND. */
  getById(id: string): Promise<Result<JobPosting, StoreError>>;
}

export interface DraftStore {
  /** Resolves to `null` data when no draft has that id. */
  get(id: string): Promise<Result<JobPostingDraft | null, StoreError>>;
  /** Insert or overwrite by id (last write wins). */
  save(draft: JobPostingDraft): Promise<Result<void, StoreError>>;
  delete(id: string): Promise<Result<void, StoreError>>;
}
