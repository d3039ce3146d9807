import { SupabaseClient } from '@supabase/supabase-js';
import { JobPosting, JobPostingCandidate, JobPostingDraft } from '../../types/job';
import { Result, fail, ok } from '../../types/result';
import { DraftRow, JobRow, draftRowSchema, jobRowSchema } from '../../schemas/store.schemas';
import { StoreError, describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { DraftStore, JobStore } from './store.types';

// PostgREST: "JSON object requested, multiple (or no) rows returned"
const NO_ROWS = 'PGRST116';

interface PostgrestFailure {
  message: string;
  code?: string;
}

const toStoreError = (
  operation: string,
  entity: string,
  error: PostgrestFailure
): StoreError =>
  new StoreError(
    `Failed to ${operation} ${entity}: ${error.message}`,
    operation,
    entity,
    error.code === NO_ROWS ? 'NOT_FOUND' : 'IO',
    error
  );

const fromJobRow = (row: JobRow): JobPosting => ({
  id: row.id,
  employerId: row.employer_id,
  title: row.title,
  description: row.description,
  salaryAmount: row.salary_amount,
  salaryUnit: row.salary_unit,
  durationAmount: row.duration_amount,
  durationUnit: row.duration_unit,
  location: row.location,
  status: row.status,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const toJobRow = (job: JobPostingCandidate): Omit<JobRow, 'id'> => ({
  employer_id: job.employerId,
  title: job.title,
  description: job.description,
  salary_amount: job.salaryAmount,
  salary_unit: job.salaryUnit,
  duration_amount: job.durationAmount,
  duration_unit: job.durationUnit,
  location: job.location,
  status: job.status,
  created_at: job.createdAt,
  updated_at: job.updatedAt,
});

const fromDraftRow = (row: DraftRow): JobPostingDraft => ({
  id: row.id,
  title: row.title,
  description: row.description,
  salaryAmount: row.salary_amount,
  salaryUnit: row.salary_unit,
  durationAmount: row.duration_amount,
  durationUnit: row.duration_unit,
  location: row.location,
  lastModified: row.last_modified,
  employerId: row.employer_id ?? undefined,
});

const toDraftRow = (draft: JobPostingDraft): DraftRow => ({
  id: draft.id,
  title: draft.title,
  description: draft.description,
  salary_amount: draft.salaryAmount,
  salary_unit: draft.salaryUnit,
  duration_amount: draft.durationAmount,
  duration_unit: draft.durationUnit,
  location: draft.location,
  last_modified: draft.lastModified,
  employer_id: draft.employerId ?? null,
});

/**
 * Postings in the `jobs` table.
 */
export class SupabaseJobStore implements JobStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly table = 'jobs'
  ) {}

  async create(job: JobPostingCandidate): Promise<Result<JobPosting, StoreError>> {
    logger.debug('Creating job', { title: job.title });
    try {
      const { data, error } = await this.supabase.from(this.table).insert(toJobRow(job)).select().single();
      if (error) return fail(toStoreError('create', this.table, error));
      return ok(fromJobRow(jobRowSchema.parse(data)));
    } catch (error) {
      return fail(new StoreError(`Failed to create ${this.table}: ${describeError(error)}`, 'create', this.table, 'IO', error));
    }
  }

  async update(id: string, job: JobPostingCandidate): Promise<Result<JobPosting, StoreError>> {
    // created_at belongs to the original insert
    const { created_at: _createdAt, ...changes } = toJobRow(job);
    try {
      const { data, error } = await this.supabase
        .from(this.table)
        .update(changes)
        .eq('id', id)
        .select()
        .single();
      if (error) return fail(toStoreError('update', this.table, error));
      return ok(fromJobRow(jobRowSchema.parse(data)));
    } catch (error) {
      return fail(new StoreError(`Failed to update ${this.table}: ${describeError(error)}`, 'update', this.table, 'IO', error));
    }
  }

  async getById(id: string): Promise<Result<JobPosting, StoreError>> {
    try {
      const { data, error } = await this.supabase.from(this.table).select('*').eq('id', id).maybeSingle();
      if (error) return fail(toStoreError('query', this.table, error));
      if (data === null) {
        return fail(new StoreError(`Job ${id} not found`, 'query', this.table, 'NOT_FOUND'));
      }
      return ok(fromJobRow(jobRowSchema.parse(data)));
    } catch (error) {
      return fail(new StoreError(`Failed to query ${this.table}: ${describeError(error)}`, 'query', this.table, 'IO', error));
    }
  }
}

/**
 * Drafts in the `job_drafts` table, upserted by id.
 */
export class SupabaseDraftStore implements DraftStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly table = 'job_drafts'
  ) {}

  async get(id: string): Promise<Result<JobPostingDraft | null, StoreError>> {
    try {
      const { data, error } = await this.supabase.from(this.table).select('*').eq('id', id).maybeSingle();
      if (error) return fail(toStoreError('query', this.table, error));
      return ok(data === null ? null : fromDraftRow(draftRowSchema.parse(data)));
    } catch (error) {
      return fail(new StoreError(`Failed to query ${this.table}: ${describeError(error)}`, 'query', this.table, 'IO', error));
    }
  }

  async save(draft: JobPostingDraft): Promise<Result<void, StoreError>> {
    try {
      const { error } = await this.supabase.from(this.table).upsert(toDraftRow(draft), { onConflict: 'id' });
      if (error) return fail(toStoreError('save', this.table, error));
      return ok(undefined);
    } catch (error) {
      return fail(new StoreError(`Failed to save ${this.table}: ${describeError(error)}`, 'save', this.table, 'IO', error));
    }
  }

  async delete(id: string): Promise<Result<void, StoreError>> {
    try {
      const { error } = await this.supabase.from(this.table).delete().eq('id', id);
      if (error) return fail(toStoreError('delete', this.table, error));
      return ok(undefined);
    } catch (error) {
      return fail(new StoreError(`Failed to delete ${this.table}: ${describeError(error)}`, 'delete', this.table, 'IO', error));
    }
  }
}
