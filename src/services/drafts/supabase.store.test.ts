import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SupabaseDraftStore, SupabaseJobStore } from './supabase.store';
import { createSupabaseClient } from '../../config/supabase.config';
import { Responder, createFakeFetch, emptyResponse, jsonResponse } from '../../__tests__/fakeFetch';
import { sampleDraft, samplePosting } from '../../__tests__/fixtures';
import { logger } from '../../utils/logger';

const SUPABASE_URL = 'http://supabase.test';

const jobRow = {
  id: 'job-7',
  employer_id: 'employer-1',
  title: 'Delivery Rider',
  description: 'Same-day parcel delivery within the city limits.',
  salary_amount: 900,
  salary_unit: 'daily',
  duration_amount: 2,
  duration_unit: 'weeks',
  location: { state: 'Karnataka', district: 'Mysuru', latitude: null, longitude: null },
  status: 'ACTIVE',
  created_at: '2026-01-15T08:00:00.000Z',
  updated_at: '2026-01-15T08:00:00.000Z',
};

const draftRow = {
  id: 'draft-1',
  title: 'Warehouse Associate',
  description: 'Loading and unloading trucks at the central depot.',
  salary_amount: 18.5,
  salary_unit: 'hourly',
  duration_amount: 30,
  duration_unit: 'days',
  location: { state: 'Maharashtra', district: 'Pune', latitude: 18.52, longitude: 73.85 },
  last_modified: '2026-02-28T17:30:00.000Z',
  employer_id: 'employer-1',
};

const setup = (responder: Responder) => {
  const { fakeFetch, requests } = createFakeFetch(responder);
  const supabase = createSupabaseClient(
    { supabaseUrl: SUPABASE_URL, supabaseServiceKey: 'test-secret' },
    fakeFetch
  );
  return {
    requests,
    jobs: new SupabaseJobStore(supabase),
    drafts: new SupabaseDraftStore(supabase),
  };
};

describe('Supabase stores', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'debug').mockImplementation(() => {});
  });

  // ==========================================================================
  // Jobs
  // ==========================================================================

  describe('SupabaseJobStore', () => {
    it('should insert a snake_case row and map the returned row back', async () => {
      const { jobs, requests } = setup(() => jsonResponse(jobRow, 201));
      const { id: _id, ...candidate } = samplePosting();

      const created = await jobs.create(candidate);

      expect(created).toEqual({ success: true, data: samplePosting() });
      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe('POST');
      expect(requests[0].url.pathname).toBe('/rest/v1/jobs');
      expect(requests[0].body).toEqual({
        employer_id: 'employer-1',
        title: 'Delivery Rider',
        description: 'Same-day parcel delivery within the city limits.',
        salary_amount: 900,
        salary_unit: 'daily',
        duration_amount: 2,
        duration_unit: 'weeks',
        location: { state: 'Karnataka', district: 'Mysuru', latitude: null, longitude: null },
        status: 'ACTIVE',
        created_at: '2026-01-15T08:00:00.000Z',
        updated_at: '2026-01-15T08:00:00.000Z',
      });
    });

    it('should turn a PostgREST error into an IO store error', async () => {
      const { jobs } = setup(() => jsonResponse({ message: 'permission denied for table jobs', code: '42501' }, 403));
      const { id: _id, ...candidate } = samplePosting();

      const created = await jobs.create(candidate);

      expect(created.success).toBe(false);
      if (created.success) return;
      expect(created.error.message).toBe('Failed to create jobs: permission denied for table jobs');
      expect(created.error.code).toBe('IO');
      expect(created.error.operation).toBe('create');
    });

    it('should patch by id without sending created_at', async () => {
      const { jobs, requests } = setup(() => jsonResponse({ ...jobRow, title: 'Senior Delivery Rider' }));
      const { id: _id, ...candidate } = samplePosting({ title: 'Senior Delivery Rider' });

      const updated = await jobs.update('job-7', candidate);

      expect(updated.success && updated.data.title).toBe('Senior Delivery Rider');
      expect(requests[0].method).toBe('PATCH');
      expect(requests[0].url.searchParams.get('id')).toBe('eq.job-7');
      expect(requests[0].body).not.toHaveProperty('created_at');
    });

    it('should map a zero-row update to NOT_FOUND', async () => {
      const { jobs } = setup(() =>
        jsonResponse(
          {
            code: 'PGRST116',
            message: 'JSON object requested, multiple (or no) rows returned',
            details: 'The result contains 0 rows',
          },
          406
        )
      );
      const { id: _id, ...candidate } = samplePosting();

      const updated = await jobs.update('gone', candidate);

      expect(updated.success).toBe(false);
      if (!updated.success) expect(updated.error.code).toBe('NOT_FOUND');
    });

    it('should read a posting by id', async () => {
      const { jobs, requests } = setup(() => jsonResponse([jobRow]));

      const fetched = await jobs.getById('job-7');

      expect(fetched).toEqual({ success: true, data: samplePosting() });
      expect(requests[0].method).toBe('GET');
      expect(requests[0].url.searchParams.get('id')).toBe('eq.job-7');
    });

    it('should report NOT_FOUND when no row matches', async () => {
      const { jobs } = setup(() => jsonResponse([]));

      const fetched = await jobs.getById('nope');

      expect(fetched.success).toBe(false);
      if (fetched.success) return;
      expect(fetched.error.code).toBe('NOT_FOUND');
      expect(fetched.error.message).toBe('Job nope not found');
    });

    it('should reject rows that do not match the schema', async () => {
      const { jobs } = setup(() => jsonResponse([{ ...jobRow, salary_unit: 'yearly' }]));

      const fetched = await jobs.getById('job-7');

      expect(fetched.success).toBe(false);
      if (!fetched.success) expect(fetched.error.code).toBe('IO');
    });
  });

  // ==========================================================================
  // Drafts
  // ==========================================================================

  describe('SupabaseDraftStore', () => {
    it('should map a stored row to a draft', async () => {
      const { drafts } = setup(() => jsonResponse([draftRow]));

      expect(await drafts.get('draft-1')).toEqual({ success: true, data: sampleDraft() });
    });

    it('should return null for a missing draft', async () => {
      const { drafts } = setup(() => jsonResponse([]));

      expect(await drafts.get('nope')).toEqual({ success: true, data: null });
    });

    it('should upsert on the id column', async () => {
      const { drafts, requests } = setup(() => emptyResponse(201));

      const saved = await drafts.save(sampleDraft());

      expect(saved).toEqual({ success: true, data: undefined });
      expect(requests[0].method).toBe('POST');
      expect(requests[0].url.pathname).toBe('/rest/v1/job_drafts');
      expect(requests[0].url.searchParams.get('on_conflict')).toBe('id');
      expect(requests[0].headers.get('Prefer')).toContain('resolution=merge-duplicates');
      expect(requests[0].body).toEqual(draftRow);
    });

    it('should delete by id', async () => {
      const { drafts, requests } = setup(() => emptyResponse(204));

      expect(await drafts.delete('draft-1')).toEqual({ success: true, data: undefined });
      expect(requests[0].method).toBe('DELETE');
      expect(requests[0].url.searchParams.get('id')).toBe('eq.draft-1');
    });

    it('should return an IO error instead of throwing when the network fails', async () => {
      const { drafts } = setup(() => {
        throw new TypeError('fetch failed');
      });

      const fetched = await drafts.get('draft-1');

      expect(fetched.success).toBe(false);
      if (!fetched.success) expect(fetched.error.code).toBe('IO');
    });
  });
});
