/**
 * Shared test data for the draft workflow suites.
 */

import { JobInput, JobPosting, JobPostingDraft } from '../types/job';
import { Settings } from '../config/settings';

export const FIXED_NOW = '2026-03-01T09:00:00.000Z';

export const fixedClock = () => new Date(FIXED_NOW);

export const validJobInput = (overrides: Partial<JobInput> = {}): JobInput => ({
  title: 'Warehouse Associate',
  description: 'Loading and unloading trucks at the central depot.',
  salaryAmount: 18.5,
  salaryUnit: 'hourly',
  durationAmount: 30,
  durationUnit: 'days',
  location: { state: 'Maharashtra', district: 'Pune', latitude: 18.52, longitude: 73.85 },
  status: 'ACTIVE',
  employerId: 'employer-1',
  ...overrides,
});

export const sampleDraft = (overrides: Partial<JobPostingDraft> = {}): JobPostingDraft => ({
  id: 'draft-1',
  title: 'Warehouse Associate',
  description: 'Loading and unloading trucks at the central depot.',
  salaryAmount: 18.5,
  salaryUnit: 'hourly',
  durationAmount: 30,
  durationUnit: 'days',
  location: { state: 'Maharashtra', district: 'Pune', latitude: 18.52, longitude: 73.85 },
  lastModified: '2026-02-28T17:30:00.000Z',
  employerId: 'employer-1',
  ...overrides,
});

export const samplePosting = (overrides: Partial<JobPosting> = {}): JobPosting => ({
  id: 'job-7',
  employerId: 'employer-1',
  title: 'Delivery Rider',
  description: 'Same-day parcel delivery within the city limits.',
  salaryAmount: 900,
  salaryUnit: 'daily',
  durationAmount: 2,
  durationUnit: 'weeks',
  location: { state: 'Karnataka', district: 'Mysuru', latitude: null, longitude: null },
  status: 'ACTIVE',
  createdAt: '2026-01-15T08:00:00.000Z',
  updatedAt: '2026-01-15T08:00:00.000Z',
  ...overrides,
});

export const testSettings = (overrides: Partial<Settings> = {}): Settings => ({
  appPort: 0,
  nodeEnv: 'test',
  storeDriver: 'memory',
  jobsTable: 'jobs',
  draftsTable: 'job_drafts',
  draftStoreMaxEntries: 50,
  corsOrigins: '*',
  ...overrides,
});
