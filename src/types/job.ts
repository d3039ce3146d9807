export const SALARY_UNITS = ['hourly', 'daily', 'weekly', 'monthly'] as const;
export const DURATION_UNITS = ['hours', 'days', 'weeks', 'months'] as const;
export const JOB_STATUSES = ['OPEN', 'ACTIVE', 'PENDING', 'CLOSED', 'DELETED'] as const;

export type SalaryUnit = (typeof SALARY_UNITS)[number];
export type DurationUnit = (typeof DURATION_UNITS)[number];
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface Location {
  state: string;
  district: string;
  latitude?: number | null;
  longitude?: number | null;
}

/**
 * Scratch copy of a posting while it is being edited. Units stay plain
 * strings here: a draft is allowed to be invalid.
 */
export interface JobPostingDraft {
  id: string;
  title: string;
  description: string;
  salaryAmount: number;
  salaryUnit: string;
  durationAmount: number;
  durationUnit: string;
  location: Location;
  lastModified: string;
  /** Stamped by the coordinator on every save. */
  employerId?: string;
}

export interface JobPosting {
  id: string;
  employerId: string;
  title: string;
  description: string;
  salaryAmount: number;
  salaryUnit: SalaryUnit;
  durationAmount: number;
  durationUnit: DurationUnit;
  location: Location;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
}

/** A posting before the store has assigned it an id. */
export type JobPostingCandidate = Omit<JobPosting, 'id'>;

/**
 * Anything whole-job validation can run over: a draft, a candidate or a
 * stored posting. `status` and `employerId` are only checked when present.
 */
export interface JobInput {
  title: string;
  description: string;
  salaryAmount: number;
  salaryUnit: string;
  durationAmount: number;
  durationUnit: string;
  location: Location;
  status?: string;
  employerId?: string;
}

export const isSalaryUnit = (value: string): value is SalaryUnit =>
  SALARY_UNITS.some((unit) => unit === value);

export const isDurationUnit = (value: string): value is DurationUnit =>
  DURATION_UNITS.some((unit) => unit === value);

export const isJobStatus = (value: string): value is JobStatus =>
  JOB_STATUSES.some((status) => status === value);

export const parseSalaryUnit = (value: string): SalaryUnit | null => {
  const unit = value.trim().toLowerCase();
  return isSalaryUnit(unit) ? unit : null;
};

export const parseDurationUnit = (value: string): DurationUnit | null => {
  const unit = value.trim().toLowerCase();
  return isDurationUnit(unit) ? unit : null;
};

export const parseJobStatus = (value: string): JobStatus | null => {
  const status = value.trim().toUpperCase();
  return isJobStatus(status) ? status : null;
};
