import { z } from 'zod';
import { DURATION_UNITS, JOB_STATUSES, SALARY_UNITS } from '../types/job';

export const locationSchema = z.object({
  state: z.string(),
  district: z.string(),
  latitude: z.number().nullable().optional(),
  longitude: z.number().nullable().optional(),
});

export const jobRowSchema = z.object({
  id: z.coerce.string(),
  employer_id: z.string(),
  title: z.string(),
  description: z.string(),
  salary_amount: z.coerce.number(),
  salary_unit: z.enum(SALARY_UNITS),
  duration_amount: z.coerce.number(),
  duration_unit: z.enum(DURATION_UNITS),
  location: locationSchema,
  status: z.enum(JOB_STATUSES),
  created_at: z.string(),
  updated_at: z.string(),
});

export const draftRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  salary_amount: z.coerce.number(),
  salary_unit: z.string(),
  duration_amount: z.coerce.number(),
  duration_unit: z.string(),
  location: locationSchema,
  last_modified: z.string(),
  employer_id: z.string().nullish(),
});

export type JobRow = z.infer<typeof jobRowSchema>;
export type DraftRow = z.infer<typeof draftRowSchema>;
