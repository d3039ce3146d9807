import { z } from 'zod';
import { locationSchema } from './store.schemas';

export const draftBodySchema = z.object({
  title: z.string().default(''),
  description: z.string().default(''),
  salaryAmount: z.number(),
  salaryUnit: z.string(),
  durationAmount: z.number(),
  durationUnit: z.string(),
  location: locationSchema,
});

export const jobInputSchema = z.object({
  title: z.string(),
  description: z.string(),
  salaryAmount: z.number(),
  salaryUnit: z.string(),
  durationAmount: z.number(),
  durationUnit: z.string(),
  location: locationSchema,
  status: z.string().optional(),
  employerId: z.string().optional(),
});

const amountWithUnit = z.object({ amount: z.number(), unit: z.string() });

export const fieldValidationSchema = z.discriminatedUnion('field', [
  z.object({ field: z.literal('title'), value: z.string() }),
  z.object({ field: z.literal('description'), value: z.string() }),
  z.object({ field: z.literal('salary'), value: amountWithUnit }),
  z.object({ field: z.literal('duration'), value: amountWithUnit }),
  z.object({ field: z.literal('location'), value: locationSchema }),
  z.object({ field: z.literal('status'), value: z.string() }),
  z.object({ field: z.literal('employerId'), value: z.string() }),
]);

export const costRequestSchema = z.object({
  amount: z.number().nonnegative(),
  amountUnit: z.string().min(1),
  duration: z.number().nonnegative(),
  durationUnit: z.string().min(1),
});

export type DraftBody = z.infer<typeof draftBodySchema>;
export type JobInputBody = z.infer<typeof jobInputSchema>;
export type FieldValidationBody = z.infer<typeof fieldValidationSchema>;
export type CostRequestBody = z.infer<typeof costRequestSchema>;
