import { config } from 'dotenv';
import { z } from 'zod';

config();

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const settingsSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    STORE_DRIVER: z.enum(['memory', 'supabase']).default('memory'),
    SUPABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
    JOBS_TABLE: z.string().min(1).default('jobs'),
    DRAFTS_TABLE: z.string().min(1).default('job_drafts'),
    DRAFT_STORE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
    CORS_ORIGIN: z.preprocess(emptyToUndefined, z.string().optional()),
  })
  .refine((env) => env.STORE_DRIVER !== 'supabase' || (env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY), {
    message: 'SUPABASE_URL and SUPABASE_SERVICE_KEY are required when STORE_DRIVER=supabase',
    path: ['STORE_DRIVER'],
  });

export interface Settings {
  appPort: number;
  nodeEnv: 'development' | 'production' | 'test';
  storeDriver: 'memory' | 'supabase';
  supabaseUrl?: string;
  supabaseServiceKey?: string;
  jobsTable: string;
  draftsTable: string;
  draftStoreMaxEntries: number;
  corsOrigins: string[] | '*';
}

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    appPort: values.PORT,
    nodeEnv: values.NODE_ENV,
    storeDriver: values.STORE_DRIVER,
    supabaseUrl: values.SUPABASE_URL,
    supabaseServiceKey: values.SUPABASE_SERVICE_KEY,
    jobsTable: values.JOBS_TABLE,
    draftsTable: values.DRAFTS_TABLE,
    draftStoreMaxEntries: values.DRAFT_STORE_MAX_ENTRIES,
    corsOrigins: values.CORS_ORIGIN
      ? values.CORS_ORIGIN.split(',').map((origin) => origin.trim()).filter(Boolean)
      : '*',
  };
};
