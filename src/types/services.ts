import type { SupabaseClient } from '@supabase/supabase-js';
import type { Settings } from '../config/settings';
import type { DraftStore, JobStore } from '../services/drafts/store.types';

/** Long-lived dependencies shared by every request. */
export interface AppServices {
  settings: Settings;
  jobStore: JobStore;
  draftStore: DraftStore;
  /** Present only when the Supabase driver is active. */
  supabase?: SupabaseClient;
}
