import { describe, it, expect } from 'vitest';
import { loadSettings } from './settings';

describe('loadSettings', () => {
  it('should fall back to defaults', () => {
    expect(loadSettings({})).toEqual({
      appPort: 3000,
      nodeEnv: 'development',
      storeDriver: 'memory',
      supabaseUrl: undefined,
      supabaseServiceKey: undefined,
      jobsTable: 'jobs',
      draftsTable: 'job_drafts',
      draftStoreMaxEntries: 500,
      corsOrigins: '*',
    });
  });

  it('should coerce numeric values and split CORS origins', () => {
    const settings = loadSettings({
      PORT: '8080',
      DRAFT_STORE_MAX_ENTRIES: '25',
      CORS_ORIGIN: 'http://a.test, http://b.test',
    });

    expect(settings.appPort).toBe(8080);
    expect(settings.draftStoreMaxEntries).toBe(25);
    expect(settings.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('should accept the Supabase driver when it is configured', () => {
    const settings = loadSettings({
      STORE_DRIVER: 'supabase',
      SUPABASE_URL: 'http://supabase.test',
      SUPABASE_SERVICE_KEY: 'test-secret',
      DRAFTS_TABLE: 'posting_drafts',
    });

    expect(settings.storeDriver).toBe('supabase');
    expect(settings.supabaseUrl).toBe('http://supabase.test');
    expect(settings.draftsTable).toBe('posting_drafts');
  });

  it('should require Supabase credentials for the Supabase driver', () => {
    expect(() => loadSettings({ STORE_DRIVER: 'supabase', SUPABASE_URL: '' })).toThrow(
      'Invalid configuration: STORE_DRIVER: SUPABASE_URL and SUPABASE_SERVICE_KEY are required when STORE_DRIVER=supabase'
    );
  });

  it('should reject malformed values', () => {
    expect(() => loadSettings({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadSettings({ STORE_DRIVER: 'redis' })).toThrow(/STORE_DRIVER/);
  });
});
