import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8787,
      newsApiKey: undefined,
      newsApiBase: 'https://newsapi.org/v2',
      country: 'India',
      maxArticles: 100,
      jobTtlSec: 3600,
    });
  });

  it('reads and normalises overrides', () => {
    const config = loadConfig({
      PORT: '3000',
      NEWS_API_KEY: ' test-key ',
      NEWS_API_BASE: 'http://localhost:9999/v2/',
      SCAN_COUNTRY: 'Singapore',
      SCAN_MAX_ARTICLES: '25',
      JOB_TTL_SEC: '120',
    });
    expect(config).toEqual({
      port: 3000,
      newsApiKey: 'test-key',
      newsApiBase: 'http://localhost:9999/v2',
      country: 'Singapore',
      maxArticles: 25,
      jobTtlSec: 120,
    });
  });

  it('treats a blank key as missing', () => {
    expect(loadConfig({ NEWS_API_KEY: '   ' }).newsApiKey).toBeUndefined();
  });

  it('rejects bad numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadConfig({ SCAN_MAX_ARTICLES: '-1' })).toThrow(/SCAN_MAX_ARTICLES/);
  });
});
