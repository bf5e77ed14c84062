/**
 * Environment Variable Handler Tests
 *
 * Tests for src/config/env.ts
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  loadEnv,
  getEnv,
  hasApiKey,
  _clearEnvCache,
  DEFAULT_OPENROUTER_BASE_URL,
} from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    // Empty strings count as unset, which neutralizes a developer's .env
    vi.stubEnv('OPENROUTER_API_KEY', '');
    vi.stubEnv('OPENROUTER_BASE_URL', '');
    vi.stubEnv('EMBEDDING_API_KEY', '');
    vi.stubEnv('EMBEDDING_BASE_URL', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads OPENROUTER_API_KEY when set', () => {
      vi.stubEnv('OPENROUTER_API_KEY', 'test-openrouter-key');

      expect(loadEnv().OPENROUTER_API_KEY).toBe('test-openrouter-key');
    });

    it('returns undefined for missing optional keys', () => {
      const env = loadEnv();

      expect(env.OPENROUTER_API_KEY).toBeUndefined();
      expect(env.EMBEDDING_API_KEY).toBeUndefined();
      expect(env.EMBEDDING_BASE_URL).toBeUndefined();
    });

    it('provides the default OpenRouter base URL when not set', () => {
      expect(loadEnv().OPENROUTER_BASE_URL).toBe('https://openrouter.ai/api/v1');
    });

    it('uses a custom embedding base URL when set', () => {
      vi.stubEnv('EMBEDDING_BASE_URL', 'http://localhost:11434/v1');

      expect(loadEnv().EMBEDDING_BASE_URL).toBe('http://localhost:11434/v1');
    });

    it('falls back to defaults when a URL is malformed', () => {
      vi.stubEnv('OPENROUTER_API_KEY', 'test-openrouter-key');
      vi.stubEnv('OPENROUTER_BASE_URL', 'not a url');

      const env = loadEnv();

      expect(env.OPENROUTER_BASE_URL).toBe(DEFAULT_OPENROUTER_BASE_URL);
      expect(env.OPENROUTER_API_KEY).toBe('test-openrouter-key');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('OPENROUTER_API_KEY', 'initial-value');
      loadEnv();

      vi.stubEnv('OPENROUTER_API_KEY', 'changed-value');

      expect(loadEnv().OPENROUTER_API_KEY).toBe('initial-value');
    });

    it('returns fresh values after cache is cleared', () => {
      vi.stubEnv('OPENROUTER_API_KEY', 'initial-value');
      loadEnv();

      _clearEnvCache();
      vi.stubEnv('OPENROUTER_API_KEY', 'new-value');

      expect(loadEnv().OPENROUTER_API_KEY).toBe('new-value');
    });
  });

  describe('getEnv()', () => {
    it('returns a single variable', () => {
      vi.stubEnv('EMBEDDING_API_KEY', 'test-embedding-key');

      expect(getEnv('EMBEDDING_API_KEY')).toBe('test-embedding-key');
    });
  });

  describe('hasApiKey()', () => {
    it('reports presence without exposing the key', () => {
      vi.stubEnv('OPENROUTER_API_KEY', 'test-openrouter-key');

      expect(hasApiKey('openrouter')).toBe(true);
      expect(hasApiKey('embedding')).toBe(false);
    });

    it('treats whitespace-only keys as missing', () => {
      vi.stubEnv('OPENROUTER_API_KEY', '   ');

      expect(hasApiKey('openrouter')).toBe(false);
    });
  });
});
