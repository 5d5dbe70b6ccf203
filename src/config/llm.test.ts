/**
 * LLM Provider Credential Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getLlmApiKey,
  isLlmApiKeyConfigured,
  LlmApiKeyMissingError,
} from './llm.js';

describe('LLM provider credentials', () => {
  const originalApiKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    process.env.OPENAI_API_KEY = 'test-openai-key';
  });

  afterEach(() => {
    if (originalApiKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = originalApiKey;
    }
  });

  describe('getLlmApiKey()', () => {
    it('should read the key from process.env by default', () => {
      expect(getLlmApiKey('openai')).toBe('test-openai-key');
    });

    it('should read the provider-specific variable', () => {
      expect(getLlmApiKey('gemini', { GEMINI_API_KEY: 'test-gemini-key' })).toBe(
        'test-gemini-key'
      );
    });

    it('should trim surrounding whitespace', () => {
      expect(getLlmApiKey('openai', { OPENAI_API_KEY: '  test-secret\n' })).toBe('test-secret');
    });

    it('should throw LlmApiKeyMissingError when the key is missing', () => {
      expect(() => getLlmApiKey('gemini', {})).toThrow(LlmApiKeyMissingError);
      expect(() => getLlmApiKey('gemini', {})).toThrow(
        'GEMINI_API_KEY environment variable is not set. Set it before creating gemini operations.'
      );
    });

    it('should treat a blank key as missing', () => {
      try {
        getLlmApiKey('openai', { OPENAI_API_KEY: '   ' });
        expect.unreachable('getLlmApiKey should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(LlmApiKeyMissingError);
        if (error instanceof LlmApiKeyMissingError) {
          expect(error.provider).toBe('openai');
          expect(error.envVar).toBe('OPENAI_API_KEY');
        }
      }
    });
  });

  describe('isLlmApiKeyConfigured()', () => {
    it('should report configured keys', () => {
      expect(isLlmApiKeyConfigured('openai')).toBe(true);
      expect(isLlmApiKeyConfigured('gemini', {})).toBe(false);
      expect(isLlmApiKeyConfigured('gemini', { GEMINI_API_KEY: '' })).toBe(false);
    });
  });
});
