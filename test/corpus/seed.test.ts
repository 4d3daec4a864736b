import { describe, it, expect } from 'vitest';
import { deterministicSeed } from '../../src/corpus/seed.js';

describe('corpus/seed', () => {
  describe('deterministicSeed', () => {
    it('should compute FNV-1a 64 over the seed text', () => {
      expect(deterministicSeed('a')).toBe(0xaf63dc4c8601ec8cn);
      expect(deterministicSeed('foobar')).toBe(0x85944171f73967e8n);
    });

    it('should trim the seed text', () => {
      expect(deterministicSeed('  foobar ')).toBe(deterministicSeed('foobar'));
    });

    it('should reject a blank seed', () => {
      expect(() => deterministicSeed('')).toThrow('seed must not be blank');
    });
  });
});
