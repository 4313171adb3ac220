/**
 * Voxqueue - Storage Package Tests
 *
 * Package constants and the pure helpers shared by every store implementation.
 */

import { describe, it, expect } from 'vitest';
import {
  STORAGE_VERSION,
  AUDIO_CACHE_CONTROL,
  DEFAULT_MIN_AUDIO_BYTES,
  artifactEtag,
  isValidJobId
} from './index';

describe('Storage Package', () => {
  describe('Constants', () => {
    it('should export correct storage version', () => {
      expect(STORAGE_VERSION).toBe('1.0.0');
    });

    it('should cache audio for a day', () => {
      expect(AUDIO_CACHE_CONTROL).toBe('public, max-age=86400');
    });

    it('should treat artifacts under 100 bytes as incomplete by default', () => {
      expect(DEFAULT_MIN_AUDIO_BYTES).toBe(100);
    });
  });

  describe('artifactEtag', () => {
    it('is stable for the same job id', () => {
      expect(artifactEtag('job-1')).toBe(artifactEtag('job-1'));
    });

    it('differs between job ids', () => {
      expect(artifactEtag('job-1')).not.toBe(artifactEtag('job-2'));
    });

    it('is a quoted 32 character hex tag', () => {
      expect(artifactEtag('job-1')).toMatch(/^"[0-9a-f]{32}"$/);
    });
  });

  describe('isValidJobId', () => {
    it('accepts uuids and simple identifiers', () => {
      expect(isValidJobId('550e8400-e29b-41d4-a716-446655440000')).toBe(true);
      expect(isValidJobId('job_1')).toBe(true);
    });

    it('rejects path-like and empty ids', () => {
      expect(isValidJobId('')).toBe(false);
      expect(isValidJobId('../secret')).toBe(false);
      expect(isValidJobId('a/b')).toBe(false);
      expect(isValidJobId('x'.repeat(129))).toBe(false);
    });
  });
});
