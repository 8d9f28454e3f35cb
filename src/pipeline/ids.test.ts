/**
 * Tests for Execution ID Generation
 */

import { describe, it, expect } from '@jest/globals';
import {
  generateEntitySlug,
  formatTimestamp,
  handleCollision,
  generateExecutionId,
} from './ids.js';

describe('generateEntitySlug', () => {
  it('should lowercase and hyphenate', () => {
    expect(generateEntitySlug('Acme Robotics')).toBe('acme-robotics');
  });

  it('should drop legal-form suffixes', () => {
    expect(generateEntitySlug('Acme Robotics, Inc.')).toBe('acme-robotics');
    expect(generateEntitySlug('The Widget Co')).toBe('widget');
  });

  it('should strip accents', () => {
    expect(generateEntitySlug('Société Générale')).toBe('societe-generale');
  });

  it('should truncate at a word boundary', () => {
    const slug = generateEntitySlug(
      'International Business Machines Research Laboratories Europe'
    );
    expect(slug).toBe('international-business-machines-research');
    expect(slug.length).toBeLessThanOrEqual(40);
  });

  it('should fall back when nothing usable remains', () => {
    expect(generateEntitySlug('!!!')).toBe('entity');
    expect(generateEntitySlug('Inc.')).toBe('entity');
  });
});

describe('formatTimestamp', () => {
  it('should format local time as YYYYMMDD-HHMMSS', () => {
    expect(formatTimestamp(new Date(2026, 0, 7, 14, 35, 2))).toBe('20260107-143502');
  });
});

describe('handleCollision', () => {
  it('should return the base id when unused', () => {
    expect(handleCollision('20260107-143512-acme', [])).toBe('20260107-143512-acme');
  });

  it('should append the first free suffix', () => {
    expect(
      handleCollision('20260107-143512-acme', [
        '20260107-143512-acme',
        '20260107-143512-acme-2',
      ])
    ).toBe('20260107-143512-acme-3');
  });
});

describe('generateExecutionId', () => {
  it('should combine timestamp and slug', () => {
    const id = generateExecutionId('Acme', [], new Date(2026, 0, 7, 14, 35, 12));
    expect(id).toBe('20260107-143512-acme');
  });

  it('should never look like an ordinal', () => {
    const id = generateExecutionId('123', [], new Date(2026, 0, 7, 14, 35, 12));
    expect(id).toBe('20260107-143512-123');
    expect(/^\d+$/.test(id)).toBe(false);
  });
});
