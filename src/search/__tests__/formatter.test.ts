/**
 * Formatter Tests
 */

import { describe, it, expect } from 'vitest';

import {
  formatCitation,
  formatHit,
  formatHits,
  formatReference,
  formatSimilarity,
  truncateSnippet,
} from '../formatter.js';
import type { SearchHit } from '../types.js';

const hit: SearchHit = {
  text: 'Water boils at 100 degrees\nat sea level.',
  documentIndex: 1,
  chunkIndex: 2,
  similarity: 0.87349,
};

describe('formatSimilarity', () => {
  it('uses three decimals', () => {
    expect(formatSimilarity(0.87349)).toBe('0.873');
    expect(formatSimilarity(0)).toBe('0.000');
    expect(formatSimilarity(1)).toBe('1.000');
  });
});

describe('formatReference', () => {
  it('labels document and chunk', () => {
    expect(formatReference({ documentIndex: 3, chunkIndex: 12 })).toBe('D3-12');
  });
});

describe('formatCitation', () => {
  it('puts the label and score above the chunk text', () => {
    expect(formatCitation(hit)).toBe(
      '[D1-2] (sim=0.873)\nWater boils at 100 degrees\nat sea level.'
    );
  });
});

describe('truncateSnippet', () => {
  it('collapses whitespace', () => {
    expect(truncateSnippet('Line 1\nLine 2   end')).toBe('Line 1 Line 2 end');
  });

  it('adds an ellipsis past the limit', () => {
    expect(truncateSnippet('Hello world', 5)).toBe('Hello...');
  });
});

describe('formatHit', () => {
  it('renders a header and an indented one-line snippet', () => {
    expect(formatHit(hit)).toBe('[D1-2] 0.873\n  Water boils at 100 degrees at sea level.');
  });

  it('respects snippetLength', () => {
    expect(formatHit(hit, { snippetLength: 11 })).toBe('[D1-2] 0.873\n  Water boils...');
  });

  it('joins several hits with blank lines', () => {
    expect(formatHits([hit, { ...hit, chunkIndex: 3 }], { snippetLength: 5 })).toBe(
      '[D1-2] 0.873\n  Water...\n\n[D1-3] 0.873\n  Water...'
    );
  });
});
