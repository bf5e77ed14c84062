/**
 * Chunker Module Tests
 *
 * Tests for line packing, overlap carry-over, oversized-line splitting
 * and document ordinals.
 */

import { describe, it, expect } from 'vitest';

import { splitIntoChunks, chunkDocuments } from '../chunker/index.js';
import { ValidationError } from '../../errors/index.js';

describe('splitIntoChunks', () => {
  describe('basic packing', () => {
    it('returns no chunks for empty text', () => {
      expect(splitIntoChunks('')).toEqual([]);
      expect(splitIntoChunks('\n\n   \n')).toEqual([]);
    });

    it('keeps a short document as a single chunk', () => {
      expect(splitIntoChunks('The sky is blue. Water is wet.')).toEqual([
        'The sky is blue. Water is wet.',
      ]);
    });

    it('joins lines that fit with newlines', () => {
      const text = 'First line of the document.\nSecond line here.';

      expect(splitIntoChunks(text)).toEqual([
        'First line of the document.\nSecond line here.',
      ]);
    });

    it('trims lines and skips blank ones', () => {
      const text = '  alpha beta gamma delta  \n\n\n  epsilon zeta eta theta  ';

      expect(splitIntoChunks(text)).toEqual([
        'alpha beta gamma delta\nepsilon zeta eta theta',
      ]);
    });

    it('recognizes CRLF and Unicode line separators', () => {
      const text = 'first line is here\r\nsecond line is here\u2028third';

      expect(splitIntoChunks(text)).toEqual([
        'first line is here\nsecond line is here\nthird',
      ]);
    });
  });

  describe('minimum length', () => {
    it('keeps a chunk of exactly the minimum length', () => {
      expect(splitIntoChunks('a'.repeat(20))).toEqual(['a'.repeat(20)]);
    });

    it('drops chunks shorter than the minimum length', () => {
      expect(splitIntoChunks('a'.repeat(19))).toEqual([]);
      expect(splitIntoChunks('tiny')).toEqual([]);
    });

    it('honors a custom minimum length', () => {
      expect(splitIntoChunks('tiny', { minChunkLength: 1 })).toEqual(['tiny']);
    });
  });

  describe('overlap', () => {
    const text = `${'x'.repeat(30)}\n${'y'.repeat(30)}`;

    it('starts the next chunk with the tail of the previous buffer', () => {
      const chunks = splitIntoChunks(text, { chunkSize: 50, overlap: 10 });

      expect(chunks).toEqual(['x'.repeat(30), `${'x'.repeat(10)} ${'y'.repeat(30)}`]);
    });

    it('carries nothing over when overlap is 0', () => {
      const chunks = splitIntoChunks(text, { chunkSize: 50, overlap: 0 });

      expect(chunks).toEqual(['x'.repeat(30), 'y'.repeat(30)]);
    });
  });

  describe('oversized lines', () => {
    it('cuts a long line into fixed windows', () => {
      const chunks = splitIntoChunks('a'.repeat(2000), { chunkSize: 800, overlap: 120 });

      expect(chunks.map((chunk) => chunk.length)).toEqual([800, 800, 640]);
    });

    it('cuts without overlap when overlap is 0', () => {
      const chunks = splitIntoChunks('b'.repeat(250), { chunkSize: 100, overlap: 0 });

      expect(chunks.map((chunk) => chunk.length)).toEqual([100, 100, 50]);
    });
  });

  describe('invariants', () => {
    const words = Array.from({ length: 600 }, (_, i) => `word${i % 37}`);
    const lines: string[] = [];
    for (let i = 0; i < words.length; i += 9) {
      lines.push(words.slice(i, i + 9).join(' '));
    }
    lines.push('z'.repeat(1500));
    const text = lines.join('\n');

    it('keeps every chunk within [minChunkLength, chunkSize + overlap]', () => {
      const chunks = splitIntoChunks(text, { chunkSize: 200, overlap: 40 });

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeGreaterThanOrEqual(20);
        expect(chunk.length).toBeLessThanOrEqual(240);
      }
    });

    it('is deterministic', () => {
      expect(splitIntoChunks(text)).toEqual(splitIntoChunks(text));
    });
  });

  describe('option validation', () => {
    it('rejects overlap that is not smaller than chunkSize', () => {
      expect(() => splitIntoChunks('text', { chunkSize: 100, overlap: 100 })).toThrow(
        ValidationError
      );
    });

    it('rejects a non-positive chunk size', () => {
      expect(() => splitIntoChunks('text', { chunkSize: 0, overlap: 0 })).toThrow(
        ValidationError
      );
    });

    it('rejects negative and fractional values', () => {
      expect(() => splitIntoChunks('text', { overlap: -1 })).toThrow(ValidationError);
      expect(() => splitIntoChunks('text', { chunkSize: 10.5 })).toThrow(ValidationError);
    });
  });
});

describe('chunkDocuments', () => {
  it('tags chunks with 1-based document and chunk ordinals', () => {
    const chunks = chunkDocuments(
      ['The sky is blue. Water is wet.', 'short', 'b'.repeat(2000)],
      { chunkSize: 800, overlap: 120 }
    );

    expect(chunks.map((c) => [c.documentIndex, c.chunkIndex])).toEqual([
      [1, 1],
      [3, 1],
      [3, 2],
      [3, 3],
    ]);
    expect(chunks[0]?.text).toBe('The sky is blue. Water is wet.');
  });

  it('returns nothing for no documents', () => {
    expect(chunkDocuments([])).toEqual([]);
  });
});
