/**
 * Embedder Tests
 *
 * Tests for the hashed embedder, the OpenAI-compatible embedder and the
 * factory's fallback behavior. A stub client stands in for the endpoint.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';

import {
  HashEmbedder,
  OpenAIEmbedder,
  createEmbedder,
  isLocalEndpoint,
  l2Normalize,
  type EmbeddingsClient,
} from '../index.js';
import { DEFAULT_CONFIG, _clearEnvCache } from '../../../config/index.js';
import { createMockLogger } from '../../../test-utils/index.js';

type EmbeddingData = Array<{ embedding: number[]; index: number }>;
type CreateFn = (params: { model: string; input: string[] }) => Promise<{ data: EmbeddingData }>;

/**
 * Stub endpoint: each text maps to [length, 1], returned in reverse order
 * to exercise index-based reordering.
 */
function createStubClient(
  impl?: (input: string[]) => EmbeddingData
): EmbeddingsClient & { create: Mock<CreateFn> } {
  const create = vi.fn<CreateFn>(async (params) => ({
    data: impl
      ? impl(params.input)
      : params.input.map((text, index) => ({ embedding: [text.length, 1], index })).reverse(),
  }));
  return { embeddings: { create }, create };
}

describe('l2Normalize', () => {
  it('scales to unit length', () => {
    expect(l2Normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it('leaves the zero vector unchanged', () => {
    expect(l2Normalize([0, 0, 0])).toEqual([0, 0, 0]);
  });
});

describe('HashEmbedder', () => {
  it('returns the all-zero vector for text without tokens', () => {
    const embedder = new HashEmbedder(8);

    expect(embedder.embedOne('')).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    expect(embedder.embedOne('  \n\t ')).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('lowercases tokens before hashing', () => {
    const embedder = new HashEmbedder(8);

    // sha256("blue") mod 8 === 0
    expect(embedder.embedOne('Blue BLUE blue')).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('normalizes slot counts to unit length', () => {
    const embedder = new HashEmbedder(8);

    // "alpha" -> slot 0, "beta" -> slot 3
    const vector = embedder.embedOne('alpha beta');

    expect(vector[0]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(vector[3]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(vector.filter((v) => v !== 0)).toHaveLength(2);
  });

  it('produces vectors of the configured size', async () => {
    const embedder = new HashEmbedder();
    const [vector] = await embedder.embed(['The sky is blue.']);

    expect(embedder.name).toBe('hash-512');
    expect(embedder.dimensions).toBe(512);
    expect(vector).toHaveLength(512);
  });

  it('is deterministic', async () => {
    const a = await new HashEmbedder(64).embed(['water is wet']);
    const b = await new HashEmbedder(64).embed(['water is wet']);

    expect(a).toEqual(b);
  });

  it('rejects invalid dimensions', () => {
    expect(() => new HashEmbedder(0)).toThrow(RangeError);
  });
});

describe('OpenAIEmbedder', () => {
  it('batches requests and restores input order', async () => {
    const client = createStubClient();
    const embedder = new OpenAIEmbedder(client, { model: 'test-model', batchSize: 2 });

    const vectors = await embedder.embed(['aaa', 'bbbb', 'c', 'dd', 'eeeee']);

    expect(client.create).toHaveBeenCalledTimes(3);
    expect(client.create).toHaveBeenNthCalledWith(1, { model: 'test-model', input: ['aaa', 'bbbb'] });
    expect(client.create).toHaveBeenNthCalledWith(3, { model: 'test-model', input: ['eeeee'] });
    expect(vectors).toHaveLength(5);
    // [3, 1] and [4, 1] normalized
    expect(vectors[0]?.[0]).toBeCloseTo(3 / Math.sqrt(10), 10);
    expect(vectors[1]?.[0]).toBeCloseTo(4 / Math.sqrt(17), 10);
  });

  it('records dimensions from the first response', async () => {
    const embedder = new OpenAIEmbedder(createStubClient(), { model: 'test-model' });

    expect(embedder.dimensions).toBe(0);
    await embedder.embed(['hello']);
    expect(embedder.dimensions).toBe(2);
    expect(embedder.name).toBe('openai:test-model');
  });

  it('does not call the endpoint for an empty batch', async () => {
    const client = createStubClient();

    expect(await new OpenAIEmbedder(client, { model: 'm' }).embed([])).toEqual([]);
    expect(client.create).not.toHaveBeenCalled();
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const client = createStubClient(() => [{ embedding: [1, 0], index: 0 }]);
    const embedder = new OpenAIEmbedder(client, { model: 'm' });

    await expect(embedder.embed(['a', 'b'])).rejects.toThrow(
      'Embedding endpoint returned 1 vectors for 2 inputs'
    );
  });

  it('rejects vectors whose size changes', async () => {
    const client = createStubClient((input) =>
      input.map((_, index) => ({ embedding: index === 0 ? [1, 0] : [1, 0, 0], index }))
    );
    const embedder = new OpenAIEmbedder(client, { model: 'm' });

    await expect(embedder.embed(['a', 'b'])).rejects.toThrow(
      'Embedding dimension changed from 2 to 3'
    );
  });
});

describe('isLocalEndpoint', () => {
  it('recognizes loopback hosts', () => {
    expect(isLocalEndpoint('http://localhost:11434/v1')).toBe(true);
    expect(isLocalEndpoint('http://127.0.0.1:1234/v1')).toBe(true);
  });

  it('rejects remote hosts and malformed URLs', () => {
    expect(isLocalEndpoint('https://api.example.com/v1')).toBe(false);
    expect(isLocalEndpoint('not a url')).toBe(false);
  });
});

describe('createEmbedder', () => {
  const config = { ...DEFAULT_CONFIG.embedding };

  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('EMBEDDING_API_KEY', '');
    vi.stubEnv('EMBEDDING_BASE_URL', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('returns the hashed embedder when configured', async () => {
    const embedder = await createEmbedder({ ...config, provider: 'hash', dimensions: 64 });

    expect(embedder).toBeInstanceOf(HashEmbedder);
    expect(embedder.dimensions).toBe(64);
  });

  it('returns the model-backed embedder when the probe succeeds', async () => {
    const client = createStubClient();
    const logger = createMockLogger();

    const embedder = await createEmbedder(config, { client, logger });

    expect(embedder).toBeInstanceOf(OpenAIEmbedder);
    expect(client.create).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('falls back to hashing when the probe fails', async () => {
    const client = createStubClient(() => {
      throw new Error('connect ECONNREFUSED');
    });
    const logger = createMockLogger();

    const embedder = await createEmbedder(config, { client, logger });

    expect(embedder).toBeInstanceOf(HashEmbedder);
    expect(embedder.dimensions).toBe(512);
    expect(logger.warn).toHaveBeenCalledWith(
      'Embedding endpoint unavailable (connect ECONNREFUSED); using local hashed embeddings'
    );
  });

  it('falls back to hashing when no key is set for a remote endpoint', async () => {
    const logger = createMockLogger();

    const embedder = await createEmbedder(config, {
      baseUrl: 'https://api.example.com/v1',
      logger,
    });

    expect(embedder).toBeInstanceOf(HashEmbedder);
    expect(logger.warn).toHaveBeenCalledWith(
      'EMBEDDING_API_KEY is not set; using local hashed embeddings'
    );
  });
});
