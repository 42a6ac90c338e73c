import { describe, it } from 'node:test';
import assert from 'node:assert';
import { assertGenerationReady, loadConfig } from '../src/config/index.js';
import { ConfigError } from '../src/shared/errors.js';
import './helpers.js';

describe('loadConfig', () => {
  it('fills defaults for an empty environment', () => {
    const config = loadConfig({});
    assert.deepStrictEqual(config.generation, {
      apiKey: null,
      model: 'gpt-4o-mini',
      baseUrl: null,
      temperature: 0.3,
      timeoutMs: 60_000,
      maxAttempts: 3,
      backoffMs: 500,
      backoffFactor: 2,
      maxBackoffMs: 8_000,
    });
    assert.deepStrictEqual(config.reflection, { concurrency: 3, failurePolicy: 'abort' });
    assert.strictEqual(config.archive.store, 'sqlite');
    assert.strictEqual(config.archive.embeddings, 'local');
    assert.strictEqual(config.archive.embedDim, 512);
    assert.deepStrictEqual(config.http, { port: 4010, rateLimitRpm: 30 });
  });

  it('coerces strings and treats blank values as unset', () => {
    const config = loadConfig({
      OPENAI_API_KEY: '',
      REFLECTION_CONCURRENCY: '5',
      REFLECTION_FAILURE_POLICY: 'placeholder',
      RAG_STORE: 'memory',
      LLM_TIMEOUT_MS: '1500',
    });
    assert.strictEqual(config.generation.apiKey, null);
    assert.strictEqual(config.generation.timeoutMs, 1500);
    assert.deepStrictEqual(config.reflection, { concurrency: 5, failurePolicy: 'placeholder' });
    assert.strictEqual(config.archive.store, 'memory');
  });

  it('prefers remote embeddings once a key is present unless pinned', () => {
    assert.strictEqual(loadConfig({ OPENAI_API_KEY: 'test-secret' }).archive.embeddings, 'openai');
    assert.strictEqual(loadConfig({ OPENAI_API_KEY: 'test-secret', RAG_EMBEDDINGS: 'local' }).archive.embeddings, 'local');
  });

  it('reports every invalid key at once', () => {
    assert.throws(() => loadConfig({ REFLECTION_CONCURRENCY: '9', RAG_STORE: 'chroma' }), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.strictEqual(err.issues.length, 2);
      assert.ok(err.issues[0].startsWith('REFLECTION_CONCURRENCY: '));
      assert.ok(err.issues[1].startsWith('RAG_STORE: '));
      return true;
    });
  });
});

describe('assertGenerationReady', () => {
  it('fails fast without an API key', () => {
    assert.throws(() => assertGenerationReady(loadConfig({ RAG_EMBEDDINGS: 'local' })), (err: unknown) =>
      err instanceof ConfigError && err.issues.length === 1 && err.issues[0].startsWith('OPENAI_API_KEY'));
  });

  it('accepts a configured key', () => {
    assert.doesNotThrow(() => assertGenerationReady(loadConfig({ OPENAI_API_KEY: 'test-secret' })));
  });
});
