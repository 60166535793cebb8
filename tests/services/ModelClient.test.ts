import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_ATTRIBUTES } from '../../src/config.js';
import { CountryCatalog } from '../../src/services/CountryCatalog.js';
import { HsCodeCatalog } from '../../src/services/HsCodeCatalog.js';
import { ModelClient, truncateInput, type ModelClientOptions } from '../../src/services/ModelClient.js';
import { ModelResponseParser } from '../../src/services/ModelResponseParser.js';
import { MockModelProvider, countryReply } from '../mocks/MockModelProvider.js';

const credentials = { model: 'mock-model', apiKey: 'test-provider-key' };

describe('ModelClient', () => {
  let provider: MockModelProvider;

  function client(overrides?: Partial<ModelClientOptions>): ModelClient {
    const profile = { attributes: DEFAULT_ATTRIBUTES, countryFormat: 'alpha2' as const };
    return new ModelClient(
      provider,
      new ModelResponseParser(new CountryCatalog(), new HsCodeCatalog(), profile),
      { ...profile, timeoutMs: 1000, maxInputChars: 1000, ...overrides }
    );
  }

  beforeEach(() => {
    provider = new MockModelProvider();
  });

  it('truncateInput should mark truncated text', () => {
    expect(truncateInput('abcdef', 3)).toBe('abc...');
    expect(truncateInput('abc', 3)).toBe('abc');
  });

  it('should return parsed attributes on success', async () => {
    provider.replyWith(countryReply(['GB'], 0.9, 'Made in Wales'));

    const outcome = await client().extract('Made in Wales', credentials);

    expect(outcome).toEqual({
      ok: true,
      attributes: expect.objectContaining({
        country: { value: ['GB'], evidence: 'Made in Wales', confidence: 0.9 },
      }),
    });
  });

  it('should pass the model, credential and an abort signal to the provider', async () => {
    await client().extract('Made in Japan', credentials);

    expect(provider.calls).toHaveLength(1);
    const { options } = provider.calls[0];
    expect(options.model).toBe('mock-model');
    expect(options.apiKey).toBe('test-provider-key');
    expect(options.signal).toBeInstanceOf(AbortSignal);
  });

  it('should truncate long input in the prompt', async () => {
    await client({ maxInputChars: 10 }).extract('abcdefghijklmnop', credentials);
    expect(provider.calls[0].prompt.user).toBe('Product description:\nabcdefghij...');
  });

  it('should report an unusable reply as a parse failure', async () => {
    provider.replyWith('not json');
    const outcome = await client().extract('Made in Japan', credentials);
    expect(outcome).toMatchObject({ ok: false, failure: { kind: 'parse' } });
  });

  it('should pass through the kind of a provider failure', async () => {
    provider.failWith('quota', 'rate limited');
    const outcome = await client().extract('Made in Japan', credentials);
    expect(outcome).toEqual({ ok: false, failure: { kind: 'quota', message: 'rate limited' } });
  });

  it('should treat unexpected errors as transient', async () => {
    provider.handler = async () => {
      throw new Error('socket hang up');
    };
    const outcome = await client().extract('Made in Japan', credentials);
    expect(outcome).toEqual({ ok: false, failure: { kind: 'transient', message: 'socket hang up' } });
  });

  it('should time out a hanging call as transient and abort it', async () => {
    provider.hang();

    const outcome = await client({ timeoutMs: 20 }).extract('Made in Japan', credentials);

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'transient', message: 'Model call timed out after 20ms' },
    });
    expect(provider.calls[0].options.signal?.aborted).toBe(true);
  });
});
