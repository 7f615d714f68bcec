import { afterEach, describe, expect, it } from 'vitest';
import { GenerationClient, transientCode } from '../services/generation-client.js';
import { GenerationRequestError, ServiceUnavailableError } from '../utils/errors.js';
import { DEFAULT_REPLY_BODY, MockGenerationServer, MockReply, startMockGenerationServer, unusedPort } from './fakes.js';

describe('GenerationClient', () => {
  let server: MockGenerationServer | undefined;

  async function serve(reply?: (call: number) => MockReply): Promise<MockGenerationServer> {
    server = await startMockGenerationServer(reply);
    return server;
  }

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('posts the prompt and parameters to /generate', async () => {
    const { url, requests } = await serve();
    const client = new GenerationClient('gpt2', `${url}/`);

    await client.generate('test', { maxNewTokens: 1 });

    expect(client.baseUrl).toBe(url);
    expect(requests).toEqual([
      {
        path: '/generate',
        body: { inputs: 'test', parameters: { max_new_tokens: 1, decoder_input_details: false } },
      },
    ]);
  });

  it('parses text, token ids and log-probabilities', async () => {
    const { url } = await serve();
    const client = new GenerationClient('gpt2', url);

    const response = await client.generate('It was a bright cold day', { maxNewTokens: 4, decoderInputDetails: true });

    expect(response.generatedText).toBe(DEFAULT_REPLY_BODY.generated_text);
    expect(response.details?.finishReason).toBe('length');
    expect(response.details?.generatedTokens).toBe(4);
    expect(response.details?.prefill).toEqual([{ id: 1026, text: 'It', logprob: null, special: false }]);
    expect(response.details?.tokens.map((token) => token.id)).toEqual([383, 4252, 373, 4634]);
    expect(response.details?.tokens.map((token) => token.logprob)).toEqual([-1.5, -2.25, -0.5, -3]);
  });

  it('accepts responses without details', async () => {
    const { url } = await serve(() => ({ status: 200, body: { generated_text: ' The' } }));

    const response = await new GenerationClient('gpt2', url).generate('test');

    expect(response).toEqual({ generatedText: ' The', details: null });
  });

  it('turns error bodies into GenerationRequestError', async () => {
    const { url } = await serve(() => ({
      status: 422,
      body: { error: 'Input validation error: `max_new_tokens` must be strictly positive', error_type: 'validation' },
    }));
    const client = new GenerationClient('gpt2', url);

    const error = await client.generate('test').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationRequestError);
    if (error instanceof GenerationRequestError) {
      expect(error.status).toBe(422);
      expect(error.errorType).toBe('validation');
      expect(error.message).toBe('Input validation error: `max_new_tokens` must be strictly positive');
    }
  });

  it('rejects a successful status with an unusable body', async () => {
    const { url } = await serve(() => ({ status: 200, body: '<html>gateway</html>' }));

    await expect(new GenerationClient('gpt2', url).generate('test')).rejects.toBeInstanceOf(GenerationRequestError);
  });

  it('reports a closed port as unavailable', async () => {
    const port = await unusedPort();
    const client = new GenerationClient('gpt2', `http://127.0.0.1:${port}`);

    const error = await client.generate('test').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ServiceUnavailableError);
    if (error instanceof ServiceUnavailableError) {
      expect(error.code).toBe('ECONNREFUSED');
      expect(error.url).toBe(`http://127.0.0.1:${port}/generate`);
    }
  });

  it('reports a dropped connection as unavailable', async () => {
    const { url } = await serve(() => 'destroy');

    await expect(new GenerationClient('gpt2', url).generate('test')).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});

describe('transientCode', () => {
  it('finds socket codes through the cause chain', () => {
    const socketError = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8123'), { code: 'ECONNREFUSED' });
    const fetchError = new TypeError('fetch failed', { cause: socketError });

    expect(transientCode(fetchError)).toBe('ECONNREFUSED');
  });

  it('looks inside dual-stack connection failures', () => {
    const v6 = Object.assign(new Error('connect ECONNREFUSED ::1:8123'), { code: 'ECONNREFUSED' });
    const v4 = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8123'), { code: 'ECONNREFUSED' });
    const fetchError = new TypeError('fetch failed', { cause: new AggregateError([v6, v4]) });

    expect(transientCode(fetchError)).toBe('ECONNREFUSED');
  });

  it('ignores other failures', () => {
    const dnsError = Object.assign(new Error('getaddrinfo ENOTFOUND tgi'), { code: 'ENOTFOUND' });

    expect(transientCode(new TypeError('fetch failed', { cause: dnsError }))).toBeUndefined();
    expect(transientCode(new Error('boom'))).toBeUndefined();
  });
});
