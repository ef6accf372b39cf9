import { describe, it, expect, vi } from 'vitest';

import { TransportError } from '../src/gateway/errors.js';
import { OPENROUTER_API_URL, OpenRouterTransport } from '../src/gateway/openrouter.js';
import { createGatewayRequest } from '../src/gateway/types.js';

const MODEL = 'openai/gpt-4o';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function request(options: { timeoutMs?: number; extraParams?: Record<string, unknown> } = {}) {
  return createGatewayRequest(MODEL, [{ role: 'user', content: 'What is the capital of France?' }], {
    maxTokens: 512,
    ...options
  });
}

describe('OpenRouterTransport', () => {
  it('posts a chat completion and maps the response', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({
      choices: [{ message: { content: 'Paris.' } }],
      model: 'openai/gpt-4o-2024-08-06',
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 }
    }));
    const transport = new OpenRouterTransport('test-key', { fetchFn });

    const response = await transport.send(request({ extraParams: { top_p: 0.9 } }));

    expect(response).toMatchObject({
      status: 'ok',
      content: 'Paris.',
      model: 'openai/gpt-4o-2024-08-06',
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 }
    });

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(OPENROUTER_API_URL);
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toEqual({
      top_p: 0.9,
      model: MODEL,
      messages: [{ role: 'user', content: 'What is the capital of France?' }],
      temperature: 0.3,
      max_tokens: 512
    });
  });

  it('reports rate limiting with the Retry-After delay', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('slow down', { status: 429, headers: { 'Retry-After': '7' } })
    );
    const transport = new OpenRouterTransport('test-key', { fetchFn });

    await expect(transport.send(request())).resolves.toMatchObject({
      status: 'rate_limited',
      error: 'slow down',
      retryAfter: 7
    });
  });

  it('reports server errors as an error status', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('overloaded', { status: 503 }));
    const transport = new OpenRouterTransport('test-key', { fetchFn });

    await expect(transport.send(request())).resolves.toMatchObject({
      status: 'error',
      content: '',
      error: 'OpenRouter API error (503): overloaded'
    });
  });

  it('rejects unknown models with an invalid_model TransportError', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('No such model', { status: 404 }));
    const transport = new OpenRouterTransport('test-key', { fetchFn });

    const error = await transport.send(request()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'invalid_model', statusCode: 404 });
  });

  it('reports a response without content', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [] }));
    const transport = new OpenRouterTransport('test-key', { fetchFn });

    await expect(transport.send(request())).resolves.toMatchObject({
      status: 'error',
      error: 'No response from model'
    });
  });

  it('turns network failures into TransportError', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const transport = new OpenRouterTransport('test-key', { fetchFn });

    await expect(transport.send(request())).rejects.toThrow('Network error calling openai/gpt-4o: fetch failed');
  });

  it('reports a timeout when the request is aborted', async () => {
    const fetchFn = vi.fn<typeof fetch>((_input, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    }));
    const transport = new OpenRouterTransport('test-key', { fetchFn });

    const response = await transport.send(request({ timeoutMs: 10 }));

    expect(response.status).toBe('timeout');
    expect(response.error).toMatch(/^Request aborted after \d+ms$/);
  });

  it('follows an outer abort signal', async () => {
    const fetchFn = vi.fn<typeof fetch>((_input, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    }));
    const transport = new OpenRouterTransport('test-key', { fetchFn });
    const controller = new AbortController();

    const pending = transport.send(request({ timeoutMs: 60_000 }), controller.signal);
    controller.abort();

    await expect(pending).resolves.toMatchObject({ status: 'timeout' });
  });

  it('refuses to send without an API key', async () => {
    const fetchFn = vi.fn<typeof fetch>();
    const transport = new OpenRouterTransport('', { fetchFn });

    await expect(transport.send(request())).rejects.toThrow('OpenRouter API key not configured');
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
