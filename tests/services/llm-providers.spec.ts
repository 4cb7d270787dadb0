import { afterEach, describe, expect, it, vi } from 'vitest';
import { OllamaProvider, OpenAiCompatibleProvider, StubProvider } from '../../src/services/llm-providers.js';
import { ProviderUnavailableError, TransientBackendError } from '../../src/types/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('LLM providers', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a non-streaming generate request to Ollama', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ response: 'Rotate the logs.', eval_count: 7 }));
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OllamaProvider({ name: 'ollama_local', baseUrl: 'http://localhost:11434/', model: 'llama3.1:8b' });
    const result = await provider.generate('why?');

    expect(result).toEqual({ text: 'Rotate the logs.', provider: 'ollama_local', tokenEstimate: 7 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe('http://localhost:11434/api/generate');
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({ model: 'llama3.1:8b', prompt: 'why?', stream: false });
  });

  it('reads the first choice from a chat completion', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({
      choices: [{ message: { role: 'assistant', content: 'Scale the consumer group.' } }],
      usage: { total_tokens: 31 },
    }));
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OpenAiCompatibleProvider({
      name: 'cloud_openai',
      baseUrl: 'https://llm.example.test/v1',
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
    });
    const result = await provider.generate('lag?');

    expect(result).toEqual({ text: 'Scale the consumer group.', provider: 'cloud_openai', tokenEstimate: 31 });
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe('https://llm.example.test/v1/chat/completions');
    expect(new Headers(call?.[1]?.headers).get('Authorization')).toBe('Bearer test-secret');
  });

  it('classifies 429 and 5xx as transient and other statuses as unavailable', async () => {
    const provider = new OpenAiCompatibleProvider({ baseUrl: 'https://llm.example.test/v1', apiKey: 'test-secret', model: 'm' });

    vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 429 })));
    await expect(provider.generate('q')).rejects.toMatchObject({ name: 'TransientBackendError', status: 429 });

    vi.stubGlobal('fetch', vi.fn(async () => new Response('oops', { status: 503 })));
    await expect(provider.generate('q')).rejects.toBeInstanceOf(TransientBackendError);

    vi.stubGlobal('fetch', vi.fn(async () => new Response('denied', { status: 401 })));
    await expect(provider.generate('q')).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('wraps network failures as transient', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434', model: 'm' });

    await expect(provider.generate('q')).rejects.toThrow('ollama request failed: fetch failed');
  });

  it('refuses to call the cloud without an API key', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const provider = new OpenAiCompatibleProvider({ baseUrl: 'https://llm.example.test/v1', apiKey: '', model: 'm' });

    await expect(provider.generate('q')).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('answers deterministically from the stub', async () => {
    const stub = new StubProvider('fixed answer');
    await expect(stub.generate('anything')).resolves.toEqual({
      text: 'fixed answer',
      provider: 'on_device_stub',
      tokenEstimate: 3,
    });
  });
});
