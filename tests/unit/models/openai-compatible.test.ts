import { afterEach, describe, expect, it, vi } from 'vitest';
import { OpenAICompatibleModel } from '../../../src/models/openai-compatible.js';
import { ModelInvocationError } from '../../../src/utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createModel(): OpenAICompatibleModel {
  return new OpenAICompatibleModel({
    baseUrl: 'https://llm.example/v1/',
    apiKey: 'test-secret',
    model: 'test-model',
    temperature: 0.2,
  });
}

describe('OpenAICompatibleModel', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the chat request and maps the reply', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({
        choices: [{ message: { content: 'Hello there' } }],
        usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const response = await createModel().chat({
      messages: [{ role: 'user', content: 'Hi' }],
      tools: [{ name: 'search__web', description: 'Search the web', parameters: { type: 'object', properties: {} } }],
    });

    expect(response).toEqual({
      content: 'Hello there',
      toolCalls: undefined,
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.example/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.2,
      tools: [
        {
          type: 'function',
          function: {
            name: 'search__web',
            description: 'Search the web',
            parameters: { type: 'object', properties: {} },
          },
        },
      ],
    });
  });

  it('returns requested tool calls', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse({
          choices: [
            {
              message: {
                content: null,
                tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'search__web', arguments: '{"q":"tea"}' } }],
              },
            },
          ],
        })
      )
    );

    const response = await createModel().chat({ messages: [{ role: 'user', content: 'Find tea' }] });

    expect(response.content).toBe('');
    expect(response.toolCalls).toEqual([
      { id: 'call_1', type: 'function', function: { name: 'search__web', arguments: '{"q":"tea"}' } },
    ]);
  });

  it.each([
    [429, true],
    [503, true],
    [400, false],
    [401, false],
  ])('marks HTTP %i as retryable=%s', async (status, retryable) => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('upstream said no', { status })));

    const error = await createModel()
      .chat({ messages: [{ role: 'user', content: 'Hi' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelInvocationError);
    if (error instanceof ModelInvocationError) {
      expect(error.retryable).toBe(retryable);
      expect(error.message).toBe(`Model API error (${status}): upstream said no`);
    }
  });

  it('treats network failures as retryable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const error = await createModel()
      .chat({ messages: [{ role: 'user', content: 'Hi' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelInvocationError);
    expect(error instanceof ModelInvocationError && error.retryable).toBe(true);
  });

  it('rejects malformed responses as permanent', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ choices: [] })));

    const error = await createModel()
      .chat({ messages: [{ role: 'user', content: 'Hi' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelInvocationError);
    expect(error instanceof ModelInvocationError && error.retryable).toBe(false);
  });
});
