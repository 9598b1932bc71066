import { describe, expect, it, vi } from 'vitest';
import { ChatBrowserUse } from '../src/llm/browser-use/chat.js';
import {
  ModelProviderError,
  ModelRateLimitError,
} from '../src/llm/exceptions.js';
import { SystemMessage, UserMessage } from '../src/llm/messages.js';

const jsonResponse = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const createModel = (fetchImplementation: typeof fetch, maxRetries = 3) =>
  new ChatBrowserUse({
    apiKey: 'test-secret',
    baseUrl: 'http://llm.example.internal/',
    retryBaseDelay: 1,
    maxRetries,
    fetchImplementation,
  });

describe('ChatBrowserUse', () => {
  it('posts the conversation and returns the completion text', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse(200, {
        completion: 'Done',
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      })
    );
    const model = createModel(fetchMock);

    const result = await model.ainvoke([
      new SystemMessage('Be brief.'),
      new UserMessage('Say done'),
    ]);

    expect(result.completion).toBe('Done');
    expect(result.usage).toEqual({
      prompt_tokens: 12,
      completion_tokens: 3,
      total_tokens: 15,
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.example.internal/v1/chat/completions');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'bu-1-0',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Say done' },
      ],
      request_type: 'browser_agent',
    });
  });

  it('applies an output parser to the completion', async () => {
    const model = createModel(async () => jsonResponse(200, { completion: '{"ok":true}' }));

    const result = await model.ainvoke([new UserMessage('status?')], {
      parse: (input: string): { ok: boolean } => JSON.parse(input),
    });

    expect(result.completion).toEqual({ ok: true });
    expect(result.usage).toBeNull();
  });

  it('retries server errors and then succeeds', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse(503, { detail: 'busy' }))
      .mockResolvedValueOnce(jsonResponse(200, { completion: 'recovered' }));

    const result = await createModel(fetchMock).ainvoke([new UserMessage('again')]);

    expect(result.completion).toBe('recovered');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt on rate limiting', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse(429, { detail: 'slow down' })
    );

    const failure = createModel(fetchMock, 2).ainvoke([new UserMessage('hurry')]);

    await expect(failure).rejects.toBeInstanceOf(ModelRateLimitError);
    await expect(failure).rejects.toThrow('Rate limit exceeded. slow down');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry an invalid key', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse(401, { detail: 'unknown key' })
    );

    await expect(
      createModel(fetchMock).ainvoke([new UserMessage('hello')])
    ).rejects.toMatchObject({ statusCode: 401, message: 'Invalid API key. unknown key' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects an unknown model name', () => {
    expect(
      () =>
        new ChatBrowserUse({
          apiKey: 'test-secret',
          model: 'gpt-4o',
          fetchImplementation: vi.fn<typeof fetch>(),
        })
    ).toThrow(ModelProviderError);
  });
});
