import fetch, { Response } from 'node-fetch';
import { OpenAiApiClient } from '../src/infrastructure/http/OpenAiApiClient.js';
import { ZeroShotClassifierClient } from '../src/infrastructure/http/ZeroShotClassifierClient.js';
import { CircuitBreaker } from '../src/utils/retry.js';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(fetch);

const NO_RETRY = {
  maxAttempts: 1,
  initialDelayMs: 1,
  maxDelayMs: 1,
  multiplier: 1,
  timeoutMs: 1000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function sentBody(callIndex = 0): unknown {
  const init = mockedFetch.mock.calls[callIndex][1];
  return JSON.parse(String(init?.body));
}

describe('OpenAiApiClient', () => {
  beforeEach(() => {
    mockedFetch.mockReset();
  });

  test('should post the context and return the trimmed reply', async () => {
    mockedFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { role: 'assistant', content: '  Hello!  ' } }] })
    );
    const client = new OpenAiApiClient('https://proxy.test/v1/', 'test-key', new CircuitBreaker(), NO_RETRY);

    const reply = await client.generate([{ role: 'user', content: 'Hi' }], 'gpt-4o');

    expect(reply).toBe('Hello!');
    expect(mockedFetch.mock.calls[0][0]).toBe('https://proxy.test/v1/chat/completions');
    expect(mockedFetch.mock.calls[0][1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(sentBody()).toEqual({ model: 'gpt-4o', messages: [{ role: 'user', content: 'Hi' }] });
  });

  test('should fail on an HTTP error status', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({ error: 'bad key' }, 401));
    const client = new OpenAiApiClient('https://proxy.test/v1', 'test-key', new CircuitBreaker(), NO_RETRY);

    await expect(client.generate([{ role: 'user', content: 'Hi' }], 'gpt-4o')).rejects.toThrow(
      'HTTP error! status: 401'
    );
  });

  test('should fail when the response has no content', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({ choices: [] }));
    const client = new OpenAiApiClient('https://proxy.test/v1', 'test-key', new CircuitBreaker(), NO_RETRY);

    await expect(client.generate([{ role: 'user', content: 'Hi' }], 'gpt-4o')).rejects.toThrow(
      'Chat completion response has no message content'
    );
  });

  test('should retry within its own policy', async () => {
    mockedFetch
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'ok' } }] }));
    const client = new OpenAiApiClient('https://proxy.test/v1', 'test-key', new CircuitBreaker(), {
      ...NO_RETRY,
      maxAttempts: 2,
    });

    await expect(client.generate([{ role: 'user', content: 'Hi' }], 'gpt-4o')).resolves.toBe('ok');
    expect(mockedFetch).toHaveBeenCalledTimes(2);
  });
});

describe('ZeroShotClassifierClient', () => {
  beforeEach(() => {
    mockedFetch.mockReset();
  });

  test('should send candidate labels and return the bot score', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({ labels: ['human', 'bot'], scores: [0.7, 0.3] }));
    const client = new ZeroShotClassifierClient(
      'http://classifier.test/classify',
      { bot: 'bot', human: 'human' },
      new CircuitBreaker(),
      NO_RETRY
    );

    await expect(client.classify('Hi\nHello')).resolves.toBe(0.3);
    expect(mockedFetch.mock.calls[0][0]).toBe('http://classifier.test/classify');
    expect(sentBody()).toEqual({
      inputs: 'Hi\nHello',
      parameters: { candidate_labels: ['bot', 'human'] },
    });
  });

  test('should return out-of-range scores unchanged', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({ labels: ['bot'], scores: [1.5] }));
    const client = new ZeroShotClassifierClient('http://classifier.test', undefined, new CircuitBreaker(), NO_RETRY);

    await expect(client.classify('text')).resolves.toBe(1.5);
  });

  test('should reject a score that is not finite', async () => {
    mockedFetch.mockResolvedValueOnce(
      new Response('{"labels":["bot"],"scores":[1e999]}', {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      })
    );
    const client = new ZeroShotClassifierClient('http://classifier.test', undefined, new CircuitBreaker(), NO_RETRY);

    await expect(client.classify('text')).rejects.toThrow('Classifier response has no finite score for label "bot"');
  });

  test('should fail when the bot label is missing', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({ labels: ['human'], scores: [1] }));
    const client = new ZeroShotClassifierClient('http://classifier.test', undefined, new CircuitBreaker(), NO_RETRY);

    await expect(client.classify('text')).rejects.toThrow('Classifier response has no finite score for label "bot"');
  });
});
