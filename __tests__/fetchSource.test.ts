import { z } from 'zod';
import { fetchSource, toBatch } from '../lib/sources/fetchSource';
import { HttpClient } from '../lib/net/httpClient';
import { SourceError } from '../lib/errors';

const list = z.array(z.string());

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('fetchSource', () => {
  const fetchMock = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>();
  const client = new HttpClient({ fetchImpl: fetchMock, userAgent: 'test-agent' });

  beforeEach(() => fetchMock.mockReset());

  test('resolves one cleaned, deduplicated batch', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(['sub.example.com', 'SUB.example.com ', 'deep.sub.example.com']));

    const batch = await fetchSource(client, 'https://api.test', list, 'example.com', 'test-source');

    expect(batch).toEqual(['sub.example.com', 'deep.sub.example.com']);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.test');
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'User-Agent': 'test-agent' });
  });

  test('reports an HTTP error as a source failure', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 500));

    await expect(fetchSource(client, 'https://api.test', list, 'example.com', 'test-source')).rejects.toMatchObject({
      source: 'test-source',
      host: 'example.com',
      reason: 'HTTP 500 from https://api.test',
    });
  });

  test('reports a network error as a source failure', async () => {
    fetchMock.mockRejectedValue(new Error('network error'));

    const err = await fetchSource(client, 'https://api.test', list, 'example.com', 'test-source').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceError);
    expect(err).toMatchObject({ reason: 'network error' });
  });

  test('reports a payload of the wrong shape as a source failure', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ unexpected: true }));

    await expect(fetchSource(client, 'https://api.test', list, 'example.com', 'test-source')).rejects.toMatchObject({
      reason: 'unexpected payload',
    });
  });

  test('an empty result is the same failure kind as a broken provider', async () => {
    fetchMock.mockImplementation(async () => jsonResponse([]));

    await expect(fetchSource(client, 'https://api.test', list, 'example.com', 'test-source')).rejects.toBeInstanceOf(SourceError);
  });

  test('rethrows an abort untouched', async () => {
    const controller = new AbortController();
    controller.abort();
    fetchMock.mockRejectedValue(new Error('This operation was aborted'));

    const err = await fetchSource(client, 'https://api.test', list, 'example.com', 'test-source', {
      signal: controller.signal,
    }).catch((e: unknown) => e);

    expect(err).not.toBeInstanceOf(SourceError);
    expect(err).toMatchObject({ message: 'This operation was aborted' });
  });
});

describe('toBatch', () => {
  test('drops blank names', () => {
    expect(toBatch('s', 'example.com', [' ', 'a.example.com', ''])).toEqual(['a.example.com']);
  });

  test('throws when nothing is left', () => {
    expect(() => toBatch('s', 'example.com', ['  '])).toThrow('s: no usable data for example.com (empty result)');
  });
});
