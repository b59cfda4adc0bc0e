/**
 * HTTP Collaborator Client Tests
 *
 * fetch is stubbed per test; nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../../../core/http-client.js';
import {
  CollaboratorResponseError,
  HttpDescriptorClient,
  HttpRetrievalClient,
  HttpVerificationClient,
  decodeBlob,
  encodeBlob,
} from '../../../collaborators/http-clients.js';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('collaborator HTTP clients', () => {
  let fetchMock: Mock<FetchFn>;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function sentBody(call = 0): unknown {
    const init = fetchMock.mock.calls[call]?.[1];
    return JSON.parse(String(init?.body));
  }

  describe('HTTPClient', () => {
    const fastRetries = { initialDelayMs: 0, jitterFactor: 0 };

    it('parses JSON bodies', async () => {
      fetchMock.mockResolvedValueOnce(json({ ok: true }));

      await expect(new HTTPClient().fetchJSON('http://svc.test/x')).resolves.toEqual({ ok: true });
      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('GET');
    });

    it('retries retryable statuses', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('busy', { status: 503 }))
        .mockResolvedValueOnce(json({ done: 1 }));
      const client = new HTTPClient({ ...fastRetries, maxRetries: 2 });

      await expect(client.fetchJSON('http://svc.test/x')).resolves.toEqual({ done: 1 });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('fails fast on client errors and reads the detail field', async () => {
      fetchMock.mockResolvedValue(json({ detail: 'no such image' }, 404));
      const client = new HTTPClient({ ...fastRetries, maxRetries: 3 });

      const error = await client.fetchJSON('http://svc.test/x').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HTTPError);
      expect(error).toMatchObject({
        statusCode: 404,
        detail: 'no such image',
        message: 'HTTP 404: no such image',
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('reports bodies that are not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(new HTTPClient().fetchJSON('http://svc.test/x')).rejects.toThrow(
        HTTPJSONParseError
      );
    });

    it('wraps connection failures', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const client = new HTTPClient({ ...fastRetries, maxRetries: 1 });

      await expect(client.fetchJSON('http://svc.test/x')).rejects.toThrow(HTTPNetworkError);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('times out slow requests', async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('The operation was aborted.'), { name: 'AbortError' }));
            });
          })
      );
      const client = new HTTPClient({ maxRetries: 0, timeoutMs: 10 });

      await expect(client.fetchJSON('http://svc.test/slow')).rejects.toThrow(
        new HTTPTimeoutError('http://svc.test/slow', 10).message
      );
    });
  });

  describe('HttpRetrievalClient', () => {
    const client = new HttpRetrievalClient({ baseUrl: 'http://retrieval.test/', timeoutMs: 1000 });

    it('posts the query and converts distances to scores', async () => {
      fetchMock.mockResolvedValueOnce(
        json({
          results: [
            { id: 'B', distance: 0 },
            { id: 42, distance: 0.25, labels: ['blot'] },
          ],
        })
      );

      const candidates = await client.retrieveSimilar({
        imageId: 'A',
        topK: 2,
        ownerIds: ['alice'],
      });

      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://retrieval.test/search');
      expect(sentBody()).toEqual({ image_id: 'A', top_k: 2, labels: null, owner_ids: ['alice'] });
      expect(candidates).toEqual([
        { imageId: 'B', score: 1 },
        { imageId: '42', score: 0.75 },
      ]);
    });

    it('rejects malformed responses', async () => {
      fetchMock.mockResolvedValueOnce(json({ results: [{ id: 'B' }] }));

      await expect(client.retrieveSimilar({ imageId: 'A', topK: 1 })).rejects.toThrow(
        new CollaboratorResponseError(
          'http://retrieval.test/search',
          'results.0.distance: Required'
        ).message
      );
    });

    it('reports health from the status field', async () => {
      fetchMock.mockResolvedValueOnce(json({ status: 'ok' }));
      await expect(client.health()).resolves.toEqual({
        healthy: true,
        message: 'retrieval service is ok',
      });

      fetchMock.mockResolvedValueOnce(json({ status: 'degraded', message: 'index rebuilding' }));
      await expect(client.health()).resolves.toEqual({
        healthy: false,
        message: 'index rebuilding',
      });
    });

    it('reports an unreachable service as unhealthy', async () => {
      fetchMock.mockResolvedValueOnce(new Response('boom', { status: 500 }));

      await expect(client.health()).resolves.toEqual({
        healthy: false,
        message: 'Failed to connect to retrieval service: HTTP 500: boom',
      });
    });
  });

  describe('HttpVerificationClient', () => {
    const client = new HttpVerificationClient({ baseUrl: 'http://verify.test', timeoutMs: 1000 });

    it('sends base64 descriptors and maps the match', async () => {
      fetchMock.mockResolvedValueOnce(
        json({ accepted: true, shared_area: 0.3, keypoint_count: 41 })
      );

      const result = await client.verifyMatch({
        imageA: 'A',
        imageB: 'B',
        variant: 'cv_sift',
        checkFlip: false,
        descriptors: { a: new Uint8Array([1, 2, 3]), b: new Uint8Array([255]) },
      });

      expect(sentBody()).toEqual({
        image_a: 'A',
        image_b: 'B',
        descriptor_type: 'cv_sift',
        check_flip: false,
        descriptors: { a: 'AQID', b: '/w==' },
      });
      expect(result).toEqual({
        accepted: true,
        sharedArea: 0.3,
        keypointCount: 41,
        isFlipped: false,
      });
    });

    it('rejects negative areas', async () => {
      fetchMock.mockResolvedValueOnce(
        json({ accepted: true, shared_area: -1, keypoint_count: 3 })
      );

      await expect(
        client.verifyMatch({
          imageA: 'A',
          imageB: 'B',
          variant: 'cv_sift',
          checkFlip: true,
          descriptors: { a: new Uint8Array([1]), b: new Uint8Array([2]) },
        })
      ).rejects.toThrow(CollaboratorResponseError);
    });
  });

  describe('HttpDescriptorClient', () => {
    const client = new HttpDescriptorClient({ baseUrl: 'http://desc.test', timeoutMs: 1000 });

    it('decodes the returned blob', async () => {
      fetchMock.mockResolvedValueOnce(json({ descriptor: 'AQID' }));

      const blob = await client.computeDescriptor('A', 'vlfeat_sift_heq');

      expect(sentBody()).toEqual({ image_id: 'A', descriptor_type: 'vlfeat_sift_heq' });
      expect(blob).toEqual(new Uint8Array([1, 2, 3]));
    });
  });

  describe('blob encoding', () => {
    it('encodes views at an offset', () => {
      const backing = new Uint8Array([9, 1, 2, 3, 9]);
      const view = backing.subarray(1, 4);

      expect(encodeBlob(view)).toBe('AQID');
      expect(decodeBlob(encodeBlob(view))).toEqual(new Uint8Array([1, 2, 3]));
    });
  });
});
