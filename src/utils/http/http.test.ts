import { requestWithTimeout, requestJson, requestText, readJsonObject, isRecord, findCookie } from './http';
import { HttpError, RequestTimeoutError } from '$types/errors';

/** 200 response whose body sends a fragment and then never ends */
function stalledResponse(): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"data": ['));
    }
  });
  return new Response(body, { status: 200 });
}

const passThrough = async (response: Response): Promise<Response> => response;

describe('http helpers', () => {
  describe('requestWithTimeout', () => {
    it('should return successful responses and pass the abort signal', async () => {
      const fetchImpl = vi.fn(async () => new Response('{}', { status: 200 }));

      const response = await requestWithTimeout(fetchImpl, 'https://ups.test/x', { method: 'GET' }, 5000, passThrough);

      expect(response.status).toBe(200);
      expect(fetchImpl).toHaveBeenCalledWith(
        'https://ups.test/x',
        expect.objectContaining({ method: 'GET', signal: expect.any(AbortSignal) })
      );
    });

    it('should throw HttpError on non-success status', async () => {
      const fetchImpl = vi.fn(async () => new Response('nope', { status: 401, statusText: 'Unauthorized' }));

      await expect(requestWithTimeout(fetchImpl, 'https://ups.test/x', {}, 5000, passThrough))
        .rejects.toThrow(new HttpError(401, 'Unauthorized'));
    });

    it('should convert an abort into RequestTimeoutError', async () => {
      const fetchImpl = vi.fn((_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const abort = new Error('aborted');
          abort.name = 'AbortError';
          reject(abort);
        });
      }));

      await expect(requestWithTimeout(fetchImpl, 'https://ups.test/x', {}, 10, passThrough))
        .rejects.toBeInstanceOf(RequestTimeoutError);
    });

    it('should rethrow transport errors unchanged', async () => {
      const fetchImpl = vi.fn(async () => {
        throw new TypeError('fetch failed');
      });

      await expect(requestWithTimeout(fetchImpl, 'https://ups.test/x', {}, 5000, passThrough))
        .rejects.toThrow('fetch failed');
    });
  });

  describe('requestJson', () => {
    it('should return the parsed body', async () => {
      const fetchImpl = vi.fn(async () => new Response('{"status":{"switchedOn":true}}', { status: 200 }));

      await expect(requestJson(fetchImpl, 'https://ups.test/x', {}, 5000)).resolves.toEqual({ status: { switchedOn: true } });
    });

    it('should time out when the body stalls after the headers', async () => {
      const fetchImpl = vi.fn(async () => stalledResponse());

      await expect(requestJson(fetchImpl, 'https://ups.test/x', {}, 20)).rejects.toThrow(new RequestTimeoutError(20));
    });

    it('should abort the request signal when the deadline passes', async () => {
      let signal: AbortSignal | null | undefined;
      const fetchImpl = vi.fn(async (_url: string, init?: RequestInit) => {
        signal = init?.signal;
        return stalledResponse();
      });

      await expect(requestJson(fetchImpl, 'https://ups.test/x', {}, 20)).rejects.toBeInstanceOf(RequestTimeoutError);
      expect(signal?.aborted).toBe(true);
    });
  });

  describe('requestText', () => {
    it('should return the body text', async () => {
      const fetchImpl = vi.fn(async () => new Response('xsrf-1', { status: 200 }));

      await expect(requestText(fetchImpl, 'https://vmanage.test/token', {}, 5000)).resolves.toBe('xsrf-1');
    });

    it('should time out when the body stalls', async () => {
      const fetchImpl = vi.fn(async () => stalledResponse());

      await expect(requestText(fetchImpl, 'https://vmanage.test/token', {}, 20)).rejects.toBeInstanceOf(RequestTimeoutError);
    });
  });

  describe('readJsonObject', () => {
    it('should return parsed objects', async () => {
      const body = await readJsonObject(new Response('{"access_token":"test-token"}'));
      expect(body).toEqual({ access_token: 'test-token' });
    });

    it('should reject arrays', async () => {
      await expect(readJsonObject(new Response('[1,2]'))).rejects.toThrow('Expected a JSON object');
    });
  });

  describe('isRecord', () => {
    it('should only accept plain objects', () => {
      expect(isRecord({})).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });

  describe('findCookie', () => {
    it('should find a named cookie among several Set-Cookie headers', () => {
      const headers = new Headers();
      headers.append('Set-Cookie', 'other=1; Path=/');
      headers.append('Set-Cookie', 'JSESSIONID=abc123; Path=/; Secure; HttpOnly');
      const response = new Response('', { status: 200, headers });

      expect(findCookie(response, 'JSESSIONID')).toBe('abc123');
    });

    it('should return null when the cookie is absent', () => {
      expect(findCookie(new Response(''), 'JSESSIONID')).toBeNull();
    });
  });
});
