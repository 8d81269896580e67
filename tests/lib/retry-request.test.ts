import { Dispatcher, MockAgent, errors } from 'undici';
import {
  RetryingRequestExecutor,
  backoffDelayMs,
  classifyTransportError,
} from '../../src/lib/retry-request.js';

const ORIGIN = 'https://shop.test';
const searchPath = (path: string) => path.startsWith('/search');

/** First response sends headers then fails while the body is streaming; later ones succeed. */
class BodyFailingDispatcher extends Dispatcher {
  calls = 0;

  dispatch(_options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    this.calls += 1;
    const failBody = this.calls === 1;
    setImmediate(() => {
      handler.onConnect?.(() => undefined);
      handler.onHeaders?.(200, [], () => undefined, 'OK');
      if (failBody) {
        setTimeout(() => handler.onError?.(new errors.BodyTimeoutError()), 10);
        return;
      }
      handler.onData?.(Buffer.from('{"ok":true}'));
      handler.onComplete?.([]);
    });
    return true;
  }
}

describe('retry-request', () => {
  let agent: MockAgent;
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    sleep = jest.fn((_ms: number) => Promise.resolve());
  });

  afterEach(async () => {
    await agent.close();
  });

  function executor(backoffFactor = 1, maxRetries = 3) {
    return new RetryingRequestExecutor({ maxRetries, backoffFactor, timeoutMs: 1_000, dispatcher: agent, sleep });
  }

  describe('backoffDelayMs', () => {
    it('doubles per attempt and scales by the factor', () => {
      expect([0, 1, 2].map((i) => backoffDelayMs(i, 1))).toEqual([1000, 2000, 4000]);
      expect(backoffDelayMs(1, 0.5)).toBe(1000);
    });
  });

  describe('classifyTransportError', () => {
    it('classifies undici timeouts as timeout', () => {
      expect(classifyTransportError(new errors.HeadersTimeoutError())).toBe('timeout');
      expect(classifyTransportError(new errors.BodyTimeoutError())).toBe('timeout');
    });

    it('classifies socket level codes as network', () => {
      expect(classifyTransportError(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }))).toBe('network');
      expect(classifyTransportError(new Error('wrapped', { cause: { code: 'ECONNRESET' } }))).toBe('network');
    });

    it('classifies anything else as unexpected', () => {
      expect(classifyTransportError(new Error('boom'))).toBe('unexpected');
      expect(classifyTransportError('string failure')).toBe('unexpected');
    });
  });

  describe('execute', () => {
    it('retries 503 twice then succeeds, sleeping 1x and 2x the factor', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: searchPath, method: 'GET' }).reply(503, '');
      pool.intercept({ path: searchPath, method: 'GET' }).reply(503, '');
      pool.intercept({ path: searchPath, method: 'GET' }).reply(200, { Products: [] });

      const result = await executor(0.5).execute({ url: `${ORIGIN}/search`, params: { q: 'milk' } });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.data).toEqual({ Products: [] });
        expect(result.status).toBe(200);
      }
      expect(sleep.mock.calls).toEqual([[500], [1000]]);
      expect(result.attempts.map((a) => a.outcome)).toEqual(['retryable-failure', 'retryable-failure', 'success']);
      expect(result.attempts.map((a) => a.retryDelayMs)).toEqual([500, 1000, undefined]);
    });

    it('gives up after maxRetries attempts of 500 without throwing', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: searchPath, method: 'GET' }).reply(500, '').times(3);

      const result = await executor().execute({ url: `${ORIGIN}/search` });

      expect(result).toMatchObject({ ok: false, reason: 'retryable-status-exhausted', status: 500 });
      expect(result.attempts).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('does not retry a non-retryable status', async () => {
      agent.get(ORIGIN).intercept({ path: searchPath, method: 'GET' }).reply(404, 'missing');

      const result = await executor().execute({ url: `${ORIGIN}/search` });

      expect(result).toMatchObject({ ok: false, reason: 'terminal-status', status: 404 });
      expect(result.attempts).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('treats an unparseable 200 body as terminal', async () => {
      agent.get(ORIGIN).intercept({ path: searchPath, method: 'GET' }).reply(200, 'not json{');

      const result = await executor().execute({ url: `${ORIGIN}/search` });

      expect(result).toMatchObject({ ok: false, reason: 'parse-failure', status: 200 });
      expect(result.attempts).toHaveLength(1);
    });

    it('retries network errors on the same schedule', async () => {
      const pool = agent.get(ORIGIN);
      pool
        .intercept({ path: searchPath, method: 'GET' })
        .replyWithError(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));
      pool.intercept({ path: searchPath, method: 'GET' }).reply(200, { ok: true });

      const result = await executor().execute({ url: `${ORIGIN}/search` });

      expect(result.ok).toBe(true);
      expect(result.attempts.map((a) => a.outcome)).toEqual(['network-error', 'success']);
      expect(sleep.mock.calls).toEqual([[1000]]);
    });

    it('reports timeout once every attempt timed out', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: searchPath, method: 'GET' })
        .replyWithError(new errors.HeadersTimeoutError())
        .times(2);

      const result = await executor(1, 2).execute({ url: `${ORIGIN}/search` });

      expect(result).toMatchObject({ ok: false, reason: 'timeout' });
      expect(result.attempts.map((a) => a.outcome)).toEqual(['timeout', 'timeout']);
      expect(sleep.mock.calls).toEqual([[1000]]);
    });

    it('fails fast on an unexpected error', async () => {
      agent.get(ORIGIN).intercept({ path: searchPath, method: 'GET' }).replyWithError(new Error('boom'));

      const result = await executor().execute({ url: `${ORIGIN}/search` });

      expect(result).toMatchObject({ ok: false, reason: 'unexpected', error: 'boom' });
      expect(result.attempts).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('sends the query parameters', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/search', method: 'GET', query: { searchTerm: 'milk 2L', pageSize: '36' } })
        .reply(200, []);

      const result = await executor().execute({
        url: `${ORIGIN}/search`,
        params: { searchTerm: 'milk 2L', pageSize: 36 },
        headers: { Accept: 'application/json' },
      });

      expect(result.ok).toBe(true);
    });

    it('retries a 200 whose body times out mid-read', async () => {
      const dispatcher = new BodyFailingDispatcher();
      const ex = new RetryingRequestExecutor({ maxRetries: 3, backoffFactor: 1, timeoutMs: 1_000, dispatcher, sleep });

      const result = await ex.execute({ url: `${ORIGIN}/search` });

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.data).toEqual({ ok: true });
      expect(result.attempts.map((a) => a.outcome)).toEqual(['timeout', 'success']);
      expect(dispatcher.calls).toBe(2);
      expect(sleep.mock.calls).toEqual([[1000]]);
    });

    it('stops retrying once the signal aborts during a backoff sleep', async () => {
      let calls = 0;
      agent
        .get(ORIGIN)
        .intercept({ path: '/search', method: 'GET' })
        .reply(503, () => {
          calls += 1;
          return '';
        })
        .persist();
      const controller = new AbortController();
      const ex = new RetryingRequestExecutor({ maxRetries: 3, backoffFactor: 1, timeoutMs: 1_000, dispatcher: agent });

      const pending = ex.execute({ url: `${ORIGIN}/search`, signal: controller.signal });
      setTimeout(() => controller.abort(), 20);
      const result = await pending;

      expect(result).toMatchObject({ ok: false, reason: 'aborted', status: 503 });
      expect(result.attempts.map((a) => a.outcome)).toEqual(['retryable-failure']);
      expect(calls).toBe(1);
    });

    it('makes no request when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await executor().execute({ url: `${ORIGIN}/search`, signal: controller.signal });

      expect(result).toEqual({ ok: false, reason: 'aborted', attempts: [] });
    });
  });
});
