import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { createHttpEngine } from './http-engine.js';
import type { DownloadProgress } from '../progress/download-progress.js';
import { jsonTransformer } from '../transformers/transformers.js';
import { createFetchTransport } from '../transport/fetch-transport.js';
import { createRecordingLogger, createScriptedTransport, type ScriptedResponse } from '../test/mocks.js';
import {
  AUTHORIZATION_HEADER,
  ENGINE_TOKEN,
  REQUEST_TOKEN,
  TEST_DOWNLOAD_URL,
  TEST_ITEMS_URL,
  TEST_STATUS_URL,
  createBinaryBody,
} from '../test/fixtures.js';

const setup = (scripts: ScriptedResponse | readonly ScriptedResponse[] = {}) => {
  const transport = createScriptedTransport(scripts);
  const engine = createHttpEngine({ transport, tick: transport.tick, env: {} });
  return { transport, engine };
};

describe('createHttpEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('configuration', () => {
    it('resolves defaults when nothing is configured', () => {
      const { engine } = setup();

      expect(engine.config).toEqual({
        timeoutSeconds: 30,
        progressTickMs: 16,
        logLevel: 'silent',
        defaultHeaders: {},
      });
    });

    it('uses the configured timeout for requests without one', async () => {
      const transport = createScriptedTransport();
      const engine = createHttpEngine({ transport, env: { FLUENT_HTTP_TIMEOUT_SECONDS: '7' } });

      await engine.make(TEST_STATUS_URL).send();

      expect(transport.requests[0]?.timeoutMs).toBe(7000);
    });

    it('throws for invalid configuration', () => {
      expect(() => createHttpEngine({ progressTickMs: -1, env: {} })).toThrow(
        /progressTickMs/
      );
    });

    it('seeds default headers from options', () => {
      const engine = createHttpEngine({
        transport: createScriptedTransport(),
        defaultHeaders: { Accept: 'application/json' },
        env: {},
      });

      expect(engine.getDefaultHeaders()).toEqual({ Accept: 'application/json' });
      expect(engine.make(TEST_STATUS_URL).getAllHeaders()).toEqual({ Accept: 'application/json' });
    });

    it('logs through the injected logger', async () => {
      const transport = createScriptedTransport({ body: 'ok' });
      const logger = createRecordingLogger();
      const engine = createHttpEngine({ transport, logger, env: {} });

      await engine.make(TEST_STATUS_URL).send();

      expect(logger.lines.map((line) => line.message)).toEqual([
        'Dispatching request',
        'Request completed',
      ]);
    });

    it('writes to the console at the configured level', async () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const transport = createScriptedTransport({ outcome: 'protocol-error', status: 503 });
      const engine = createHttpEngine({ transport, logLevel: 'warn', env: {} });

      await engine.make(TEST_STATUS_URL).send();

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0]?.[0]).toBe('[fluent-http] WARN Request failed');
    });
  });

  describe('default headers', () => {
    it('addHeader overwrites an existing default', () => {
      const { engine } = setup();

      engine.addHeader(AUTHORIZATION_HEADER, ENGINE_TOKEN);
      engine.addHeader(AUTHORIZATION_HEADER, REQUEST_TOKEN);

      expect(engine.getDefaultHeaders()).toEqual({ [AUTHORIZATION_HEADER]: REQUEST_TOKEN });
    });

    it('removeHeader drops a default', () => {
      const { engine } = setup();
      engine.addHeader(AUTHORIZATION_HEADER, ENGINE_TOKEN);

      engine.removeHeader(AUTHORIZATION_HEADER);

      expect(engine.getDefaultHeaders()).toEqual({});
    });

    it('removeHeader for an absent key changes nothing', () => {
      const { engine } = setup();
      engine.addHeader('Accept', 'application/json');

      expect(() => {
        engine.removeHeader('X-Never-Added');
      }).not.toThrow();
      expect(engine.getDefaultHeaders()).toEqual({ Accept: 'application/json' });
    });

    it('applies defaults changed after the request was made', async () => {
      const { engine, transport } = setup();
      const request = engine.make(TEST_STATUS_URL);

      engine.addHeader('X-Trace', 'on');
      await request.send();

      expect(transport.requests[0]?.headers).toEqual({ 'X-Trace': 'on' });
    });

    it('returns a copy from getDefaultHeaders', () => {
      const { engine } = setup();
      const headers = engine.getDefaultHeaders();

      headers['Accept'] = 'text/plain';

      expect(engine.getDefaultHeaders()).toEqual({});
    });
  });

  describe('scenarios', () => {
    it('request header overrides the engine default of the same name', async () => {
      const { engine, transport } = setup();
      engine.addHeader(AUTHORIZATION_HEADER, 'Bearer X');

      const request = engine.make(TEST_STATUS_URL).setHeader(AUTHORIZATION_HEADER, 'Bearer Y');
      await request.send();

      expect(request.getAllHeaders()[AUTHORIZATION_HEADER]).toBe('Bearer Y');
      expect(transport.requests[0]?.headers).toEqual({ [AUTHORIZATION_HEADER]: 'Bearer Y' });
    });

    it('request header replaces a default that differs only in case', async () => {
      const fetchMock = vi.fn(
        (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
          Promise.resolve(new Response('ok'))
      );
      const engine = createHttpEngine({
        transport: createFetchTransport({ fetch: fetchMock }),
        env: {},
      });
      engine.addHeader('authorization', 'Bearer X');

      await engine.make(TEST_STATUS_URL).setHeader(AUTHORIZATION_HEADER, 'Bearer Y').send();

      const sent = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
      expect(sent.get('authorization')).toBe('Bearer Y');
    });

    it('GET returning 200 "ok" yields a string response of "ok"', async () => {
      const { engine } = setup({ status: 200, body: 'ok' });

      const result = await engine.make(TEST_STATUS_URL).send();

      expect(result._unsafeUnwrap().rawResponse).toBe('ok');
    });

    it('GET returning 404 without a handler yields an http failure', async () => {
      const { engine } = setup({ outcome: 'protocol-error', status: 404, body: 'not found' });

      const result = await engine.make(TEST_STATUS_URL).send();

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('http');
      expect(error).toMatchObject({ status: 404, content: 'not found' });
    });

    it('POST with a JSON transformer sends the serialized body, GET sends none', async () => {
      const { engine, transport } = setup();

      await engine
        .make(TEST_ITEMS_URL)
        .setMethod('POST')
        .setTransformer(jsonTransformer)
        .setBody({ id: 1 })
        .send();
      await engine.make(TEST_ITEMS_URL).send();

      expect(new TextDecoder().decode(transport.requests[0]?.body)).toBe('{"id":1}');
      expect(transport.requests[1]).not.toHaveProperty('body');
    });

    it('download without Content-Length reports an unknown total throughout', async () => {
      const body = createBinaryBody(48);
      const { engine } = setup({
        body,
        frames: [{ downloadedBytes: 0 }, { downloadedBytes: 16 }, { downloadedBytes: 32 }],
      });
      const snapshots: DownloadProgress[] = [];

      const result = await engine
        .make(TEST_DOWNLOAD_URL)
        .setProgressCallback((progress) => snapshots.push(progress))
        .setProgressByteOutput()
        .send();

      const response = result._unsafeUnwrap();
      expect(snapshots.every((snapshot) => snapshot.totalBytes === 0)).toBe(true);
      expect(snapshots.map((snapshot) => snapshot.bytesDownloaded)).toEqual([0, 16, 32, 48]);
      expect(snapshots.at(-1)?.bytesDownloaded).toBe(response.rawResponse.byteLength);
      expect(response.totalBytes).toBe(0);
      expect(response.downloadedBytes).toBe(48);
    });
  });

  describe('independent dispatches', () => {
    it('completes concurrent requests separately', async () => {
      const { engine } = setup([{ body: 'one' }, { body: 'two' }]);

      const [first, second] = await Promise.all([
        engine.make(TEST_STATUS_URL).send(),
        engine.make(TEST_ITEMS_URL).send(),
      ]);

      expect(first._unsafeUnwrap().rawResponse).toBe('one');
      expect(second._unsafeUnwrap().rawResponse).toBe('two');
    });
  });

  describe('binding a JSON response', () => {
    it('parses the body against a schema', async () => {
      const { engine } = setup({ body: '{"id":1,"name":"widget"}' });

      const result = await engine.make(TEST_ITEMS_URL).send();

      const item = result
        ._unsafeUnwrap()
        .parse(z.object({ id: z.number(), name: z.string() }));
      expect(item._unsafeUnwrap()).toEqual({ id: 1, name: 'widget' });
    });
  });
});
