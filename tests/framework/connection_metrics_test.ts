/**
 * Connection Metrics Tests
 */

import { beforeEach, expect, test, vi } from 'vitest';

import { Connection } from '../../framework/http/connection.ts';
import { Router } from '../../framework/router/router.ts';
import { recordHttpRequest } from '../../framework/telemetry/otel.ts';
import { FakeSocket, MemoryFileSystem, silentLogger } from '../helpers.ts';

vi.mock('../../framework/telemetry/otel.ts', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../framework/telemetry/otel.ts')>();
  return { ...actual, recordHttpRequest: vi.fn() };
});

const recorded = vi.mocked(recordHttpRequest);

beforeEach(() => {
  recorded.mockClear();
});

function metricsRouter(): Router {
  const router = new Router({
    logger: silentLogger(),
    fileSystem: new MemoryFileSystem({ '/srv/public/app.css': 'body {}' }),
  });
  router.serveStatic('/static', '/srv/public');
  router.get('/hello', (_req, res) => {
    res.text('Hello');
  });
  router.get('/boom', () => {
    throw new Error('kaboom');
  });
  return router;
}

async function serve(requestLine: string): Promise<void> {
  const socket = new FakeSocket();
  const connection = new Connection(socket, metricsRouter(), { logger: silentLogger() });
  const served = connection.serve();
  socket.receive(`${requestLine}\r\n\r\n`);
  await served;
}

test('Connection metrics - explicit route is labelled by its registered path', async () => {
  await serve('GET /hello/ HTTP/1.1');

  expect(recorded).toHaveBeenCalledTimes(1);
  expect(recorded.mock.calls[0][0]).toMatchObject({
    method: 'GET',
    route: '/hello',
    statusCode: 200,
  });
});

test('Connection metrics - static files share the mount prefix', async () => {
  await serve('GET /static/app.css HTTP/1.1');

  expect(recorded.mock.calls[0][0]).toMatchObject({ route: '/static', statusCode: 200 });
});

test('Connection metrics - unknown paths share one label', async () => {
  await serve('GET /missing/123 HTTP/1.1');
  await serve('GET /missing/456 HTTP/1.1');

  expect(recorded.mock.calls.map(([attrs]) => attrs.route)).toEqual(['unmatched', 'unmatched']);
  expect(recorded.mock.calls.map(([attrs]) => attrs.statusCode)).toEqual([404, 404]);
});

test('Connection metrics - failing handler keeps its route label', async () => {
  await serve('GET /boom HTTP/1.1');

  expect(recorded.mock.calls[0][0]).toMatchObject({ route: '/boom', statusCode: 500 });
});
