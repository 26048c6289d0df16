import { type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

/** A request as the fake server saw it. */
export type RecordedRequest = {
  method: string;
  path: string;
  query: string;
  headers: Record<string, string>;
  body: string;
};

export type E2EServer = {
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  requests: () => RecordedRequest[];
  uploads: () => Map<string, string>;
  setMaintenance: (on: boolean) => void;
};

const unavailable = { error: { code: 'unavailable', message: 'maintenance' } };
const notFound = { error: { code: 'not_found', message: 'no such token' } };

/**
 * Starts a fake Releasy server on a random local port. It answers a fixed
 * subset of the API and records every request it receives.
 */
export async function startE2EServer(): SafeWrapAsync<Error, E2EServer> {
  const recorded: RecordedRequest[] = [];
  const uploaded = new Map<string, string>();
  let maintenance = false;
  const app = new Hono();

  app.use('*', async (c, next) => {
    const url = new URL(c.req.url);
    recorded.push({
      method: c.req.method,
      path: url.pathname,
      query: url.search,
      headers: c.req.header(),
      body: await c.req.raw.clone().text(),
    });
    await next();
  });

  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.get('/live', (c) => c.json({ status: 'ok' }));
  app.get('/ready', (c) => (maintenance ? c.json(unavailable, 503) : c.json({ status: 'ready' })));

  app.get('/v1/admin/customers', (c) =>
    c.json({
      customers: [{ id: 'c-1', name: 'Acme', created_at: 1700000000, plan: 'pro', suspended_at: null }],
      limit: Number(c.req.query('limit') ?? '50'),
      offset: Number(c.req.query('offset') ?? '0'),
    }),
  );

  app.post('/v1/admin/customers', async (c) => {
    const [err, body] = await safeWrapAsync(() => c.req.json<{ name?: unknown; plan?: unknown }>());
    if (err || typeof body.name !== 'string') {
      return c.json({ error: { code: 'bad_request', message: 'name is required' } }, 400);
    }

    return c.json({ id: 'c-2', name: body.name, plan: body.plan ?? null, created_at: 1700000001 }, 201);
  });

  app.post('/v1/admin/users/:user_id/reset-credentials', (c) => c.body(null, 202));

  app.delete('/v1/releases/:release_id', (c) => c.body(null, 204));

  app.post('/v1/releases/:release_id/publish', (c) =>
    c.json({
      id: c.req.param('release_id'),
      product: 'cli',
      version: '1.0.0',
      status: 'published',
      created_at: 1700000000,
      published_at: 1700000100,
    }),
  );

  app.get('/v1/downloads/:token', (c) => {
    switch (c.req.param('token')) {
      case 'with-location':
        return c.redirect('https://example/obj', 302);
      case 'without-location':
        return c.body(null, 302);
      default:
        return c.json(notFound, 404);
    }
  });

  app.put('/uploads/:name', async (c) => {
    uploaded.set(c.req.param('name'), await c.req.text());
    return c.body(null, 200);
  });

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}`,
      reset: () => {
        recorded.length = 0;
        uploaded.clear();
        maintenance = false;
      },
      requests: () => structuredClone(recorded),
      uploads: () => new Map(uploaded),
      setMaintenance: (on) => {
        maintenance = on;
      },
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
