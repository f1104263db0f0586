import { type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

export type FakeGateway = {
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  getCounts: () => Record<string, number>;
};

export type FakeGatewayOptions = {
  /** Key the gateway accepts. */
  apiKey: string;
  /** Delay before `get_stream_viewers` answers, in milliseconds. */
  slowDelay: number;
};

/**
 * Starts an in-process stand-in for the RapidAPI gateway on a random local port.
 */
export async function startFakeGateway(opts: FakeGatewayOptions): SafeWrapAsync<Error, FakeGateway> {
  const counts: Record<string, number> = {};
  const app = new Hono();

  function increment(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  app.use('*', async (c, next) => {
    if (c.req.header('x-rapidapi-host') !== 'twitch-api8.p.rapidapi.com') {
      return c.json({ message: 'unknown host' }, 400);
    }

    if (c.req.header('x-rapidapi-key') !== opts.apiKey) {
      return c.json({ message: 'You are not subscribed to this API.' }, 403);
    }

    increment(c.req.path);
    await next();
  });

  app.get('/get_streamer_info', (c) => {
    const channel = c.req.query('channel');
    if (channel === 'nobody') {
      return c.json({ message: 'channel not found' }, 404);
    }

    return c.json({ user: { id: '123', login: channel, displayName: 'Ninja' } });
  });

  app.get('/get_viewer_card', (c) => {
    return c.json({ channel: c.req.query('channel'), username: c.req.query('username'), badges: [] });
  });

  app.get('/get_pinned_chat', (c) => {
    return c.text('not-json');
  });

  app.get('/get_stream_viewers', async (c) => {
    await new Promise((resolve) => setTimeout(resolve, opts.slowDelay));
    return c.json({ viewers: 42 });
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
    return [new Error('error starting fake gateway', { cause: errServer }), null];
  }

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}`,
      reset: () => {
        for (const k of Object.keys(counts)) {
          delete counts[k];
        }
      },
      getCounts: () => structuredClone(counts),
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing fake gateway', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
