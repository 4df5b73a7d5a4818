import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { leagueRoutes } from './routes/league';
import { toErrorResponse } from './lib/errors';
import type { ApiConfig } from './lib/config';
import type { LeagueSession } from './lib/session';

export type AppEnv = {
  Variables: {
    session: LeagueSession;
  };
};

export interface CreateAppOptions {
  session: LeagueSession;
  environment: ApiConfig['environment'];
}

export function createApp({ session, environment }: CreateAppOptions) {
  const app = new Hono<AppEnv>();

  // Global middleware
  if (environment !== 'test') {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: ['http://localhost:3000', 'http://localhost:5173'],
    }),
  );
  app.use('*', async (c, next) => {
    c.set('session', session);
    await next();
  });

  // Health check
  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      environment,
      timestamp: new Date().toISOString(),
    });
  });

  // Mount routes
  app.route('/api/league', leagueRoutes);

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not Found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    const { status, body } = toErrorResponse(
      err,
      environment === 'development',
    );
    if (status === 500) {
      console.error('Unhandled error:', err);
    } else {
      console.warn('league.request.rejected', {
        path: c.req.path,
        status,
        code: body.code,
      });
    }
    return c.json(body, status);
  });

  return app;
}

// Export type for Hono RPC client
export type AppType = ReturnType<typeof createApp>;
