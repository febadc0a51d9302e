import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { createReviewRoutes, type ReviewRouteDeps } from './routes/review.routes';

export function createApp(deps: ReviewRouteDeps) {
  const app = new Hono();

  app.use('/*', cors());
  app.use('/*', logger());

  // Health check
  app.get('/', (c) => {
    return c.json({ status: 'ok', message: 'Operational review API is running', storage: deps.storage.kind });
  });

  app.route('/api/reviews', createReviewRoutes(deps));

  return app;
}
