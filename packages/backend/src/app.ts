import express from 'express';
import { logging_middleware } from './middleware/logging.js';
import { error_middleware } from './middleware/error.js';
import health_router from './routes/health.js';
import conferences_router from './routes/conferences.js';
import cfps_router from './routes/cfps.js';

export function create_app(): express.Application {
  const app = express();

  // Before the body parser so a malformed body still reaches error_middleware with req.log set
  app.use(logging_middleware);
  app.use(express.json());

  // Public routes
  app.use('/api', health_router);

  // Conference routes
  app.use('/api', conferences_router);

  // Cfp routes
  app.use('/api', cfps_router);

  app.use(error_middleware);

  return app;
}
