import express, { type Application, type RequestHandler, type Router } from 'express';
import type { DataEngine } from '@automap/core';
import { DefaultRouteConfig, type RouteConfig } from './routes';
import { createContextMiddleware, createErrorHandler, type ContextMiddlewareOptions } from './middleware';
import { registerHealthRoutes, registerModelRoutes, registerRecordRoutes } from './handlers';

/**
 * Options for mounting the data API.
 */
export interface DataApiOptions {
  /** Route prefix (default: '') */
  prefix?: string;
  /** Route groups to register; unset groups follow DefaultRouteConfig */
  routes?: RouteConfig;
  /** Context middleware options */
  context?: ContextMiddlewareOptions;
  /** Additional middleware applied before the automap routes */
  middleware?: RequestHandler[];
}

/**
 * Mount the automap HTTP API on an Express application.
 *
 * ```typescript
 * const app = express();
 * const engine = DataEngine.fromDirectory('./models', new MemoryStorageBackend());
 * mountDataApi(app, engine, { context: { getNamespace: req => req.get('x-tenant') } });
 * app.listen(3000);
 * ```
 *
 * Routes:
 * - POST /api/models/:model/records, GET /api/models/:model/records
 * - GET|PATCH|DELETE /api/models/:model/records/:id
 * - POST /api/models/:model/query, POST /api/models/:model/count
 * - GET /api/models, GET /api/models/:model, GET /api/namespaces
 * - GET /health, GET /ready
 */
export function mountDataApi(app: Application, engine: DataEngine, options: DataApiOptions = {}): Router {
  const { prefix = '', middleware = [], context } = options;
  const routes = { ...DefaultRouteConfig, ...options.routes };

  const router = express.Router();
  router.use(express.json());

  // Apply context middleware
  router.use(createContextMiddleware(engine, context));

  // Apply custom middleware
  for (const mw of middleware) {
    router.use(mw);
  }

  if (routes.records) {
    registerRecordRoutes(router);
  }

  if (routes.models) {
    registerModelRoutes(router);
  }

  if (routes.health) {
    registerHealthRoutes(router);
  }

  router.use(createErrorHandler());

  app.use(prefix, router);
  return router;
}
