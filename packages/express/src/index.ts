/**
 * @automap/express - Express integration for the automap data engine.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { DataEngine } from '@automap/core';
 * import { createPgBackend } from '@automap/postgres';
 * import { mountDataApi } from '@automap/express';
 *
 * const { backend } = await createPgBackend({ connectionString: process.env.DATABASE_URL });
 * const engine = DataEngine.fromDirectory('./models', backend);
 *
 * const app = express();
 * mountDataApi(app, engine, { prefix: '/data' });
 * app.listen(3000);
 * ```
 */

// Mounting
export { mountDataApi, type DataApiOptions } from './mount';

// Routes
export { Routes, buildRoute, DefaultRouteConfig } from './routes';
export type { RouteName, RoutePath, RouteConfig } from './routes';

// Middleware
export {
  createContextMiddleware,
  createErrorHandler,
  asyncHandler,
  requireAutomapContext,
  RequestError,
  STATUS_BY_CODE,
  NAMESPACE_HEADER,
} from './middleware';
export type { AutomapContext, ContextMiddlewareOptions, ErrorResponse } from './middleware';

// Route handlers (for custom routing)
export { registerRecordRoutes, registerModelRoutes, registerHealthRoutes, parseRecordId } from './handlers';
