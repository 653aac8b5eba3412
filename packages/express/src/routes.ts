/**
 * Type-safe route definitions for the automap HTTP API.
 */

/**
 * API route definitions.
 */
export const Routes = {
  // ── Record Routes ───────────────────────────────────────────────────
  /**
   * GET  /api/models/:model/records  list records (limit, offset, orderBy, direction)
   * POST /api/models/:model/records  create a record
   */
  Records: '/api/models/:model/records',

  /**
   * GET    /api/models/:model/records/:id
   * PATCH  /api/models/:model/records/:id
   * DELETE /api/models/:model/records/:id
   */
  Record: '/api/models/:model/records/:id',

  /**
   * POST /api/models/:model/query
   * Filtered query with a JSON body.
   */
  QueryRecords: '/api/models/:model/query',

  /**
   * POST /api/models/:model/count
   * Count records matching a filter body.
   */
  CountRecords: '/api/models/:model/count',

  // ── Model Routes ────────────────────────────────────────────────────
  /**
   * GET /api/models
   * List registered model schemas.
   */
  ListModels: '/api/models',

  /**
   * GET /api/models/:model
   * Schema of one model.
   */
  GetModel: '/api/models/:model',

  /**
   * GET /api/namespaces
   * Namespaces holding data.
   */
  ListNamespaces: '/api/namespaces',

  // ── Health Routes ───────────────────────────────────────────────────
  Health: '/health',

  /**
   * GET /ready
   * Checks the storage backend answers.
   */
  Ready: '/ready',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];

/**
 * Helper to build a route with parameters.
 *
 * @example
 * ```typescript
 * buildRoute(Routes.Record, { model: 'users', id: '7' });
 * // => '/api/models/users/records/7'
 * ```
 */
export function buildRoute(route: string, params: Record<string, string> = {}): string {
  let result = route;
  for (const [key, value] of Object.entries(params)) {
    result = result.replace(`:${key}`, encodeURIComponent(value));
  }
  return result;
}

/**
 * Route configuration for enabling/disabling route groups.
 */
export interface RouteConfig {
  /** Record CRUD, query and count routes */
  records?: boolean;
  /** Model and namespace listing */
  models?: boolean;
  /** Health and readiness checks */
  health?: boolean;
}

/**
 * Default route configuration - all enabled.
 */
export const DefaultRouteConfig: Required<RouteConfig> = {
  records: true,
  models: true,
  health: true,
};
