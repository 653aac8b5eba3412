/**
 * Express route handlers for automap.
 */

import type { Router, Request, Response } from 'express';
import Ajv from 'ajv';
import {
  NotFoundError,
  type FilterCriteria,
  type ModelSchema,
  type OrderBy,
  type QueryOptions,
  type RecordId,
} from '@automap/core';
import { Routes } from './routes';
import { RequestError, asyncHandler, requireAutomapContext } from './middleware';

const ajv = new Ajv({ allErrors: true });

interface QueryBody {
  filter?: FilterCriteria;
  orderBy?: OrderBy;
  limit?: number;
  offset?: number;
}

const queryBodySchema = {
  type: 'object',
  properties: {
    filter: { type: 'object' },
    orderBy: {
      type: 'object',
      properties: {
        field: { type: 'string' },
        direction: { type: 'string', enum: ['asc', 'desc'] },
      },
      required: ['field', 'direction'],
      additionalProperties: false,
    },
    limit: { type: 'integer', minimum: 0 },
    offset: { type: 'integer', minimum: 0 },
  },
  additionalProperties: false,
};

const validateQueryBody = ajv.compile<QueryBody>(queryBodySchema);

function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON request body as field values */
function bodyValues(req: Request): { [field: string]: unknown } {
  const body: unknown = req.body;
  if (!isObject(body)) throw new RequestError('Request body must be a JSON object');
  return body;
}

function queryBody(req: Request): QueryBody {
  const body: unknown = req.body ?? {};
  if (!validateQueryBody(body)) {
    throw new RequestError(`Invalid query: ${ajv.errorsText(validateQueryBody.errors)}`, validateQueryBody.errors);
  }
  return body;
}

/**
 * Path ids arrive as strings; digits become numbers for numeric identifiers.
 */
export function parseRecordId(schema: ModelSchema, raw: string): RecordId {
  const field = schema.fields.find(f => f.name === schema.identifier);
  if (field?.type !== 'text' && /^\d+$/.test(raw)) return Number(raw);
  return raw;
}

function queryParam(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' ? value : undefined;
}

function integerParam(req: Request, key: string): number | undefined {
  const raw = queryParam(req, key);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) throw new RequestError(`"${key}" must be a non-negative integer`);
  return Number(raw);
}

/** Paging and ordering from ?limit=&offset=&orderBy=&direction= */
function listOptions(req: Request): QueryOptions {
  const field = queryParam(req, 'orderBy');
  const direction = queryParam(req, 'direction') ?? 'asc';
  if (direction !== 'asc' && direction !== 'desc') {
    throw new RequestError('"direction" must be "asc" or "desc"');
  }

  return {
    orderBy: field === undefined ? undefined : { field, direction },
    limit: integerParam(req, 'limit'),
    offset: integerParam(req, 'offset'),
  };
}

/**
 * Register record routes (CRUD, query, count).
 */
export function registerRecordRoutes(router: Router): void {
  // POST /api/models/:model/records - Create a record
  router.post(
    Routes.Records,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      const { scope } = req.automap;

      const response = await scope.execute({ action: 'create', model: req.params.model, values: bodyValues(req) });
      res.status(201).json(response);
    })
  );

  // GET /api/models/:model/records - List records
  router.get(
    Routes.Records,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      const { scope } = req.automap;

      const response = await scope.execute({ action: 'query', model: req.params.model, options: listOptions(req) });
      res.json(response);
    })
  );

  // GET /api/models/:model/records/:id - Get a record
  router.get(
    Routes.Record,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      const { engine, scope } = req.automap;
      const { model } = req.params;
      const id = parseRecordId(engine.registry.resolve(model), req.params.id);

      const response = await scope.execute({ action: 'get', model, id });
      if (response.action === 'get' && !response.record) throw new NotFoundError(model, id);
      res.json(response);
    })
  );

  // PATCH /api/models/:model/records/:id - Update a record
  router.patch(
    Routes.Record,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      const { engine, scope } = req.automap;
      const { model } = req.params;
      const id = parseRecordId(engine.registry.resolve(model), req.params.id);

      const response = await scope.execute({ action: 'update', model, id, values: bodyValues(req) });
      res.json(response);
    })
  );

  // DELETE /api/models/:model/records/:id - Delete a record
  router.delete(
    Routes.Record,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      const { engine, scope } = req.automap;
      const { model } = req.params;
      const id = parseRecordId(engine.registry.resolve(model), req.params.id);

      const response = await scope.execute({ action: 'delete', model, id });
      res.json(response);
    })
  );

  // POST /api/models/:model/query - Filtered query
  router.post(
    Routes.QueryRecords,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      const { scope } = req.automap;
      const { filter, ...options } = queryBody(req);

      const response = await scope.execute({ action: 'query', model: req.params.model, filter, options });
      res.json(response);
    })
  );

  // POST /api/models/:model/count - Count matching records
  router.post(
    Routes.CountRecords,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      const { scope } = req.automap;
      const { filter } = queryBody(req);

      const response = await scope.execute({ action: 'count', model: req.params.model, filter });
      res.json(response);
    })
  );
}

/**
 * Register model and namespace listing routes.
 */
export function registerModelRoutes(router: Router): void {
  // GET /api/models - List model schemas
  router.get(Routes.ListModels, (req: Request, res: Response) => {
    requireAutomapContext(req);
    res.json({ models: req.automap.engine.registry.schemas() });
  });

  // GET /api/models/:model - One schema
  router.get(Routes.GetModel, (req: Request, res: Response) => {
    requireAutomapContext(req);
    res.json({ model: req.automap.engine.registry.resolve(req.params.model) });
  });

  // GET /api/namespaces - Namespaces holding data
  router.get(
    Routes.ListNamespaces,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);
      res.json({ namespaces: await req.automap.engine.backend.namespaces() });
    })
  );
}

/**
 * Register health check routes.
 */
export function registerHealthRoutes(router: Router): void {
  // GET /health - Basic health check
  router.get(Routes.Health, (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  // GET /ready - Readiness check (storage backend answers)
  router.get(
    Routes.Ready,
    asyncHandler(async (req: Request, res: Response) => {
      requireAutomapContext(req);

      const checks: Record<string, 'ok' | 'error'> = {};
      try {
        await req.automap.engine.backend.namespaces();
        checks.backend = 'ok';
      } catch (err) {
        console.error('automap readiness check failed:', err);
        checks.backend = 'error';
      }

      const isReady = Object.values(checks).every(status => status === 'ok');

      res.status(isReady ? 200 : 503).json({
        ready: isReady,
        checks,
        timestamp: new Date().toISOString(),
      });
    })
  );
}
