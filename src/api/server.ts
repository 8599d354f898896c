/**
 * HTTP + WebSocket query surface.
 *
 *   GET /health                    store reachability
 *   GET /api/servers               current discovery list
 *   GET /api/servers/:name         one server or 404
 *   GET /api/status                cached snapshot or 404 before the first cycle
 *   GET /api/metrics               resolution=raw|hourly|auto
 *   GET /api/metrics/samples       raw samples (max 7 days)
 *   GET /api/metrics/hourly        hourly rollups
 *   GET /api/metrics/servers       names of servers with stored data
 *   GET /api/metrics/servers/summary  per-server sample range and count
 *   WS  /ws/status                 one ServerStatusUpdate per broadcast cycle
 *   WS  /ws/metrics                one MetricsSample per broadcast cycle
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import websocket from '@fastify/websocket';
import { InvalidRangeError, type QueryService, type RangeQuery, type Resolution } from './query-service.js';
import type { PushHub } from './status-hub.js';
import { PlatformUnavailableError, StoreUnavailableError, describeError } from '../errors.js';
import { debug, warn } from '../logger.js';

export interface ServerDeps {
  queries: QueryService;
  statusHub: PushHub;
  metricsHub: PushHub;
}

interface RangeQuerystring {
  server?: string;
  protocol?: string;
  from: string;
  to: string;
}

interface ResolutionQuerystring extends RangeQuerystring {
  resolution?: Resolution;
}

const rangeProperties = {
  server: { type: 'string' },
  protocol: { type: 'string' },
  from: { type: 'string' },
  to: { type: 'string' },
} as const;

const rangeSchema = {
  querystring: {
    type: 'object',
    required: ['from', 'to'],
    properties: rangeProperties,
  },
} as const;

const resolutionSchema = {
  querystring: {
    type: 'object',
    required: ['from', 'to'],
    properties: {
      ...rangeProperties,
      resolution: { type: 'string', enum: ['raw', 'hourly', 'auto'] },
    },
  },
} as const;

function toRangeQuery(q: RangeQuerystring): RangeQuery {
  return {
    serverName: q.server || undefined,
    protocolKind: q.protocol || undefined,
    from: new Date(q.from),
    to: new Date(q.to),
  };
}

function statusFor(err: FastifyError): number {
  if (err instanceof InvalidRangeError) return 400;
  if (err instanceof PlatformUnavailableError || err instanceof StoreUnavailableError) return 503;
  if (err.validation) return 400;
  // framework errors (bad content type, oversized payload, ...) carry their own 4xx
  if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) return err.statusCode;
  return 500;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { queries, statusHub, metricsHub } = deps;
  const app = Fastify({ logger: false });

  await app.register(websocket);

  app.addHook('onResponse', async (request, reply) => {
    debug(`[HTTP] ${request.method} ${request.url} → ${reply.statusCode}`);
  });

  app.setErrorHandler((err, request, reply) => {
    const status = statusFor(err);
    if (status >= 500) {
      warn(`[HTTP] ${request.method} ${request.url} failed: ${describeError(err)}`);
    }
    void reply.code(status).send({ error: err.message });
  });

  app.get('/ws/status', { websocket: true }, socket => {
    statusHub.add(socket);
    socket.on('close', () => statusHub.remove(socket));
  });

  app.get('/ws/metrics', { websocket: true }, socket => {
    metricsHub.add(socket);
    socket.on('close', () => metricsHub.remove(socket));
  });

  app.get('/health', async (_request, reply) => {
    try {
      await queries.checkStore();
      return { status: 'healthy' };
    } catch (err) {
      return reply.code(503).send({ status: 'unhealthy', error: describeError(err) });
    }
  });

  app.get('/api/servers', async () => queries.listServers());

  app.get<{ Params: { name: string } }>('/api/servers/:name', async (request, reply) => {
    const server = await queries.getServer(request.params.name);
    if (!server) {
      return reply.code(404).send({ error: `Server '${request.params.name}' not found` });
    }
    return server;
  });

  app.get('/api/status', async (_request, reply) => {
    const snapshot = queries.getStatus();
    if (!snapshot) {
      return reply.code(404).send({ error: 'No status available yet' });
    }
    return snapshot;
  });

  app.get<{ Querystring: ResolutionQuerystring }>('/api/metrics', { schema: resolutionSchema }, async request => {
    const range = toRangeQuery(request.query);
    const result = await queries.query(range, request.query.resolution ?? 'auto');
    return {
      resolution: result.resolution,
      rows: result.rows,
      totalCount: result.rows.length,
      queryStart: range.from,
      queryEnd: range.to,
    };
  });

  app.get<{ Querystring: RangeQuerystring }>('/api/metrics/samples', { schema: rangeSchema }, async request => {
    const range = toRangeQuery(request.query);
    const samples = await queries.querySamples(range);
    return { samples, totalCount: samples.length, queryStart: range.from, queryEnd: range.to };
  });

  app.get<{ Querystring: RangeQuerystring }>('/api/metrics/hourly', { schema: rangeSchema }, async request => {
    const range = toRangeQuery(request.query);
    const hourly = await queries.queryHourly(range);
    return { hourly, totalCount: hourly.length, queryStart: range.from, queryEnd: range.to };
  });

  app.get('/api/metrics/servers', async () => queries.listKnownServers());

  app.get('/api/metrics/servers/summary', async () => queries.summarizeServers());

  return app;
}
