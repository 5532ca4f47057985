/**
 * RSS Downloader HTTP API Server
 */

import Fastify from 'fastify';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import {
  ApiRateLimiter,
  createAuthHook,
  createLogger,
  createRateLimitHook,
  errorMessage,
  loadSecurityConfig,
  validateId,
  validatePagination,
} from '@rss-downloader/utils';
import type { SecurityConfig } from '@rss-downloader/utils';
import {
  ConfigValidationError,
  DownloaderError,
  InvalidRecordError,
  ItemNotFoundError,
} from './errors.js';
import { DownloadQuerySchema, DownloaderTypeSchema, RedownloadBodySchema, formatIssues } from './schemas.js';
import type { DownloadQuery } from './schemas.js';
import type { Services } from './services.js';
import type { DownloadSearchFilters } from './types.js';

const logger = createLogger('rss-downloader:server');

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ConfigPatchSchema = z.record(z.string(), z.unknown());

interface IdParams {
  id: string;
}

interface NameParams {
  name: string;
}

export interface ServerOptions {
  host: string;
  port: number;
  /** Overrides RSS_DOWNLOADER_* security settings from the environment */
  security?: SecurityConfig;
}

/**
 * Parses a query date. A date-only end bound is stretched to the last
 * millisecond of that day (UTC).
 */
export function parseQueryDate(value: string | undefined, bound: 'start' | 'end'): Date | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (DATE_ONLY.test(trimmed)) {
    return new Date(`${trimmed}T${bound === 'end' ? '23:59:59.999' : '00:00:00.000'}Z`);
  }
  return new Date(trimmed);
}

/**
 * Filters from the query string. Reversed ranges are swapped; a date-only
 * bound is stretched after the swap so the range still covers whole days.
 */
export function buildSearchFilters(query: DownloadQuery): DownloadSearchFilters {
  const [publishedStart, publishedEnd] = orderedRawRange(query.published_start, query.published_end);
  const [downloadStart, downloadEnd] = orderedRawRange(query.download_start, query.download_end);

  return {
    title: query.title?.trim() || undefined,
    feed_name: query.feed_name?.trim() || undefined,
    downloader: query.downloader,
    status: query.status,
    mode: query.mode,
    published_start: parseQueryDate(publishedStart, 'start'),
    published_end: parseQueryDate(publishedEnd, 'end'),
    download_start: parseQueryDate(downloadStart, 'start'),
    download_end: parseQueryDate(downloadEnd, 'end'),
  };
}

function orderedRawRange(start: string | undefined, end: string | undefined): [string | undefined, string | undefined] {
  const from = parseQueryDate(start, 'start');
  const to = parseQueryDate(end, 'start');
  if (from && to && from.getTime() > to.getTime()) {
    return [end, start];
  }
  return [start, end];
}

export class RssDownloaderServer {
  readonly app: FastifyInstance;
  private services: Services;
  private options: ServerOptions;
  private rateLimiter: ApiRateLimiter | null = null;

  constructor(services: Services, options: ServerOptions) {
    this.services = services;
    this.options = options;
    this.app = Fastify({ logger: false });
  }

  async initialize(): Promise<void> {
    await this.app.register(cors);

    const security = this.options.security ?? loadSecurityConfig('RSS_DOWNLOADER');
    this.rateLimiter = new ApiRateLimiter(security.rateLimitMax, security.rateLimitWindowMs);
    this.app.addHook('preHandler', createRateLimitHook(this.rateLimiter));
    if (security.apiKey) {
      this.app.addHook('preHandler', createAuthHook(security.apiKey));
    }

    this.registerHealthRoutes();
    this.registerDownloadRoutes();
    this.registerConfigRoutes();
    this.registerDownloaderRoutes();
    this.registerRunRoutes();

    logger.info('Server initialized');
  }

  async start(): Promise<void> {
    await this.app.listen({ port: this.options.port, host: this.options.host });
    logger.info(`Server listening on ${this.options.host}:${this.options.port}`);
  }

  async stop(): Promise<void> {
    await this.app.close();
    this.rateLimiter?.dispose();
    logger.info('Server stopped');
  }

  // ============================================================================
  // Health
  // ============================================================================

  private registerHealthRoutes(): void {
    this.app.get('/health', async () => {
      return {
        status: 'ok',
        config_version: this.services.store.version(),
        downloaders: this.services.downloaders.status(),
        timestamp: new Date().toISOString(),
      };
    });
  }

  // ============================================================================
  // Download History
  // ============================================================================

  private registerDownloadRoutes(): void {
    this.app.get('/v1/downloads', async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = DownloadQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.code(400).send({ error: 'Invalid query', issues: formatIssues(parsed.error) });
      }

      const { page, limit, offset } = validatePagination(parsed.data.page, parsed.data.limit);
      const filters = buildSearchFilters(parsed.data);
      const { records, total } = await this.services.ledger.search(filters, { limit, offset });

      return { records, total, page, limit };
    });

    this.app.get('/v1/downloads/:id', async (request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
      const id = validateId(request.params.id);
      if (id === null) {
        return reply.code(400).send({ error: 'Invalid id' });
      }

      const record = await this.services.ledger.findById(id);
      if (!record) {
        return reply.code(404).send({ error: `Download record ${id} not found` });
      }
      return { record };
    });

    this.app.post('/v1/downloads/:id/redownload', async (request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
      const id = validateId(request.params.id);
      if (id === null) {
        return reply.code(400).send({ error: 'Invalid id' });
      }

      const body = RedownloadBodySchema.safeParse(request.body ?? {});
      if (!body.success) {
        return reply.code(400).send({ error: 'Invalid body', issues: formatIssues(body.error) });
      }

      try {
        const record = await this.services.orchestrator.redownload(id, body.data.downloader);
        return { success: true, record };
      } catch (error) {
        return this.sendError(reply, error);
      }
    });
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  private registerConfigRoutes(): void {
    this.app.get('/v1/config', async () => {
      const { config, version } = this.services.store.snapshot();
      return { config, version };
    });

    this.app.put('/v1/config', async (request: FastifyRequest, reply: FastifyReply) => {
      const patch = ConfigPatchSchema.safeParse(request.body);
      if (!patch.success) {
        return reply.code(400).send({ error: 'Body must be a JSON object' });
      }

      try {
        const { config, version } = await this.services.store.update(patch.data);
        return { config, version };
      } catch (error) {
        return this.sendError(reply, error);
      }
    });
  }

  // ============================================================================
  // Downloaders
  // ============================================================================

  private registerDownloaderRoutes(): void {
    this.app.get('/v1/downloaders', async () => {
      return { downloaders: this.services.downloaders.status() };
    });

    this.app.post('/v1/downloaders/:name/test', async (request: FastifyRequest<{ Params: NameParams }>, reply: FastifyReply) => {
      const type = DownloaderTypeSchema.safeParse(request.params.name);
      if (!type.success) {
        return reply.code(404).send({ error: `Unknown downloader: ${request.params.name}` });
      }

      const settings = ConfigPatchSchema.safeParse(request.body);
      const overrides = settings.success && Object.keys(settings.data).length > 0 ? settings.data : undefined;
      return this.services.downloaders.testConnection(type.data, overrides);
    });
  }

  // ============================================================================
  // Runs
  // ============================================================================

  private registerRunRoutes(): void {
    this.app.post('/v1/run', async (_request: FastifyRequest, reply: FastifyReply) => {
      const summary = await this.services.scheduler.trigger();
      if (!summary) {
        return reply.code(409).send({ error: 'A run is already in progress' });
      }
      return { success: true, summary };
    });
  }

  private sendError(reply: FastifyReply, error: unknown): FastifyReply {
    if (error instanceof ConfigValidationError) {
      return reply.code(422).send({ error: error.message, code: error.code, issues: error.issues });
    }
    if (error instanceof ItemNotFoundError) {
      return reply.code(404).send({ error: error.message, code: error.code });
    }
    if (error instanceof InvalidRecordError) {
      return reply.code(400).send({ error: error.message, code: error.code });
    }
    if (error instanceof DownloaderError) {
      return reply.code(502).send({ error: error.message, code: error.code, kind: error.kind, downloader: error.downloader });
    }

    logger.error('Request failed', { error: errorMessage(error) });
    return reply.code(500).send({ error: errorMessage(error) });
  }
}
