/**
 * Security Middleware and Utilities
 * API key authentication and rate limiting for the web API
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { createLogger } from './logger.js';
import { validatePositiveInt } from './validation.js';

const logger = createLogger('security');

const UNAUTHENTICATED_PATHS = new Set(['/health', '/ready', '/live']);

/**
 * Simple in-memory rate limiter keyed by client address
 */
export class ApiRateLimiter {
  private requests: Map<string, { count: number; resetAt: number }> = new Map();
  readonly maxRequests: number;
  private readonly windowMs: number;
  private cleanupTimer: NodeJS.Timeout;

  constructor(maxRequests = 100, windowMs = 60000) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;

    // Must not keep the process alive on its own
    this.cleanupTimer = setInterval(() => this.cleanup(), 60000);
    this.cleanupTimer.unref();
  }

  /**
   * @returns true if allowed, false if rate limited
   */
  check(key: string): boolean {
    const now = Date.now();
    const record = this.requests.get(key);

    if (!record || now > record.resetAt) {
      this.requests.set(key, { count: 1, resetAt: now + this.windowMs });
      return true;
    }

    if (record.count >= this.maxRequests) {
      return false;
    }

    record.count++;
    return true;
  }

  getRemaining(key: string): number {
    const record = this.requests.get(key);
    if (!record || Date.now() > record.resetAt) {
      return this.maxRequests;
    }
    return Math.max(0, this.maxRequests - record.count);
  }

  getResetTime(key: string): number {
    const record = this.requests.get(key);
    if (!record || Date.now() > record.resetAt) {
      return Date.now() + this.windowMs;
    }
    return record.resetAt;
  }

  dispose(): void {
    clearInterval(this.cleanupTimer);
    this.requests.clear();
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, record] of this.requests) {
      if (now > record.resetAt) {
        this.requests.delete(key);
      }
    }
  }
}

export interface AuthResult {
  authenticated: boolean;
  error?: string;
}

/**
 * Validate an API key. No configured key means every request is allowed.
 */
export function validateApiKey(providedKey: string | undefined, validKey: string | undefined): AuthResult {
  if (!validKey) {
    return { authenticated: true };
  }

  if (!providedKey) {
    return { authenticated: false, error: 'API key required' };
  }

  if (providedKey.length !== validKey.length) {
    return { authenticated: false, error: 'Invalid API key' };
  }

  // Constant-time comparison
  let result = 0;
  for (let i = 0; i < providedKey.length; i++) {
    result |= providedKey.charCodeAt(i) ^ validKey.charCodeAt(i);
  }

  if (result !== 0) {
    return { authenticated: false, error: 'Invalid API key' };
  }

  return { authenticated: true };
}

/**
 * Extract API key from request headers
 * Supports: Authorization: Bearer <key>, X-API-Key: <key>
 */
export function extractApiKey(headers: Record<string, string | string[] | undefined>): string | undefined {
  const authHeader = headers['authorization'];
  if (authHeader) {
    const auth = Array.isArray(authHeader) ? authHeader[0] : authHeader;
    if (auth.startsWith('Bearer ')) {
      return auth.slice(7);
    }
  }

  const apiKeyHeader = headers['x-api-key'];
  if (apiKeyHeader) {
    return Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
  }

  return undefined;
}

export interface SecurityConfig {
  /** API key for authenticating requests (optional - if not set, no auth required) */
  apiKey?: string;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

/**
 * Load security configuration from environment variables
 */
export function loadSecurityConfig(prefix: string): SecurityConfig {
  const envPrefix = prefix.toUpperCase();
  return {
    apiKey: process.env[`${envPrefix}_API_KEY`] || undefined,
    rateLimitMax: validatePositiveInt(process.env[`${envPrefix}_RATE_LIMIT_MAX`] ?? process.env.RATE_LIMIT_MAX, 100),
    rateLimitWindowMs: validatePositiveInt(process.env[`${envPrefix}_RATE_LIMIT_WINDOW_MS`] ?? process.env.RATE_LIMIT_WINDOW_MS, 60000),
  };
}

/**
 * Fastify preHandler enforcing the API key.
 * Usage: app.addHook('preHandler', createAuthHook(config.apiKey))
 */
export function createAuthHook(apiKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> => {
    if (UNAUTHENTICATED_PATHS.has(request.routeOptions.url ?? request.url)) {
      return;
    }

    const result = validateApiKey(extractApiKey(request.headers), apiKey);

    if (!result.authenticated) {
      logger.warn('Authentication failed', { error: result.error, url: request.url });
      return reply.status(401).send({ error: result.error });
    }
  };
}

/**
 * Fastify preHandler applying an ApiRateLimiter per client address.
 */
export function createRateLimitHook(limiter: ApiRateLimiter) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> => {
    const key = request.ip || 'unknown';

    reply.header('X-RateLimit-Limit', limiter.maxRequests.toString());
    reply.header('X-RateLimit-Remaining', limiter.getRemaining(key).toString());
    reply.header('X-RateLimit-Reset', Math.ceil(limiter.getResetTime(key) / 1000).toString());

    if (!limiter.check(key)) {
      logger.warn('Rate limit exceeded', { ip: key });
      reply.header('Retry-After', '60');
      return reply.status(429).send({ error: 'Too many requests' });
    }
  };
}
