/**
 * Input Validation Utilities
 * Shared validation helpers for request parameters
 */

import type { Pagination } from './types.js';

/**
 * Validates and clamps page-based pagination parameters into limit/offset
 */
export function validatePagination(
  page?: number | string,
  limit?: number | string,
  maxLimit = 100
): Pagination & { page: number } {
  let parsedPage = typeof page === 'string' ? parseInt(page, 10) : (page ?? 1);
  let parsedLimit = typeof limit === 'string' ? parseInt(limit, 10) : (limit ?? 20);

  if (isNaN(parsedPage)) {
    parsedPage = 1;
  }
  if (isNaN(parsedLimit)) {
    parsedLimit = 20;
  }

  const clampedPage = Math.max(parsedPage, 1);
  const clampedLimit = Math.min(Math.max(parsedLimit, 1), maxLimit);

  return {
    page: clampedPage,
    limit: clampedLimit,
    offset: (clampedPage - 1) * clampedLimit,
  };
}

/**
 * Validates a positive integer, falling back to the default
 */
export function validatePositiveInt(
  value: string | number | undefined,
  defaultValue: number
): number {
  const num = typeof value === 'string' ? parseInt(value, 10) : (value ?? defaultValue);
  if (isNaN(num) || num < 1) {
    return defaultValue;
  }
  return num;
}

/**
 * Validates a string against an allowed list
 */
export function validateEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[]
): T | undefined {
  if (!value) {
    return undefined;
  }
  return allowed.find(candidate => candidate === value);
}

/**
 * Validates integer ID from path parameter
 */
export function validateId(id: string | number): number | null {
  const parsed = typeof id === 'string' ? Number(id) : id;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return null;
  }
  return parsed;
}
