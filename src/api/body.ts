/**
 * Request parsing helpers for handlers. Bodies have already passed
 * validateBody by the time these run, so they narrow rather than re-validate;
 * a value of the wrong shape reads as absent.
 */

import { ValidationError } from '../errors.js';
import type { PaginationOptions } from '../types/common.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJson(req: Request): Promise<Record<string, unknown>> {
  const body: unknown = await req.json();
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

// ── Body fields ──

export function str(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

export function requireStr(body: Record<string, unknown>, key: string): string {
  const value = str(body, key);
  if (value === undefined) {
    throw new ValidationError(`${key} is required`);
  }
  return value;
}

export function num(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  return typeof value === 'number' ? value : undefined;
}

export function bool(body: Record<string, unknown>, key: string): boolean | undefined {
  const value = body[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function strings(body: Record<string, unknown>, key: string): string[] | undefined {
  const value = body[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/** Narrow a value to one of a fixed set of literals. */
export function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

export function requireOneOf<T extends string>(
  allowed: readonly T[],
  body: Record<string, unknown>,
  key: string
): T {
  const value = oneOf(allowed, body[key]);
  if (value === undefined) {
    throw new ValidationError(`${key} must be one of: ${allowed.join(', ')}`);
  }
  return value;
}

// ── URL ──

/** Path segment counted from the end: 0 is the last segment. */
export function pathParam(req: Request, fromEnd = 0): string {
  const parts = new URL(req.url).pathname.split('/').filter(Boolean);
  const raw = parts[parts.length - 1 - fromEnd] ?? '';
  try {
    return decodeURIComponent(raw);
  } catch (err) {
    if (err instanceof URIError) {
      throw new ValidationError(`Malformed path segment: ${raw}`);
    }
    throw err;
  }
}

export function query(req: Request, key: string): string | undefined {
  const value = new URL(req.url).searchParams.get(key);
  return value === null || value === '' ? undefined : value;
}

/** Query parameter restricted to an enumeration; anything else is a 400. */
export function queryOneOf<T extends string>(
  req: Request,
  key: string,
  allowed: readonly T[]
): T | undefined {
  const raw = query(req, key);
  if (raw === undefined) return undefined;

  const value = oneOf(allowed, raw);
  if (value === undefined) {
    throw new ValidationError(`${key} must be one of: ${allowed.join(', ')}`);
  }
  return value;
}

export function queryInt(req: Request, key: string): number | undefined {
  const raw = query(req, key);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${key} must be an integer`);
  }
  return value;
}

export function queryBool(req: Request, key: string): boolean | undefined {
  const raw = query(req, key);
  if (raw === undefined) return undefined;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ValidationError(`${key} must be true or false`);
}

export function pagination(req: Request): PaginationOptions {
  const limit = queryInt(req, 'limit') ?? DEFAULT_PAGE_SIZE;
  const offset = queryInt(req, 'offset') ?? 0;

  if (limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new ValidationError(`limit must be from 1 to ${MAX_PAGE_SIZE}`);
  }
  if (offset < 0) {
    throw new ValidationError('offset must not be negative');
  }
  return { limit, offset };
}
