/**
 * Request body size limit.
 * Checks Content-Length first, then the actual bytes read, so a missing or
 * understated header cannot slip a large body through.
 */

import { PayloadTooLargeError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';

export const JSON_BODY_LIMIT = 50 * 1024;
export const UPLOAD_BODY_LIMIT = 5 * 1024 * 1024;

export function bodyLimit(maxBytes: number): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      if (req.method === 'GET' || req.method === 'HEAD' || !req.body) {
        return next(req, ctx);
      }

      const declared = Number(req.headers.get('Content-Length'));
      if (Number.isFinite(declared) && declared > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }

      const body = await req.arrayBuffer();
      if (body.byteLength > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }

      return next(
        new Request(req.url, { method: req.method, headers: req.headers, body }),
        ctx
      );
    };
  };
}
