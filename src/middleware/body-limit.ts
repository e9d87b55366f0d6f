/**
 * Request body size limit.
 * Rejects a declared Content-Length over the limit before reading anything,
 * then counts bytes while streaming so an undeclared or understated body is
 * cut off as soon as it crosses the limit. Handlers further in receive a
 * Request whose body is the buffered text.
 */

import { PayloadTooLargeError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';

export const DEFAULT_MAX_BODY_BYTES = 50 * 1024;

export function bodyLimit(maxBytes: number): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const declared = req.headers.get('content-length');
      if (declared !== null && Number(declared) > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }
      if (!req.body) {
        return next(req, ctx);
      }

      const reader = req.body.getReader();
      const chunks: Uint8Array[] = [];
      let received = 0;

      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        received += value.byteLength;
        if (received > maxBytes) {
          await reader.cancel();
          throw new PayloadTooLargeError(maxBytes);
        }
        chunks.push(value);
      }

      const headers = new Headers(req.headers);
      headers.delete('content-length');
      const buffered = new Request(req.url, {
        method: req.method,
        headers,
        body: Buffer.concat(chunks).toString('utf8'),
      });
      return next(buffered, ctx);
    };
  };
}
