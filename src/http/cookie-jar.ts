import type { Request, Response } from 'express';
import { parse as parseCookieHeader } from 'cookie';
import { RequestContext, type IncomingCookie } from '../session-token/request-context.js';

/**
 * Builds the request's token context from the raw `Cookie` header. Values
 * reach the codec exactly as sent (no `j:` JSON or signed-cookie handling),
 * so anything it can't decode is expired like any other malformed token.
 */
export function requestContextFrom(req: Request): RequestContext {
  const header = req.headers.cookie;
  if (!header) return new RequestContext([]);

  const cookies: IncomingCookie[] = Object.entries(parseCookieHeader(header)).map(([name, value]) => ({ name, value }));
  return new RequestContext(cookies);
}

/**
 * Writes the queued cookie mutations onto the response. Call once, right
 * before the body is sent.
 *
 * Values go out unencoded: the token format only uses characters that are
 * legal in a cookie value, and clients parse it as written.
 */
export function applyCookieMutations(ctx: RequestContext, res: Response): void {
  for (const mutation of ctx.pendingCookieMutations()) {
    switch (mutation.kind) {
      case 'set':
        res.cookie(mutation.name, mutation.value, {
          path: mutation.path,
          maxAge: mutation.maxAgeSeconds * 1000,
          sameSite: 'lax',
          encode: String,
        });
        break;
      case 'delete':
        res.clearCookie(mutation.name, { path: mutation.path });
        break;
    }
  }
}
