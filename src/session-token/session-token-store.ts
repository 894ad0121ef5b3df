import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { StudyRunId } from '../domain/ids.js';
import type { Logger } from '../core/logging/index.js';
import type { TokenAddError, TokenCapacityExceededError } from './errors.js';
import type { RequestContext } from './request-context.js';
import type { SessionToken, TokenSlot } from './session-token.js';
import type { SessionTokenCodec } from './session-token-codec.js';
import { SessionTokenSet } from './session-token-set.js';

export interface SessionTokenCookieOptions {
  readonly path: string;
  readonly maxAgeSeconds: number;
}

/**
 * Reads and writes a request's session tokens.
 *
 * The token set is decoded once per request and cached on the RequestContext.
 * Writes and discards update that cached set and queue cookie mutations; the
 * transport applies the queue when it sends the response.
 *
 * Malformed cookies never fail a request: they are queued for deletion and
 * left out of the set.
 */
export class SessionTokenStore {
  constructor(
    private readonly codec: SessionTokenCodec,
    private readonly cookieOptions: SessionTokenCookieOptions,
    private readonly logger: Logger
  ) {}

  currentSet(ctx: RequestContext): SessionTokenSet {
    const cached = ctx.cachedTokenSet();
    if (cached) return cached;

    const set = this.extract(ctx);
    ctx.cacheTokenSet(set);
    return set;
  }

  find(ctx: RequestContext, studyRunId: StudyRunId): SessionToken | null {
    return this.currentSet(ctx).findByStudyRunId(studyRunId);
  }

  /**
   * The slot a run's token should occupy: the one it already holds, else the first free one.
   */
  allocateSlot(ctx: RequestContext, studyRunId: StudyRunId): Result<TokenSlot, TokenCapacityExceededError> {
    const set = this.currentSet(ctx);
    const existing = set.findByStudyRunId(studyRunId);
    return existing ? ok(existing.slot) : set.nextFreeSlot();
  }

  /**
   * Replaces the run's token (if any) with `token` and queues the cookie.
   * Fails without side effects when another run holds the slot.
   */
  write(ctx: RequestContext, token: SessionToken): Result<SessionToken, TokenAddError> {
    const set = this.currentSet(ctx);
    const previous = set.findByStudyRunId(token.studyRunId);
    if (previous) set.remove(previous);

    const added = set.add(token);
    if (added.isErr()) {
      if (previous) set.add(previous);
      return err(added.error);
    }

    if (previous && previous.slot !== token.slot) {
      this.queueDelete(ctx, this.codec.cookieNameFor(previous.slot));
    }
    ctx.queueCookieMutation({
      kind: 'set',
      name: this.codec.cookieNameFor(token.slot),
      value: this.codec.encode(token),
      maxAgeSeconds: this.cookieOptions.maxAgeSeconds,
      path: this.cookieOptions.path,
    });
    return ok(token);
  }

  /**
   * Removes the run's token and queues deletion of its cookie.
   * Returns the discarded token, or null if the client held none for the run.
   */
  discard(ctx: RequestContext, studyRunId: StudyRunId): SessionToken | null {
    const set = this.currentSet(ctx);
    const token = set.findByStudyRunId(studyRunId);
    if (!token) return null;

    set.remove(token);
    this.queueDelete(ctx, this.codec.cookieNameFor(token.slot));
    return token;
  }

  private extract(ctx: RequestContext): SessionTokenSet {
    const set = new SessionTokenSet();
    const seenNames = new Set<string>();

    for (const cookie of ctx.incomingCookies) {
      if (!this.codec.isTokenCookieName(cookie.name)) continue;
      // Same name twice (e.g. different paths): the browser decides which one it sends first.
      if (seenNames.has(cookie.name)) continue;
      seenNames.add(cookie.name);

      const decoded = this.codec.decode(cookie.name, cookie.value);
      if (decoded.isErr()) {
        this.logger.warn({ cookieName: cookie.name, field: decoded.error.field }, decoded.error.message);
        this.queueDelete(ctx, cookie.name);
        continue;
      }

      const added = set.add(decoded.value);
      if (added.isErr()) {
        this.logger.warn(
          { cookieName: cookie.name, studyRunId: decoded.value.studyRunId, reason: added.error.code },
          'Discarded conflicting session token'
        );
        this.queueDelete(ctx, cookie.name);
      }
    }

    return set;
  }

  private queueDelete(ctx: RequestContext, name: string): void {
    ctx.queueCookieMutation({ kind: 'delete', name, path: this.cookieOptions.path });
  }
}
