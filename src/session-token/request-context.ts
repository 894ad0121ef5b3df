import type { SessionTokenSet } from './session-token-set.js';

export interface IncomingCookie {
  readonly name: string;
  readonly value: string;
}

export type CookieMutation =
  | {
      readonly kind: 'set';
      readonly name: string;
      readonly value: string;
      readonly maxAgeSeconds: number;
      readonly path: string;
    }
  | { readonly kind: 'delete'; readonly name: string; readonly path: string };

/**
 * Everything one request knows about the client's session tokens.
 *
 * Created by the transport from the incoming cookie jar, passed explicitly
 * through every call that touches tokens, and drained by the transport when
 * the response is finalized. Nothing here outlives the request.
 */
export class RequestContext {
  private tokenSet: SessionTokenSet | null = null;
  private readonly mutations = new Map<string, CookieMutation>();

  constructor(readonly incomingCookies: readonly IncomingCookie[]) {}

  cachedTokenSet(): SessionTokenSet | null {
    return this.tokenSet;
  }

  cacheTokenSet(set: SessionTokenSet): void {
    this.tokenSet = set;
  }

  /** Later mutations of the same cookie replace earlier ones. */
  queueCookieMutation(mutation: CookieMutation): void {
    this.mutations.delete(mutation.name);
    this.mutations.set(mutation.name, mutation);
  }

  pendingCookieMutations(): readonly CookieMutation[] {
    return [...this.mutations.values()];
  }
}
