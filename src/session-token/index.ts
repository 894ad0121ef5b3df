export { TOKEN_SLOT_CAPACITY, parseTokenSlot } from './session-token.js';
export type { SessionToken, TokenSlot } from './session-token.js';

export { SessionTokenCodec, WIRE_KEYS, NULL_MARKER, FIELD_SEPARATOR, KEY_VALUE_SEPARATOR } from './session-token-codec.js';
export type { WireKey } from './session-token-codec.js';

export { SessionTokenSet } from './session-token-set.js';
export { SessionTokenStore } from './session-token-store.js';
export type { SessionTokenCookieOptions } from './session-token-store.js';

export { RequestContext } from './request-context.js';
export type { IncomingCookie, CookieMutation } from './request-context.js';

export type {
  SessionTokenError,
  TokenMalformedError,
  TokenAddError,
  TokenCapacityExceededError,
  TokenSlotConflictError,
  TokenDuplicateRunError,
} from './errors.js';
