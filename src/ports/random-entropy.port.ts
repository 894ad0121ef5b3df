/**
 * Cryptographically secure random bytes (confirmation codes).
 *
 * Guarantees:
 * - synchronous
 * - not Math.random()
 * - returns exactly `count` bytes
 */
export interface RandomEntropyPort {
  generateBytes(count: number): Uint8Array;
}
