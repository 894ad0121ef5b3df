import type { RandomEntropyPort } from '../ports/random-entropy.port.js';

/**
 * Confirmation code shown to a worker after a successful run (e.g. pasted back into MTurk).
 * Formatted as a random (version 4) UUID.
 */
export function generateConfirmationCode(entropy: RandomEntropyPort): string {
  const hex = Array.from(entropy.generateBytes(16), (b) => b.toString(16).padStart(2, '0')).join('');
  const variant = ((parseInt(hex.charAt(16), 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `4${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join('-');
}
