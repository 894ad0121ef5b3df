/**
 * Exhaustiveness helper for discriminated unions (error codes, worker kinds).
 * A new union member without a `case` fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
