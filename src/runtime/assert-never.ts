/**
 * Exhaustiveness guard for discriminated unions.
 * A `switch` that ends in `assertNever` stops compiling when a union member is added.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(x)}`);
}
