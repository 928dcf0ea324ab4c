/**
 * Brand helper for "parse, don't validate".
 *
 * A branded type proves validation happened at a boundary. Capacities and heap
 * limits are branded once checked so a raw number cannot stand in for them.
 *
 * NOTE: string-keyed marker rather than a `unique symbol`, so exported
 * declarations that mention a brand can always be named (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Slot count fixed at construction: a positive safe integer. */
export type Capacity = Brand<number, 'Capacity'>;

export function isCapacity(value: number): value is Capacity {
  return Number.isSafeInteger(value) && value > 0;
}
