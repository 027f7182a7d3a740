/**
 * Exhaustive switch helper for closed unions.
 *
 * Used in the default branch: the call only compiles when every member of the
 * union has its own case.
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
