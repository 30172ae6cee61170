/**
 * SameValueZero, the comparison `Set`, `Map` and `Array.prototype.includes`
 * use: like `===`, except that NaN equals NaN.
 */
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}
