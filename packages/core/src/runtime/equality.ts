/**
 * packages/core/src/runtime/equality.ts — Equality helpers for props and
 * layout parameters.
 */

/** `Object.is` on the values themselves. */
export function refEqual<T>(a: T, b: T): boolean {
  return Object.is(a, b);
}

/**
 * One level deep: arrays element-wise, plain objects key-wise, everything else
 * by `Object.is`. Functions compare by reference.
 */
export function shallowEqual<T>(a: T, b: T): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!Object.is(a[i], b[i])) return false;
    }
    return true;
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  for (const key of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (!Object.is(Reflect.get(a, key), Reflect.get(b, key))) return false;
  }
  return true;
}
