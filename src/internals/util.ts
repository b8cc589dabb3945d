/**
 * Additional generic TypeScript functions used in the project.
 *
 * @packageDocumentation
 */

import { InternalException } from "./exceptions";

export const isSetSubsetOf = <T>(
  lhs: ReadonlySet<T>,
  rhs: ReadonlySet<T>,
  eq: (a: T, b: T) => boolean = (a, b) => a === b,
): boolean =>
  [...lhs].every(
    (elem) => rhs.has(elem) || [...rhs].some((rElem) => eq(elem, rElem)),
  );

export const isMapSubsetOf = <K, V>(
  lhs: ReadonlyMap<K, V>,
  rhs: ReadonlyMap<K, V>,
  eq: (a: V, b: V) => boolean = (a, b) => a === b,
  keyEq: (a: K, b: K) => boolean = Object.is,
): boolean =>
  [...lhs].every(([key, value]) =>
    [...rhs].some(([rKey, rValue]) => keyEq(key, rKey) && eq(value, rValue)),
  );

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== "object" || v === null) return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/**
 * Structural equality used as the default equality of lattice values.
 *
 * Primitives are compared with `Object.is`, arrays element-wise, sets and
 * maps by membership in both directions (elements and keys compared
 * structurally), and plain objects by their own enumerable keys. Any other
 * object is equal only to itself.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => valueEquals(x, b[i]));
  }
  if (a instanceof Set && b instanceof Set) {
    return (
      a.size === b.size &&
      isSetSubsetOf(a, b, valueEquals) &&
      isSetSubsetOf(b, a, valueEquals)
    );
  }
  if (a instanceof Map && b instanceof Map) {
    return (
      a.size === b.size &&
      isMapSubsetOf(a, b, valueEquals, valueEquals) &&
      isMapSubsetOf(b, a, valueEquals, valueEquals)
    );
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((k) => Object.hasOwn(b, k) && valueEquals(a[k], b[k]))
    );
  }
  return false;
}

/**
 * Returns a structural copy of `v`: arrays, sets, maps and plain objects
 * are copied recursively, everything else is shared.
 */
export function copyValue<T>(v: T): T;
export function copyValue(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(copyValue);
  if (v instanceof Set) return new Set([...v].map(copyValue));
  if (v instanceof Map) {
    return new Map(
      [...v].map(([k, val]): [unknown, unknown] => [
        copyValue(k),
        copyValue(val),
      ]),
    );
  }
  if (isPlainObject(v)) {
    return Object.fromEntries(
      Object.entries(v).map(([k, val]) => [k, copyValue(val)]),
    );
  }
  return v;
}

/**
 * Renders a value for diagnostics: `Set {1, 2}`, `Map {"a" => 1}`,
 * `{"a": 1n}`, `[1, 2]`.
 */
export function formatValue(v: unknown): string {
  if (typeof v === "bigint") return `${v}n`;
  if (typeof v === "string") return JSON.stringify(v);
  if (Array.isArray(v)) return `[${v.map(formatValue).join(", ")}]`;
  if (v instanceof Set) {
    return `Set {${[...v].map(formatValue).join(", ")}}`;
  }
  if (v instanceof Map) {
    const entries = [...v].map(
      ([k, val]) => `${formatValue(k)} => ${formatValue(val)}`,
    );
    return `Map {${entries.join(", ")}}`;
  }
  if (isPlainObject(v)) {
    const entries = Object.entries(v).map(
      ([k, val]) => `${JSON.stringify(k)}: ${formatValue(val)}`,
    );
    return `{${entries.join(", ")}}`;
  }
  return String(v);
}

/**
 * Unreachable case for exhaustive checking.
 */
export function unreachable(value: never): never {
  throw InternalException.make(`Reached impossible case`, { node: value });
}
