import { LatticeType, Latticed } from "./common";
import { valueEquals } from "../util";

/**
 * Equality on the underlying values of a lattice.
 */
export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Returns whether `l == r`, that is, whether their underlying values are equal.
 * @param eq Equality of the underlying values; structural by default.
 */
export function equal<L extends Latticed<L>>(
  l: L,
  r: L,
  eq: Equality<LatticeType<L>> = valueEquals,
): boolean {
  return eq(l.get(), r.get());
}

/**
 * Returns whether `l != r`.
 */
export function notEqual<L extends Latticed<L>>(
  l: L,
  r: L,
  eq: Equality<LatticeType<L>> = valueEquals,
): boolean {
  return !equal(l, r, eq);
}

/**
 * Returns whether `l <= r` in the partial order induced by join: `r` joined
 * into a copy of `l` yields a value equal to `r`.
 *
 * Neither argument is modified.
 */
export function leq<L extends Latticed<L>>(
  l: L,
  r: L,
  eq: Equality<LatticeType<L>> = valueEquals,
): boolean {
  const lhs = l.clone();
  lhs.join(r);
  return eq(lhs.get(), r.get());
}
