import { LatticeConstructor, Latticed } from "./common";
import { ExecutionException } from "../exceptions";

/**
 * Constructs the bottom element of a lattice.
 */
export function bottomOf<L extends Latticed<L>>(
  ctor: LatticeConstructor<L>,
): L {
  return new ctor();
}

/**
 * Returns the join of `l` and `r` as a new value, leaving both unchanged.
 */
export function joined<L extends Latticed<L>>(l: L, r: L): L {
  const result = l.clone();
  result.join(r);
  return result;
}

/**
 * Joins all the given values into a new one.
 *
 * The accumulator starts from `bottom` when it is given and from a copy of
 * the first value otherwise; the inputs are never modified.
 *
 * @throws {ExecutionException} When `values` is empty and there is no bottom.
 */
export function joinAll<L extends Latticed<L>>(
  values: readonly L[],
  bottom?: LatticeConstructor<L>,
): L {
  if (bottom !== undefined) {
    return values.reduce((acc, value) => {
      acc.join(value);
      return acc;
    }, bottomOf(bottom));
  }
  if (values.length === 0) {
    throw ExecutionException.make(
      "Cannot join an empty list of values without a bottom element",
    );
  }
  const [first, ...rest] = values;
  return rest.reduce((acc, value) => {
    acc.join(value);
    return acc;
  }, first.clone());
}
