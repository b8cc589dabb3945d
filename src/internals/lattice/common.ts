/**
 * The join-semilattice value contract.
 *
 * A join semilattice is a partially ordered set in which every pair of
 * elements has a least upper bound, their *join*. Join is associative,
 * commutative and idempotent:
 *
 *   - associative: `join(x, join(y, z)) == join(join(x, y), z)`
 *   - commutative: `join(x, y) == join(y, x)`
 *   - idempotent:  `join(x, x) == x`
 *
 * Conversely, any such operation induces a partial order: `x <= y` iff
 * `join(x, y) == y`. The operators in `./compare` are derived from this
 * definition alone, so implementers only provide `get`, `join` and `clone`.
 *
 * @packageDocumentation
 */

/**
 * A value of a join semilattice over `T`, implemented by the concrete type `L`.
 *
 * `L` is the implementing type itself, so that `join` accepts another value
 * of the same concrete lattice:
 *
 * ```ts
 * class MaxLattice implements Lattice<MaxLattice, number> { ... }
 * ```
 *
 * Semilattices need not have a bottom element. When they do, the
 * zero-argument constructor of the implementing class should produce it.
 *
 * @template L The implementing type.
 * @template T The type of the underlying value.
 */
export interface Lattice<L, T> {
  /**
   * Returns the current element of the semilattice.
   * The result is a view: callers must not mutate it.
   */
  get(): T;

  /**
   * Joins `other` into this value, which becomes the least upper bound of
   * both. `other` is left unchanged.
   */
  join(other: L): void;

  /**
   * Returns an independent copy of this value. Joining into the copy must
   * not affect the original.
   */
  clone(): L;
}

/**
 * The underlying value type a lattice `L` operates over.
 */
export type LatticeType<L> = L extends { get(): infer T } ? T : never;

/**
 * Bound placed on the type parameter of every generic lattice operation:
 * `L` implements `Lattice` over its own `LatticeType`.
 */
export type Latticed<L> = Lattice<L, LatticeType<L>>;

/**
 * `true` if `L` conforms to the lattice contract, `false` otherwise.
 */
export type IsLattice<L> = [L] extends [Latticed<L>] ? true : false;

/**
 * `true` if `L` is a lattice whose values are of type `T`.
 */
export type IsLatticeOver<L, T> =
  IsLattice<L> extends true
    ? [LatticeType<L>] extends [T]
      ? [T] extends [LatticeType<L>]
        ? true
        : false
      : false
    : false;

/**
 * Resolves to `L` for conforming types and fails to compile otherwise.
 *
 * ```ts
 * type _ = AssertLattice<MaxLattice>;
 * ```
 */
export type AssertLattice<L extends Latticed<L>> = L;

/**
 * Zero-argument constructor of a lattice, expected to produce its bottom
 * element.
 */
export type LatticeConstructor<L extends Latticed<L>> = new () => L;
