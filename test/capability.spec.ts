import {
  IsLattice,
  IsLatticeOver,
  LatticeType,
} from "../src/internals/lattice";
import { MaxIntLattice, PairLattice, SetUnionLattice } from "./testLattices";

class MissingJoin {
  get(): number {
    return 0;
  }
  clone(): MissingJoin {
    return new MissingJoin();
  }
}

class MissingGet {
  join(_other: MissingGet): void {}
  clone(): MissingGet {
    return new MissingGet();
  }
}

class ForeignJoin {
  get(): number {
    return 0;
  }
  join(_other: string): void {}
  clone(): ForeignJoin {
    return new ForeignJoin();
  }
}

// These annotations are checked by the compiler when the suite is loaded:
// a wrong verdict fails the whole file.
describe("Compile-time capability checks", () => {
  it("admits conforming types", () => {
    const verdicts: [
      IsLattice<MaxIntLattice>,
      IsLattice<SetUnionLattice<string>>,
      IsLattice<PairLattice<MaxIntLattice, SetUnionLattice<string>>>,
    ] = [true, true, true];
    expect(verdicts).toEqual([true, true, true]);
  });

  it("rejects types missing part of the contract", () => {
    const verdicts: [
      IsLattice<MissingJoin>,
      IsLattice<MissingGet>,
      IsLattice<ForeignJoin>,
      IsLattice<number>,
    ] = [false, false, false, false];
    expect(verdicts).toEqual([false, false, false, false]);
  });

  it("checks the underlying value type", () => {
    const verdicts: [
      IsLatticeOver<MaxIntLattice, number>,
      IsLatticeOver<MaxIntLattice, string>,
      IsLatticeOver<MaxIntLattice, number | string>,
      IsLatticeOver<SetUnionLattice<string>, ReadonlySet<string>>,
      IsLatticeOver<MissingJoin, number>,
    ] = [true, false, false, true, false];
    expect(verdicts).toEqual([true, false, false, true, false]);
  });

  it("recovers the underlying value type", () => {
    type Pair = PairLattice<MaxIntLattice, SetUnionLattice<string>>;
    const value: LatticeType<Pair> = [3, new Set(["a"])];
    expect(value[0]).toBe(3);
  });
});
