import { LatticeType, Latticed } from "./common";
import { Equality, equal, leq, notEqual } from "./compare";
import { joined } from "./join";
import { LawCheckConfig, LawCheckOptions, LawName } from "../config";
import { ExecutionException } from "../exceptions";
import { Logger } from "../logger";
import {
  copyValue,
  formatValue,
  unreachable,
  valueEquals,
} from "../util";

/**
 * A law that does not hold for some sample values.
 */
export interface LawViolation {
  readonly law: LawName;
  readonly message: string;
  /** Copies of the underlying values of the samples that break the law. */
  readonly witnesses: readonly unknown[];
}

/**
 * Result of checking the laws over a list of samples.
 */
export interface LawReport {
  /** Number of evaluated cases, across all laws. */
  readonly checked: number;
  readonly violations: readonly LawViolation[];
  readonly ok: boolean;
}

export type LawCheckerParams<T> = Partial<{
  config: LawCheckConfig;
  options: LawCheckOptions;
  logger: Logger;
  eq: Equality<T>;
}>;

/**
 * Checks the join-semilattice laws and the derived order properties of a
 * concrete lattice over a finite set of sample values.
 *
 * The contract cannot enforce the laws structurally, so implementers run
 * this checker in their own tests, passing samples that cover the corner
 * cases of their domain (bottom, top, incomparable elements).
 *
 * @template L The lattice type under test.
 */
export class LawChecker<L extends Latticed<L>> {
  private readonly config: LawCheckConfig;
  private readonly logger: Logger;
  private readonly eq: Equality<LatticeType<L>>;
  private violations: LawViolation[] = [];
  private checked = 0;

  /**
   * @param samples Values to check the laws on; must not be empty.
   * @param params.config Check settings. Built from `params.options` when absent.
   * @param params.logger Defaults to the logger of the configured verbosity.
   * @param params.eq Equality of the underlying values; structural by default.
   */
  constructor(
    private readonly samples: readonly L[],
    {
      config = undefined,
      options = undefined,
      logger = undefined,
      eq = valueEquals,
    }: LawCheckerParams<LatticeType<L>> = {},
  ) {
    if (samples.length === 0) {
      throw ExecutionException.make("At least one sample value is required");
    }
    this.config = config ?? new LawCheckConfig({ options });
    this.logger = logger ?? this.config.createLogger();
    this.eq = eq;
  }

  /**
   * Evaluates every enabled law over all combinations of the samples.
   */
  public check(): LawReport {
    this.violations = [];
    this.checked = 0;
    for (const law of this.config.laws) {
      this.logger.withContext(law, () => {
        const violationsBefore = this.violations.length;
        const checkedBefore = this.checked;
        this.checkLaw(law);
        this.logger.debug(
          `${this.checked - checkedBefore} cases, ${this.violations.length - violationsBefore} violations`,
        );
      });
    }
    const ok = this.violations.length === 0;
    if (ok) {
      this.logger.info(
        `All laws hold for ${this.samples.length} samples (${this.checked} cases)`,
      );
    } else {
      this.logger.info(
        `Found ${this.violations.length} law violations in ${this.checked} cases`,
      );
    }
    return { checked: this.checked, violations: this.violations, ok };
  }

  private checkLaw(law: LawName): void {
    switch (law) {
      case "idempotence":
        return this.forAll1((x) =>
          this.verify(
            law,
            this.same(joined(x, x), x),
            "join(x, x) != x",
            x,
          ),
        );
      case "commutativity":
        return this.forAll2((x, y) =>
          this.verify(
            law,
            this.same(joined(x, y), joined(y, x)),
            "join(x, y) != join(y, x)",
            x,
            y,
          ),
        );
      case "associativity":
        return this.forAll3((x, y, z) =>
          this.verify(
            law,
            this.same(joined(x, joined(y, z)), joined(joined(x, y), z)),
            "join(x, join(y, z)) != join(join(x, y), z)",
            x,
            y,
            z,
          ),
        );
      case "reflexivity":
        return this.forAll1((x) =>
          this.verify(law, leq(x, x, this.eq), "x <= x is false", x),
        );
      case "antisymmetry":
        return this.forAll2((x, y) =>
          this.verify(
            law,
            !(leq(x, y, this.eq) && leq(y, x, this.eq)) || this.same(x, y),
            "x <= y and y <= x but x != y",
            x,
            y,
          ),
        );
      case "transitivity":
        return this.forAll3((x, y, z) =>
          this.verify(
            law,
            !(leq(x, y, this.eq) && leq(y, z, this.eq)) || leq(x, z, this.eq),
            "x <= y and y <= z but not x <= z",
            x,
            y,
            z,
          ),
        );
      case "equalityConsistency":
        return this.forAll2((x, y) =>
          this.verify(
            law,
            notEqual(x, y, this.eq) === !equal(x, y, this.eq),
            "x != y disagrees with x == y",
            x,
            y,
          ),
        );
      case "nonMutation":
        return this.forAll2((x, y) => {
          const xBefore = copyValue(x.get());
          const yBefore = copyValue(y.get());
          leq(x, y, this.eq);
          this.verify(
            law,
            valueEquals(xBefore, x.get()) && valueEquals(yBefore, y.get()),
            `x <= y modified its arguments (before: x = ${formatValue(xBefore)}, y = ${formatValue(yBefore)})`,
            x,
            y,
          );
        });
      default:
        unreachable(law);
    }
  }

  private same(l: L, r: L): boolean {
    return equal(l, r, this.eq);
  }

  private verify(
    law: LawName,
    holds: boolean,
    description: string,
    ...witnesses: L[]
  ): void {
    this.checked += 1;
    if (holds || this.violations.length >= this.config.maxViolations) {
      return;
    }
    const values = witnesses.map((w) => copyValue(w.get()));
    const names = ["x", "y", "z"];
    const bindings = values
      .map((v, i) => `${names[i]} = ${formatValue(v)}`)
      .join(", ");
    const message = `${description} for ${bindings}`;
    this.logger.warn(message);
    this.violations.push({ law, message, witnesses: values });
  }

  private forAll1(fn: (x: L) => void): void {
    this.samples.forEach((x) => fn(x));
  }

  private forAll2(fn: (x: L, y: L) => void): void {
    this.samples.forEach((x) => this.samples.forEach((y) => fn(x, y)));
  }

  private forAll3(fn: (x: L, y: L, z: L) => void): void {
    this.samples.forEach((x) =>
      this.samples.forEach((y) => this.samples.forEach((z) => fn(x, y, z))),
    );
  }
}

/**
 * Checks the laws over `samples` and throws if any of them does not hold.
 *
 * @throws {ExecutionException} Listing the violations.
 */
export function assertJoinLaws<L extends Latticed<L>>(
  samples: readonly L[],
  params: LawCheckerParams<LatticeType<L>> = {},
): LawReport {
  const report = new LawChecker(samples, params).check();
  if (!report.ok) {
    throw ExecutionException.make(
      [
        `Join-semilattice laws do not hold:`,
        ...report.violations.map((v) => `- ${v.law}: ${v.message}`),
      ].join("\n"),
    );
  }
  return report;
}
