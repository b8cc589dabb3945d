import { LawCheckConfig } from "../src/internals/config";
import { LawChecker, assertJoinLaws } from "../src/internals/lattice";
import { DebugLogger, QuietLogger } from "../src/internals/logger";
import {
  LastWriterLattice,
  LeakyTagsLattice,
  MaxIntLattice,
  PairLattice,
  SetUnionLattice,
  SharedSetLattice,
  SumLattice,
} from "./testLattices";

describe("LawChecker", () => {
  const logger = new QuietLogger();
  const maxSamples = () => [1, 5, 9].map((v) => new MaxIntLattice(v));

  it("accepts a lawful lattice", () => {
    const report = new LawChecker(maxSamples(), { logger }).check();
    expect(report.ok).toBe(true);
    expect(report.violations).toEqual([]);
    // n + n² + n³ + n + n² + n³ + n² + n² for n = 3
    expect(report.checked).toBe(96);
  });

  it("accepts a product of lawful lattices", () => {
    const samples = [
      new PairLattice(new MaxIntLattice(1), new SetUnionLattice(["a"])),
      new PairLattice(new MaxIntLattice(2), new SetUnionLattice(["b"])),
      new PairLattice(new MaxIntLattice(2), new SetUnionLattice(["a", "b"])),
    ];
    const report = new LawChecker(samples, { logger }).check();
    expect(report.ok).toBe(true);
    expect(report.checked).toBe(96);
  });

  it("checks only the configured laws", () => {
    const report = new LawChecker(maxSamples(), {
      logger,
      options: { laws: ["idempotence", "commutativity"] },
    }).check();
    expect(report.checked).toBe(12);
  });

  it("reports a join that is not idempotent", () => {
    const samples = [new SumLattice(1), new SumLattice(2)];
    const report = new LawChecker(samples, {
      logger,
      options: { laws: ["idempotence"] },
    }).check();
    expect(report.ok).toBe(false);
    expect(report.violations).toEqual([
      {
        law: "idempotence",
        message: "join(x, x) != x for x = 1",
        witnesses: [1],
      },
      {
        law: "idempotence",
        message: "join(x, x) != x for x = 2",
        witnesses: [2],
      },
    ]);
  });

  it("stops recording after the violation limit", () => {
    const samples = [new SumLattice(1), new SumLattice(2)];
    const report = new LawChecker(samples, {
      logger,
      options: { laws: ["idempotence"], maxViolations: 1 },
    }).check();
    expect(report.violations).toHaveLength(1);
    expect(report.checked).toBe(2);
  });

  it("reports a join that is not commutative", () => {
    const samples = [new LastWriterLattice(1), new LastWriterLattice(2)];
    const report = new LawChecker(samples, {
      logger,
      options: { laws: ["commutativity"] },
    }).check();
    expect(report.checked).toBe(4);
    expect(report.violations.map((v) => v.message)).toEqual([
      "join(x, y) != join(y, x) for x = 1, y = 2",
      "join(x, y) != join(y, x) for x = 2, y = 1",
    ]);
  });

  it("reports an order that is not antisymmetric", () => {
    const samples = [new LastWriterLattice(1), new LastWriterLattice(2)];
    const report = new LawChecker(samples, {
      logger,
      options: { laws: ["antisymmetry"] },
    }).check();
    expect(report.violations.map((v) => v.message)).toEqual([
      "x <= y and y <= x but x != y for x = 1, y = 2",
      "x <= y and y <= x but x != y for x = 2, y = 1",
    ]);
  });

  it("reports clones that share state with their source", () => {
    const samples = [
      new SharedSetLattice(new Set([1])),
      new SharedSetLattice(new Set([2])),
    ];
    const report = new LawChecker(samples, {
      logger,
      options: { laws: ["nonMutation"] },
    }).check();
    expect(report.violations).toHaveLength(2);
    expect(report.violations[0].message).toBe(
      "x <= y modified its arguments (before: x = Set {1}, y = Set {2}) for x = Set {1, 2}, y = Set {2}",
    );
  });

  it("keeps the witnesses as they were when the violation was found", () => {
    const samples = [
      new SharedSetLattice(new Set([1])),
      new SharedSetLattice(new Set([2])),
    ];
    const report = new LawChecker(samples, {
      logger,
      options: { laws: ["nonMutation"] },
    }).check();
    // The second sample grows to {2, 1} after the first violation is recorded
    expect(samples[1].get()).toEqual(new Set([1, 2]));
    expect(report.violations[0].witnesses).toEqual([
      new Set([1, 2]),
      new Set([2]),
    ]);
  });

  it("reports a join that modifies its argument inside a record", () => {
    const samples = [new LeakyTagsLattice(["a"]), new LeakyTagsLattice(["b"])];
    const report = new LawChecker(samples, {
      logger,
      options: { laws: ["nonMutation"] },
    }).check();
    expect(report.ok).toBe(false);
    expect(report.checked).toBe(4);
    expect(report.violations).toHaveLength(2);
    expect(report.violations[0].message).toBe(
      'x <= y modified its arguments (before: x = {"tags": Set {"a"}}, y = {"tags": Set {"a"}}) for x = {"tags": Set {"a", "leak"}}, y = {"tags": Set {"a", "leak"}}',
    );
    expect(report.violations[1].message).toBe(
      'x <= y modified its arguments (before: x = {"tags": Set {"a", "leak"}}, y = {"tags": Set {"b"}}) for x = {"tags": Set {"a", "leak"}}, y = {"tags": Set {"b", "leak"}}',
    );
  });

  it("uses a given configuration", () => {
    const config = new LawCheckConfig({
      options: { laws: ["reflexivity"], verbosity: "quiet" },
    });
    const report = new LawChecker(maxSamples(), { config }).check();
    expect(report.checked).toBe(3);
  });

  it("rejects an empty list of samples", () => {
    expect(() => new LawChecker<MaxIntLattice>([], { logger })).toThrow(
      "At least one sample value is required",
    );
  });

  it("logs violations and summaries", () => {
    const debugLogger = new DebugLogger(true);
    new LawChecker([new SumLattice(1)], {
      logger: debugLogger,
      options: { laws: ["idempotence"] },
    }).check();
    expect(debugLogger.getJsonLogs()).toEqual({
      debug: ["[idempotence] 1 cases, 1 violations"],
      info: ["Found 1 law violations in 1 cases"],
      warn: ["[idempotence] join(x, x) != x for x = 1"],
      error: [],
    });
  });
});

describe("assertJoinLaws", () => {
  it("returns the report of a lawful lattice", () => {
    const report = assertJoinLaws(
      [new SetUnionLattice([1]), new SetUnionLattice([1, 2])],
      { options: { verbosity: "quiet" } },
    );
    // 2 + 4 + 8 + 2 + 4 + 8 + 4 + 4
    expect(report.checked).toBe(36);
  });

  it("throws listing the violations", () => {
    expect(() =>
      assertJoinLaws([new SumLattice(1), new SumLattice(2)], {
        options: { laws: ["idempotence"], verbosity: "quiet" },
      }),
    ).toThrow(
      [
        "Execution Error:",
        "Join-semilattice laws do not hold:",
        "- idempotence: join(x, x) != x for x = 1",
        "- idempotence: join(x, x) != x for x = 2",
      ].join("\n"),
    );
  });
});
