export {
  Lattice,
  LatticeType,
  Latticed,
  IsLattice,
  IsLatticeOver,
  AssertLattice,
  LatticeConstructor,
  Equality,
  equal,
  notEqual,
  leq,
  bottomOf,
  joined,
  joinAll,
  LawChecker,
  LawCheckerParams,
  LawReport,
  LawViolation,
  assertJoinLaws,
} from "./internals/lattice";
export {
  LAW_NAMES,
  LawName,
  LawCheckConfig,
  LawCheckOptions,
  Verbosity,
} from "./internals/config";
export {
  Logger,
  LogLevel,
  LogFunction,
  QuietLogger,
  DebugLogger,
} from "./internals/logger";
export { ExecutionException, InternalException } from "./internals/exceptions";
export { copyValue, valueEquals, formatValue } from "./internals/util";
