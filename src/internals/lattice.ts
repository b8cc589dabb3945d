export * from "./lattice/common";
export * from "./lattice/compare";
export * from "./lattice/join";
export * from "./lattice/laws";
