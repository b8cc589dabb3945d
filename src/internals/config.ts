import {
  ExecutionException,
  errorMessage,
  throwZodError,
} from "./exceptions";
import { DebugLogger, Logger, QuietLogger } from "./logger";
import * as fs from "fs";
import { z } from "zod";

/**
 * Names of the properties checked by the law checker.
 */
export const LAW_NAMES = [
  "idempotence",
  "commutativity",
  "associativity",
  "reflexivity",
  "antisymmetry",
  "transitivity",
  "equalityConsistency",
  "nonMutation",
] as const;

export type LawName = (typeof LAW_NAMES)[number];

const VerbositySchema = z.enum(["quiet", "debug", "default"]);

export type Verbosity = z.infer<typeof VerbositySchema>;

const LawCheckConfigSchema = z
  .object({
    laws: z.array(z.enum(LAW_NAMES)).nonempty().optional(),
    maxViolations: z.number().int().positive().optional().default(10),
    verbosity: VerbositySchema.optional().default("default"),
  })
  .strict();

export type LawCheckOptions = z.input<typeof LawCheckConfigSchema>;

/**
 * Settings of a join-law check, read from inline options and/or a JSON file.
 */
export class LawCheckConfig {
  public laws: LawName[];
  public maxViolations: number;
  public verbosity: Verbosity;

  /**
   * @param configPath JSON file with the options. Inline `options` take
   *        precedence over its entries.
   */
  constructor({
    configPath = undefined,
    options = {},
  }: Partial<{
    configPath: string;
    options: LawCheckOptions;
  }> = {}) {
    let configData: unknown = options;
    if (configPath) {
      let fileData: unknown;
      try {
        fileData = JSON.parse(fs.readFileSync(configPath, "utf8"));
      } catch (err) {
        throw ExecutionException.make(
          `Could not load or parse config file (${configPath}): ${errorMessage(err)}`,
        );
      }
      if (typeof fileData !== "object" || fileData === null) {
        throw ExecutionException.make(
          `Config file (${configPath}) must contain a JSON object`,
        );
      }
      configData = { ...fileData, ...options };
    }

    const result = LawCheckConfigSchema.safeParse(configData);
    if (!result.success) {
      throwZodError(result.error, { msg: "Configuration error:" });
    }
    const parsed = result.data;
    this.laws = parsed.laws ? [...new Set(parsed.laws)] : [...LAW_NAMES];
    this.maxViolations = parsed.maxViolations;
    this.verbosity = parsed.verbosity;
  }

  /**
   * Creates the logger matching the configured verbosity.
   */
  public createLogger(): Logger {
    switch (this.verbosity) {
      case "quiet":
        return new QuietLogger();
      case "debug":
        return new DebugLogger();
      case "default":
        return new Logger();
    }
  }
}
