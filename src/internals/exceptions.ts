import JSONbig from "json-bigint";
import { ZodError } from "zod";

const SEPARATOR =
  "============================================================";

/**
 * Stringifies a value attached to an error report, keeping bigints intact.
 */
function stringifyNode(node: unknown): string {
  try {
    return JSONbig.stringify(node, null, 2);
  } catch (jsonError) {
    return `[Unable to stringify object: ${jsonError}]`;
  }
}

/**
 * Internal error, typically caused by a bug in joinlat or incorrect API usage.
 */
export class InternalException {
  private constructor() {}
  static make(
    msg: string,
    {
      node = undefined,
    }: Partial<{
      node: unknown;
    }> = {},
  ): Error {
    const errorKind = "Internal Error:";
    return new Error(
      [
        errorKind,
        msg,
        ...(node === undefined ? [] : [SEPARATOR, stringifyNode(node)]),
      ].join("\n"),
    );
  }
}

/**
 * An error caused by incorrect actions of the user, such as a wrong
 * configuration or an invalid argument to a library function.
 */
export class ExecutionException {
  private constructor() {}
  static make(msg: string): Error {
    return new Error(["Execution Error:", msg].join("\n"));
  }
}

/**
 * Throws an ExecutionException with a human-readable ZodError message.
 * @param err The ZodError to throw.
 */
export function throwZodError(
  err: unknown,
  {
    msg = undefined,
  }: Partial<{ msg: string }> = {},
): never {
  if (err instanceof ZodError) {
    const formattedErrors = err.errors
      .map((e) => {
        const path = e.path.length ? e.path.join(" > ") : "root";
        return `- ${e.message} at ${path}`;
      })
      .join("\n");
    throw ExecutionException.make(
      `${msg ? msg + "\n" : ""}${formattedErrors}`,
    );
  } else {
    throw err;
  }
}

/**
 * Returns the message of a caught value. Errors raised by Node's own modules
 * may come from another realm and fail `instanceof Error`, so anything with a
 * string `message` counts.
 */
export function errorMessage(err: unknown): string {
  if (
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
  ) {
    return err.message;
  }
  return String(err);
}
