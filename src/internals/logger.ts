import { ExecutionException } from "./exceptions";

export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

type MessageType = string | Error;

export type LogFunction = (message: string) => void;

/**
 * Provides a customizable logging mechanism across different levels of verbosity.
 */
export class Logger {
  private logFunctions: Map<LogLevel, LogFunction | undefined>;
  private jsonLogs: Map<LogLevel, string[]>;
  private contexts: string[] = [];

  /**
   * @param logMapping Overrides the default log function of each level.
   *        `undefined` silences the level.
   * @param saveJson Keep messages in memory instead of printing them.
   */
  constructor(
    logMapping?: Partial<Record<LogLevel, LogFunction | undefined>>,
    private saveJson: boolean = false,
  ) {
    this.jsonLogs = new Map([
      [LogLevel.DEBUG, []],
      [LogLevel.INFO, []],
      [LogLevel.WARN, []],
      [LogLevel.ERROR, []],
    ]);
    this.logFunctions = new Map<LogLevel, LogFunction | undefined>([
      [LogLevel.DEBUG, undefined],
      [LogLevel.INFO, console.log],
      [LogLevel.WARN, console.warn],
      [LogLevel.ERROR, console.error],
    ]);
    if (logMapping) {
      Object.entries(logMapping).forEach(([level, func]) => {
        this.logFunctions.set(Number(level), func);
      });
    }
  }

  public getJsonLogs(): Record<string, string[]> {
    if (!this.saveJson) {
      throw ExecutionException.make(
        "JSON logging not enabled for this logger instance",
      );
    }
    return {
      debug: this.jsonLogs.get(LogLevel.DEBUG) ?? [],
      info: this.jsonLogs.get(LogLevel.INFO) ?? [],
      warn: this.jsonLogs.get(LogLevel.WARN) ?? [],
      error: this.jsonLogs.get(LogLevel.ERROR) ?? [],
    };
  }

  /**
   * Runs `fn` with `contextName` prepended to every message it logs.
   * Contexts nest: the innermost one is shown.
   */
  public withContext<T>(contextName: string, fn: () => T): T {
    this.contexts.push(contextName);
    try {
      return fn();
    } finally {
      this.contexts.pop();
    }
  }

  private formatMessage(msg: MessageType): string {
    const context = this.contexts[this.contexts.length - 1];
    const contextPrefix = context === undefined ? "" : `[${context}] `;
    const text = msg instanceof Error ? msg.message : msg;
    return `${contextPrefix}${text}`;
  }

  /**
   * Logs a message at the specified log level if a corresponding log function is defined.
   */
  protected log(level: LogLevel, msg: MessageType): void {
    const logFunction = this.logFunctions.get(level);
    if (logFunction === undefined) {
      return;
    }
    const formatted = this.formatMessage(msg);
    if (this.saveJson) {
      this.jsonLogs.get(level)?.push(formatted);
    } else {
      logFunction(formatted);
    }
  }

  public debug(msg: MessageType): void {
    this.log(LogLevel.DEBUG, msg);
  }

  public info(msg: MessageType): void {
    this.log(LogLevel.INFO, msg);
  }

  public warn(msg: MessageType): void {
    this.log(LogLevel.WARN, msg);
  }

  public error(msg: MessageType): void {
    this.log(LogLevel.ERROR, msg);
  }
}

/**
 * Logger that silences all logs.
 */
export class QuietLogger extends Logger {
  constructor(saveJson: boolean = false) {
    super(
      {
        [LogLevel.INFO]: undefined,
        [LogLevel.WARN]: undefined,
        [LogLevel.ERROR]: undefined,
      },
      saveJson,
    );
  }
}

/**
 * Logger that enables debug level logging to stdout.
 */
export class DebugLogger extends Logger {
  constructor(saveJson: boolean = false) {
    super(
      {
        [LogLevel.DEBUG]: console.log,
      },
      saveJson,
    );
  }
}
