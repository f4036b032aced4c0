/*
Debug logger for the estimator.

This is an implementation of basically how winston works,
but using the vastly simpler super-popular debug module.
*/

// setting env var must come *BEFORE* debug is loaded the first time
process.env.DEBUG_HIDE_DATE = "yes"; // since we supply it ourselves

import debug, { type Debugger } from "debug";
import { createWriteStream, mkdirSync, type WriteStream } from "fs";
import { format, inspect } from "util";
import { dirname, join } from "path";
import { logs } from "./data";

const COSTCALC = debug("costcalc");

function myFormat(...args: unknown[]): string {
  if (args.length > 1 && typeof args[0] == "string" && !args[0].includes("%")) {
    const v: string[] = [];
    for (const x of args) {
      v.push(
        typeof x == "object" && x != null
          ? inspect(x, { depth: 4, breakLength: 120 })
          : `${x}`,
      );
    }
    return v.join(" ");
  }
  return format(...args);
}

function defaultTransports(): { console?: boolean; file?: string } {
  if (process.env.COSTCALC_TEST) {
    return {};
  } else if (process.env.NODE_ENV == "production") {
    return { console: true };
  } else {
    return { file: join(logs, "log") };
  }
}

function initTransports() {
  if (!process.env.DEBUG) {
    return;
  }
  const transports = defaultTransports();
  if (process.env.DEBUG_CONSOLE) {
    transports.console =
      process.env.DEBUG_CONSOLE != "no" && process.env.DEBUG_CONSOLE != "false";
  }
  if (process.env.DEBUG_FILE != null) {
    transports.file = process.env.DEBUG_FILE;
  }
  let fileStream: WriteStream | undefined = undefined;
  if (transports.file) {
    mkdirSync(dirname(transports.file), { recursive: true });
    // a single append stream keeps lines in order
    fileStream = createWriteStream(transports.file, { flags: "a" });
  }
  COSTCALC.log = (...args: unknown[]) => {
    if (!fileStream && !transports.console) return;
    const line = `${new Date().toISOString()} (${process.pid}):${myFormat(...args)}\n`;
    if (transports.console) {
      console.log(line);
    }
    fileStream?.write(line);
  };
}

initTransports();

const DEBUGGERS = {
  error: COSTCALC.extend("error"),
  warn: COSTCALC.extend("warn"),
  info: COSTCALC.extend("info"),
  http: COSTCALC.extend("http"),
  verbose: COSTCALC.extend("verbose"),
  debug: COSTCALC.extend("debug"),
  silly: COSTCALC.extend("silly"),
};

export type Level = keyof typeof DEBUGGERS;

type LogFunction = (...args: unknown[]) => void;

export class Logger {
  private readonly name: string;
  private readonly debuggers: { [level in Level]: Debugger };

  readonly error: LogFunction;
  readonly warn: LogFunction;
  readonly info: LogFunction;
  readonly http: LogFunction;
  readonly verbose: LogFunction;
  readonly debug: LogFunction;
  readonly silly: LogFunction;

  constructor(name: string) {
    this.name = name;
    this.debuggers = {
      error: DEBUGGERS.error.extend(name),
      warn: DEBUGGERS.warn.extend(name),
      info: DEBUGGERS.info.extend(name),
      http: DEBUGGERS.http.extend(name),
      verbose: DEBUGGERS.verbose.extend(name),
      debug: DEBUGGERS.debug.extend(name),
      silly: DEBUGGERS.silly.extend(name),
    };
    this.error = this.logger("error");
    this.warn = this.logger("warn");
    this.info = this.logger("info");
    this.http = this.logger("http");
    this.verbose = this.logger("verbose");
    this.debug = this.logger("debug");
    this.silly = this.logger("silly");
  }

  private logger(level: Level): LogFunction {
    const d = this.debuggers[level];
    return (...args: unknown[]) => {
      const [first, ...rest] = args;
      d(first, ...rest);
    };
  }

  isEnabled(level: Level): boolean {
    return this.debuggers[level].enabled;
  }

  extend(name: string): Logger {
    return getLogger(`${this.name}:${name}`);
  }
}

const cache: { [name: string]: Logger } = {};
export default function getLogger(name: string): Logger {
  return (cache[name] ??= new Logger(name));
}

export { getLogger };
