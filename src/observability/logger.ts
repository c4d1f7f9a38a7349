import { LogFields, LogLevel, Reporter } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export type LineWriter = (level: LogLevel, line: string) => void;

function writeToConsole(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export class Logger implements Reporter {
  private readonly context: LoggerContext;
  private readonly writeLine: LineWriter;

  constructor(context: LoggerContext, writeLine: LineWriter = writeToConsole) {
    this.context = context;
    this.writeLine = writeLine;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, this.writeLine);
  }

  debug(msg: string, fields?: LogFields): void {
    this.report("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.report("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.report("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.report("error", msg, fields);
  }

  report(level: LogLevel, msg: string, fields?: LogFields): void {
    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writeLine(level, JSON.stringify(payload));
  }
}
