import { Logger, LogFields, LogLevel, Reporter } from "../src/observability";

export interface ReportedLine {
  level: LogLevel;
  msg: string;
  fields?: LogFields;
}

export class RecordingReporter implements Reporter {
  readonly lines: ReportedLine[] = [];

  report(level: LogLevel, msg: string, fields?: LogFields): void {
    this.lines.push({ level, msg, fields });
  }

  messages(): string[] {
    return this.lines.map((line) => line.msg);
  }
}

export function silentLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test" }, () => undefined);
}
