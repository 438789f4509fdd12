import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export class Logger {
  private fileSinkBroken = false;

  public constructor(
    private readonly verbose: boolean,
    private readonly logFile: string | null = null,
  ) {
    if (this.logFile) {
      mkdirSync(dirname(this.logFile), { recursive: true });
    }
  }

  public info(message: string): void {
    this.print("INFO", message);
  }

  public warn(message: string): void {
    this.print("WARN", message);
  }

  public error(message: string): void {
    this.print("ERROR", message);
  }

  public debug(message: string): void {
    if (!this.verbose) {
      return;
    }
    this.print("DEBUG", message);
  }

  public log(level: LogLevel, message: string): void {
    if (level === "DEBUG") {
      this.debug(message);
      return;
    }
    this.print(level, message);
  }

  private print(level: LogLevel, message: string): void {
    const ts = new Date().toISOString();
    const output = `[${ts}] [${level}] ${this.redact(message)}`;

    if (level === "ERROR") {
      console.error(output);
    } else {
      console.log(output);
    }

    this.appendToFile(output);
  }

  private appendToFile(line: string): void {
    if (!this.logFile || this.fileSinkBroken) {
      return;
    }

    try {
      appendFileSync(this.logFile, `${line}\n`, "utf8");
    } catch (error) {
      // Report once, then keep serving with console output only.
      this.fileSinkBroken = true;
      console.error(`[${new Date().toISOString()}] [ERROR] Log file ${this.logFile} is not writable: ${String(error)}`);
    }
  }

  /**
   * Redacts secret-bearing patterns from log messages:
   * - Authorization headers (`Bearer ...`, `RemoteAuth ...`)
   * - issued registration tokens (`MOCK_REG_...`)
   */
  private redact(message: string): string {
    return String(message)
      .replace(/((?:Bearer|RemoteAuth)\s+)[\w.~+/=-]+/gi, "$1***REDACTED***")
      .replace(/(MOCK_REG_)[A-Za-z0-9+/=]+/g, "$1***REDACTED***");
  }
}
