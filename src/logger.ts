import { createWriteStream, mkdirSync, existsSync } from "fs";
import { dirname } from "path";
import type { WriteStream } from "fs";

export type LogLevel = "silent" | "error" | "warn" | "info";

const levelRank: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
};

let stream: WriteStream | null = null;
let consoleLevel: LogLevel = "info";

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

/** Mirror every log line into `logPath`, regardless of the console level. */
export function initLogger(logPath: string): void {
  const dir = dirname(logPath);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  stream = createWriteStream(logPath, { flags: "w" });
  stream.write(`=== timing repair started ${new Date().toISOString()} ===\n`);
}

export function closeLogger(): void {
  stream?.end();
  stream = null;
}

export function setLogLevel(level: LogLevel): void {
  consoleLevel = level;
}

function enabled(level: LogLevel): boolean {
  return levelRank[level] <= levelRank[consoleLevel];
}

function write(level: string, msg: string): void {
  stream?.write(`${ts()} [${level}] ${msg}\n`);
}

export function log(msg: string): void {
  if (enabled("info")) console.log(`${ts()} ${msg}`);
  write("INFO", msg);
}

export function warn(msg: string): void {
  if (enabled("warn")) console.warn(`${ts()} [WARN] ${msg}`);
  write("WARN", msg);
}

export function error(msg: string, err?: unknown): void {
  const detail = err
    ? ` ${err instanceof Error ? err.stack || err.message : String(err)}`
    : "";
  if (enabled("error")) console.error(`${ts()} [ERROR] ${msg}${detail}`);
  write("ERROR", `${msg}${detail}`);
}
