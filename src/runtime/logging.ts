import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores the console and resolves once the log file is flushed. */
  shutdown(): Promise<void>;
}

type ConsoleMethod = "log" | "debug" | "info" | "warn" | "error";

function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors console output to `logFile` until `shutdown()` is called.
 * Without a file this is a no-op.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => Promise.resolve(),
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- time report session started ---\n`);

  const original: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const mirror = (level: ConsoleMethod) =>
    (...args: unknown[]) => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      const message = args.map(stringify).join(" ");
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
    };

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  let closed: Promise<void> | null = null;
  const shutdown = () => {
    if (closed) return closed;
    console.log = original.log;
    console.debug = original.debug;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    const endedAt = new Date().toISOString();
    stream.write(`[${endedAt}] --- time report session ended ---\n`);
    closed = new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
    return closed;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
