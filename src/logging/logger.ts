/**
 * Process-wide structured logging. One Logger is built at startup and injected
 * into the client and the orchestrator.
 *
 * The production logger is winston with a single file transport:
 *
 *   [2026-01-02 03:04:05] INFO create-shipment: Shipment created
 *   { ...payload as indented JSON... }
 */

import winston from "winston";
import type { WorkflowStep } from "../domain/types.js";
import { serializeForLog } from "./serialize.js";

export type LogLevel = "debug" | "info" | "error";

export interface Logger {
  debug(step: WorkflowStep, message: string, data?: unknown): void;
  info(step: WorkflowStep, message: string, data?: unknown): void;
  error(step: WorkflowStep, message: string, data?: unknown): void;
}

export interface LogEntry {
  level: LogLevel;
  step: WorkflowStep;
  message: string;
  /** Already serialized payload or error */
  data?: unknown;
}

export interface FileLoggerOptions {
  filename: string;
  /** Entries below this level are dropped. Default: info */
  level?: LogLevel;
}

export const LOG_TIMESTAMP_FORMAT = "YYYY-MM-DD HH:mm:ss";

const entryFormat = winston.format.printf(({ timestamp, level, message, step, data }) => {
  const head = `[${String(timestamp)}] ${level.toUpperCase()} ${String(step)}: ${String(message)}\n`;
  if (data === undefined) return head;
  const body = typeof data === "string" ? data : JSON.stringify(data, null, 2);
  return `${head}${body}\n`;
});

/**
 * Logger appending to `filename`; the transport creates the directory.
 * A log file that cannot be written is reported on stderr and never fails the run.
 */
export function createLogger(options: FileLoggerOptions): Logger {
  const logger = winston.createLogger({
    level: options.level ?? "info",
    levels: winston.config.npm.levels,
    format: winston.format.combine(
      winston.format.timestamp({ format: LOG_TIMESTAMP_FORMAT }),
      entryFormat
    ),
    transports: [new winston.transports.File({ filename: options.filename })],
  });
  logger.on("error", (err: unknown) => {
    console.error(`Log file ${options.filename} is not writable:`, err);
  });

  const log = (level: LogLevel) => (step: WorkflowStep, message: string, data?: unknown): void => {
    const meta: Record<string, unknown> = { step };
    if (data !== undefined) meta.data = serializeForLog(data);
    logger.log(level, message, meta);
  };

  return {
    debug: log("debug"),
    info: log("info"),
    error: log("error"),
  };
}

const LEVEL_RANK = winston.config.npm.levels;

/** Keeps entries in memory; the logger handed to components under test */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  constructor(private readonly level: LogLevel = "info") {}

  debug(step: WorkflowStep, message: string, data?: unknown): void {
    this.record("debug", step, message, data);
  }

  info(step: WorkflowStep, message: string, data?: unknown): void {
    this.record("info", step, message, data);
  }

  error(step: WorkflowStep, message: string, data?: unknown): void {
    this.record("error", step, message, data);
  }

  ofLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  messages(): string[] {
    return this.entries.map((e) => e.message);
  }

  private record(level: LogLevel, step: WorkflowStep, message: string, data: unknown): void {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) return;
    const entry: LogEntry = { level, step, message };
    if (data !== undefined) entry.data = serializeForLog(data);
    this.entries.push(entry);
  }
}
