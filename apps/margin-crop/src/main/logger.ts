import fs from "node:fs/promises";
import path from "node:path";
import { getRunLogDir } from "./run-paths.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoggerConfig = {
  level?: string;
  per_page_logs?: boolean;
  keep_logs?: boolean;
  echo_warnings?: boolean;
};

export type CropLogger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  page: (pageIndex: number, level: LogLevel, message: string, meta?: Record<string, unknown>) => void;
  /** Flushes pending entries and resolves to the number of entries that could not be written. */
  finalize: () => Promise<number>;
};

export const normalizeLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "debug") return "debug";
  if (normalized === "warn" || normalized === "warning") return "warn";
  if (normalized === "error") return "error";
  return "info";
};

const safeStringify = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ message: "Failed to serialize log payload" });
  }
};

const writeLine = async (filePath: string, payload: Record<string, unknown>): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${safeStringify(payload)}\n`);
};

/**
 * JSON-lines logger for one crop run. Writes are queued so entries land in
 * order; `finalize` waits for the queue and never throws, so a broken log
 * directory cannot replace the outcome of the run.
 */
export const createRunLogger = (runDir: string, config?: LoggerConfig): CropLogger => {
  const level = normalizeLevel(config?.level);
  const perPage = config?.per_page_logs ?? false;
  const keepLogs = config?.keep_logs ?? true;
  const echoWarnings = config?.echo_warnings ?? false;
  const logDir = getRunLogDir(runDir);
  const runLogPath = path.join(logDir, "run.log");
  const pageLogDir = path.join(logDir, "pages");

  let queue: Promise<void> = Promise.resolve();
  let failedWrites = 0;

  const enqueue = (filePath: string, payload: Record<string, unknown>): void => {
    queue = queue.then(() =>
      writeLine(filePath, payload).catch(() => {
        failedWrites += 1;
      })
    );
  };

  const shouldLog = (entryLevel: LogLevel): boolean =>
    LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT[level];

  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!shouldLog(entryLevel)) return;
    if (echoWarnings && LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT.warn) {
      // eslint-disable-next-line no-console
      console.warn(`${entryLevel}: ${message}`);
    }
    enqueue(runLogPath, {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...(meta ?? {}),
    });
  };

  const logPage = (
    pageIndex: number,
    entryLevel: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (!perPage || !shouldLog(entryLevel)) return;
    const pageNumber = pageIndex + 1;
    enqueue(path.join(pageLogDir, `page-${pageNumber}.log`), {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      page: pageNumber,
      message,
      ...(meta ?? {}),
    });
  };

  const finalize = async (): Promise<number> => {
    await queue;
    if (!keepLogs) {
      await fs.rm(logDir, { recursive: true, force: true }).catch(() => {
        failedWrites += 1;
      });
    }
    if (failedWrites > 0 && echoWarnings) {
      // eslint-disable-next-line no-console
      console.warn(`warn: Failed to write ${failedWrites} log entries under ${logDir}`);
    }
    return failedWrites;
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    page: logPage,
    finalize,
  };
};

export const createNullLogger = (): CropLogger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  page: () => undefined,
  finalize: async () => 0,
});

/** Collects entries in memory; used where callers need to inspect diagnostics. */
export const createMemoryLogger = (): CropLogger & {
  entries: Array<{ level: LogLevel; message: string; meta?: Record<string, unknown> }>;
} => {
  const entries: Array<{ level: LogLevel; message: string; meta?: Record<string, unknown> }> = [];
  const push = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    entries.push({ level, message, meta });
  };
  return {
    entries,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    page: (pageIndex, level, message, meta) => {
      entries.push({ level, message, meta: { page: pageIndex + 1, ...(meta ?? {}) } });
    },
    finalize: async () => 0,
  };
};
