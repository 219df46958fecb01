import { resolveMeshConfig } from "../../config/env";

export type RunStage = "place" | "compile" | "load" | "phase" | "read" | "decode";

export type RunLogRecord = {
  id: string;
  seq: number;
  ts: string;
  stage: RunStage;
  subject: string;
  durationMs: number;
  ok: boolean;
  detail?: string;
  error?: string;
};

type RunLogListener = (entry: RunLogRecord) => void;

const config = resolveMeshConfig();
const MAX_BUFFER_SIZE = config.logBufferSize;
const runLogBuffer: RunLogRecord[] = [];
const listeners = new Set<RunLogListener>();
let logSequence = 0;

type AppendEvent = Omit<RunLogRecord, "id" | "seq" | "ts"> & Partial<Pick<RunLogRecord, "ts">>;

export function appendRunLog(event: AppendEvent): RunLogRecord {
  const seq = ++logSequence;
  const record: RunLogRecord = {
    id: String(seq),
    seq,
    ts: event.ts ?? new Date().toISOString(),
    stage: event.stage,
    subject: event.subject,
    durationMs: event.durationMs,
    ok: event.ok,
    detail: event.detail,
    error: event.error ? truncate(event.error, 240) : undefined,
  };
  runLogBuffer.push(record);
  if (runLogBuffer.length > MAX_BUFFER_SIZE) {
    runLogBuffer.splice(0, runLogBuffer.length - MAX_BUFFER_SIZE);
  }
  if (config.logStdout) {
    console.info(JSON.stringify({ type: "mesh_run", ...record }));
  }
  for (const listener of Array.from(listeners)) {
    try {
      listener(record);
    } catch (err) {
      console.warn("[run-log] listener error", err);
    }
  }
  return record;
}

/**
 * Time `fn` and log the outcome under `stage`. Errors are logged and rethrown
 * unchanged.
 */
export function withRunLog<T>(stage: RunStage, subject: string, fn: () => T, describe?: (result: T) => string): T {
  const started = performance.now();
  try {
    const result = fn();
    appendRunLog({
      stage,
      subject,
      durationMs: performance.now() - started,
      ok: true,
      detail: describe?.(result),
    });
    return result;
  } catch (err) {
    appendRunLog({
      stage,
      subject,
      durationMs: performance.now() - started,
      ok: false,
      error: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
    });
    throw err;
  }
}

export async function withRunLogAsync<T>(
  stage: RunStage,
  subject: string,
  fn: () => Promise<T>,
  describe?: (result: T) => string,
): Promise<T> {
  const started = performance.now();
  try {
    const result = await fn();
    appendRunLog({
      stage,
      subject,
      durationMs: performance.now() - started,
      ok: true,
      detail: describe?.(result),
    });
    return result;
  } catch (err) {
    appendRunLog({
      stage,
      subject,
      durationMs: performance.now() - started,
      ok: false,
      error: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
    });
    throw err;
  }
}

type GetRunLogOptions = {
  limit?: number;
  stage?: RunStage;
};

/** Most recent first. */
export function getRunLogs(options?: GetRunLogOptions): RunLogRecord[] {
  const limit = clampLimit(options?.limit);
  const haystack = options?.stage ? runLogBuffer.filter((entry) => entry.stage === options.stage) : [...runLogBuffer];
  if (haystack.length === 0) {
    return [];
  }
  const start = Math.max(0, haystack.length - limit);
  return haystack.slice(start).reverse();
}

export function subscribeRunLogs(listener: RunLogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function __resetRunLogStore(): void {
  runLogBuffer.length = 0;
  listeners.clear();
}

const clampLimit = (value?: number): number => {
  const fallback = 50;
  if (value === undefined || value === null || Number.isNaN(value)) {
    return fallback;
  }
  return Math.min(Math.max(1, Math.floor(value)), MAX_BUFFER_SIZE);
};

const truncate = (value: string, limit: number): string => {
  if (value.length <= limit) {
    return value;
  }
  return `${value.slice(0, Math.max(0, limit - 3))}...`;
};
