import { beforeEach, describe, expect, it } from "vitest";
import { resolveMeshConfig } from "../server/config/env";
import { Experiment } from "../server/services/mesh/experiment";
import {
  __resetRunLogStore,
  appendRunLog,
  getRunLogs,
  subscribeRunLogs,
  withRunLog,
  withRunLogAsync,
  type RunLogRecord,
} from "../server/services/observability/run-log-store";

describe("run log store", () => {
  beforeEach(() => {
    __resetRunLogStore();
  });

  it("returns the most recent entries first", () => {
    appendRunLog({ stage: "load", subject: "first", durationMs: 1, ok: true });
    const second = appendRunLog({ stage: "read", subject: "second", durationMs: 2, ok: true });
    expect(second.seq).toBeGreaterThan(0);
    expect(getRunLogs().map((entry) => entry.subject)).toEqual(["second", "first"]);
    expect(getRunLogs({ limit: 1 }).map((entry) => entry.subject)).toEqual(["second"]);
    expect(getRunLogs({ stage: "load" }).map((entry) => entry.subject)).toEqual(["first"]);
  });

  it("logs failures and rethrows them", () => {
    expect(() =>
      withRunLog("decode", "broken", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    const [entry] = getRunLogs();
    expect(entry).toMatchObject({ stage: "decode", subject: "broken", ok: false, error: "Error: boom" });
  });

  it("describes successful async work", async () => {
    const value = await withRunLogAsync("place", "grid", async () => 42, (result) => `placed ${result}`);
    expect(value).toBe(42);
    expect(getRunLogs()[0]).toMatchObject({ stage: "place", ok: true, detail: "placed 42" });
  });

  it("notifies subscribers until they unsubscribe", () => {
    const seen: RunLogRecord[] = [];
    const unsubscribe = subscribeRunLogs((entry) => seen.push(entry));
    appendRunLog({ stage: "phase", subject: "p0", durationMs: 0, ok: true });
    unsubscribe();
    appendRunLog({ stage: "phase", subject: "p1", durationMs: 0, ok: true });
    expect(seen.map((entry) => entry.subject)).toEqual(["p0"]);
  });

  it("records one compile entry per entity", () => {
    const experiment = new Experiment();
    const a = experiment.newEntity({ name: "a" });
    const b = experiment.newEntity({ name: "b" });
    experiment.newFlow(a, b);
    experiment.placements = new Map([
      [a, { x: 0, y: 0 }],
      [b, { x: 0, y: 0 }],
    ]);
    experiment.compile();
    const entries = getRunLogs({ stage: "compile" });
    expect(entries.map((entry) => [entry.subject, entry.ok])).toEqual([
      ["b", true],
      ["a", true],
    ]);
  });
});

describe("resolveMeshConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveMeshConfig({})).toEqual({
      csvNa: "NA",
      csvSeparator: ",",
      ignoreDeadlineErrors: false,
      phaseTimeoutMs: 60_000,
      logStdout: true,
      logBufferSize: 200,
    });
  });

  it("parses switches and clamps sizes", () => {
    const config = resolveMeshConfig({
      MESH_CSV_NA: "",
      MESH_CSV_SEPARATOR: "tab",
      MESH_IGNORE_DEADLINE_ERRORS: "yes",
      MESH_PHASE_TIMEOUT_MS: "-3",
      MESH_LOG_STDOUT: "off",
      MESH_LOG_BUFFER_SIZE: "5",
    });
    expect(config).toEqual({
      csvNa: "",
      csvSeparator: "\t",
      ignoreDeadlineErrors: true,
      phaseTimeoutMs: 60_000,
      logStdout: false,
      logBufferSize: 25,
    });
    expect(resolveMeshConfig({ MESH_LOG_BUFFER_SIZE: "5000" }).logBufferSize).toBe(1000);
    expect(resolveMeshConfig({ MESH_LOG_BUFFER_SIZE: "abc" }).logBufferSize).toBe(200);
    expect(resolveMeshConfig({ MESH_PHASE_TIMEOUT_MS: "1500.7" }).phaseTimeoutMs).toBe(1500);
  });
});
