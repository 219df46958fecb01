// Centralized environment switches for the experiment pipeline
export type MeshConfig = {
  csvNa: string;
  csvSeparator: string;
  ignoreDeadlineErrors: boolean;
  phaseTimeoutMs: number;
  logStdout: boolean;
  logBufferSize: number;
};

type Env = Record<string, string | undefined>;

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const clampPositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

const parseBufferSize = (raw: string | undefined): number => {
  const requested = Number(raw ?? 200);
  if (!Number.isFinite(requested) || requested < 1) {
    return 200;
  }
  return Math.min(Math.max(25, Math.floor(requested)), 1000);
};

// A separator is taken literally, except the spelled-out "tab".
const parseSeparator = (raw: string | undefined): string => {
  if (!raw) return ",";
  return raw.toLowerCase() === "tab" ? "\t" : raw;
};

export const resolveMeshConfig = (
  env: Env = typeof process !== "undefined" ? process.env : {},
): MeshConfig => ({
  csvNa: env.MESH_CSV_NA ?? "NA",
  csvSeparator: parseSeparator(env.MESH_CSV_SEPARATOR),
  ignoreDeadlineErrors: flagEnabled(env.MESH_IGNORE_DEADLINE_ERRORS, false),
  phaseTimeoutMs: clampPositiveInt(env.MESH_PHASE_TIMEOUT_MS, 60_000),
  logStdout: flagEnabled(env.MESH_LOG_STDOUT, true),
  logBufferSize: parseBufferSize(env.MESH_LOG_BUFFER_SIZE),
});
