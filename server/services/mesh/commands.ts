import { Buffer } from "node:buffer";
import { counterMask, type Counter } from "@shared/mesh-counters";
import type { TRouterTimeout } from "@shared/mesh-options";
import { CompileError } from "./errors";

export const OPCODES = {
  EXIT: 0x00,
  SLEEP: 0x01,
  BARRIER: 0x02,
  SEED: 0x03,
  TIMESTEP: 0x04,
  RUN: 0x05,
  NUM: 0x06,
  ROUTER_TIMEOUT: 0x07,
  ROUTER_TIMEOUT_RESTORE: 0x08,
  REINJECTION_ENABLE: 0x09,
  REINJECTION_DISABLE: 0x0a,
  RUN_NO_RECORD: 0x0b,
  RECORD: 0x10,
  RECORD_INTERVAL: 0x11,
  PROBABILITY: 0x20,
  BURST_PERIOD: 0x21,
  BURST_DUTY: 0x22,
  BURST_PHASE: 0x23,
  SOURCE_KEY: 0x24,
  PAYLOAD: 0x25,
  NO_PAYLOAD: 0x26,
  NUM_RETRIES: 0x27,
  NUM_PACKETS: 0x28,
  CONSUME: 0x30,
  NO_CONSUME: 0x31,
  SINK_KEY: 0x32,
} as const;

export type Opcode = keyof typeof OPCODES;

export type Instruction = {
  opcode: Opcode;
  index?: number;
  operand?: number;
};

const UINT32_MAX = 0xffffffff;
const KEY_MASK = 0xffffff00;
const NS_PER_SECOND = 1e9;
const US_PER_SECOND = 1e6;

// --- Router wait times --------------------------------------------------------
// Eight bits: a 4-bit mantissa (bits 0-3) and a 4-bit exponent (bits 4-7).

export const decodeWaitTime = (encoded: number): number => {
  const mantissa = encoded & 0xf;
  const exponent = (encoded >> 4) & 0xf;
  if (exponent <= 4) {
    return (mantissa + 16 - 2 ** (4 - exponent)) * 2 ** exponent;
  }
  return (mantissa + 16) * 2 ** exponent;
};

const WAIT_TIME_CODES = new Map<number, number>(
  Array.from({ length: 256 }, (_, encoded) => [decodeWaitTime(encoded), encoded]),
);

export const nearestWaitTime = (cycles: number): number => {
  let best = 0;
  for (const candidate of WAIT_TIME_CODES.keys()) {
    if (Math.abs(candidate - cycles) < Math.abs(best - cycles)) {
      best = candidate;
    }
  }
  return best;
};

export const encodeWaitTime = (cycles: number): number => {
  const encoded = WAIT_TIME_CODES.get(cycles);
  if (encoded === undefined) {
    const nearest = nearestWaitTime(cycles);
    throw new CompileError(
      `router wait time of ${cycles} cycles is not supported; the nearest supported value is ${nearest}`,
      { value: cycles, nearest },
    );
  }
  return encoded;
};

export const routerTimeoutWord = (timeout: TRouterTimeout): number => {
  const [wait1, wait2] = typeof timeout === "number" ? [timeout, 0] : timeout;
  return ((encodeWaitTime(wait1) << 16) | (encodeWaitTime(wait2) << 24)) >>> 0;
};

// --- Unit conversion ----------------------------------------------------------

export const probabilityWord = (probability: number): number => {
  if (!(probability >= 0 && probability <= 1)) {
    throw new CompileError(`probability ${probability} is outside [0, 1]`, { value: probability });
  }
  if (probability === 1) return UINT32_MAX;
  return Math.round(probability * UINT32_MAX);
};

/**
 * Convert a quantity to whole units, rejecting anything that is not an exact
 * multiple beyond floating-point noise.
 */
export const toWholeUnits = (quantity: number, unit: number, what: string, unitName: string): number => {
  const exact = quantity / unit;
  const nearest = Math.round(exact);
  if (Math.abs(exact - nearest) > 1e-9 * Math.max(1, Math.abs(exact))) {
    const nearestQuantity = nearest * unit;
    throw new CompileError(
      `${what} of ${quantity}s is not a whole number of ${unitName}; the nearest representable value is ${nearestQuantity}s`,
      { value: quantity, nearest: nearestQuantity },
    );
  }
  if (nearest < 0 || nearest > UINT32_MAX) {
    throw new CompileError(`${what} of ${quantity}s does not fit in 32 bits of ${unitName}`, { value: quantity });
  }
  return nearest;
};

// --- Instruction stream -------------------------------------------------------

type SourceShadow = {
  probability: number;
  burstPeriodSeconds: number;
  burstDuty: number;
  burstPhase: number | null;
  burstPeriodSteps: number;
  burstDutySteps: number;
  burstPhaseSteps: number;
  /** Set by a timestep change; the next burst request resends all three words. */
  burstStale: boolean;
  key: number;
  payload: boolean;
  numRetries: number;
  numPackets: number;
};

type SinkShadow = { key: number };

const freshSource = (): SourceShadow => ({
  probability: 0,
  burstPeriodSeconds: 0,
  burstDuty: 0,
  burstPhase: 0,
  burstPeriodSteps: 0,
  burstDutySteps: 0,
  burstPhaseSteps: 0,
  burstStale: false,
  key: 0,
  payload: false,
  numRetries: 0,
  numPackets: 1,
});

export type CommandsOptions = {
  /** Uniform [0, 1) source used for automatic seeds and random burst phases. */
  random?: () => number;
};

/**
 * An interpreter program under construction.
 *
 * Tracks the last value sent for every piece of interpreter state and only
 * emits an instruction when a request would change it. Initial shadow values
 * match the interpreter's reset state, except the timestep and seed, which
 * are always sent the first time.
 */
export class Commands {
  readonly words: number[] = [];
  readonly instructions: Instruction[] = [];

  private readonly random: () => number;
  private exited = false;
  private sources: SourceShadow[] | null = null;
  private sinks: SinkShadow[] | null = null;

  private seedValue: number | undefined;
  private timestepNs: number | undefined;
  private recordIntervalSeconds = 0;
  private recordIntervalSteps = 0;
  private recordIntervalStale = false;
  private recordMask = 0;
  private consuming = true;
  private routerTimeoutValue: number | null = null;
  private reinjecting = false;

  constructor(options: CommandsOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  get size(): number {
    return 4 * (this.words.length + 1);
  }

  get isExited(): boolean {
    return this.exited;
  }

  /** `[byte length][words...]`, little-endian. */
  pack(): Buffer {
    const buffer = Buffer.alloc(this.size);
    buffer.writeUInt32LE(this.words.length * 4, 0);
    this.words.forEach((word, i) => buffer.writeUInt32LE(word >>> 0, 4 * (i + 1)));
    return buffer;
  }

  count(opcode: Opcode): number {
    return this.instructions.filter((instruction) => instruction.opcode === opcode).length;
  }

  exit(): void {
    this.flushStale();
    this.emit("EXIT");
    this.exited = true;
  }

  sleep(seconds: number): void {
    this.flushStale();
    this.emit("SLEEP", toWholeUnits(seconds, 1 / US_PER_SECOND, "sleep", "microseconds"));
  }

  barrier(): void {
    this.flushStale();
    this.emit("BARRIER");
  }

  /** A null seed always draws a fresh random seed. */
  seed(seed: number | null = null): void {
    if (seed === null) {
      const drawn = Math.floor(this.random() * 0x100000000) >>> 0;
      this.emit("SEED", drawn);
      this.seedValue = drawn;
      return;
    }
    if (seed === this.seedValue) return;
    this.emit("SEED", seed >>> 0);
    this.seedValue = seed >>> 0;
  }

  timestep(seconds: number): void {
    const ns = toWholeUnits(seconds, 1 / NS_PER_SECOND, "timestep", "nanoseconds");
    if (ns === 0) {
      throw new CompileError("timestep must be at least one nanosecond", { value: seconds });
    }
    if (ns === this.timestepNs) return;
    this.emit("TIMESTEP", ns);
    this.timestepNs = ns;

    // Timestep-relative state is resent before the interpreter next runs,
    // unless new values arrive first
    if (this.recordIntervalSeconds !== 0) this.recordIntervalStale = true;
    this.sources?.forEach((source) => {
      if (source.burstPeriodSeconds !== 0) source.burstStale = true;
    });
  }

  run(seconds: number, record = true): void {
    this.flushStale();
    this.emit(record ? "RUN" : "RUN_NO_RECORD", this.toSteps(seconds, "run duration"));
  }

  num(numSources: number, numSinks: number): void {
    if (this.sources !== null) {
      throw new CompileError("the number of sources and sinks can only be set once");
    }
    for (const [what, value] of [
      ["sources", numSources],
      ["sinks", numSinks],
    ] as const) {
      if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
        throw new CompileError(`number of ${what} (${value}) must be an integer in [0, 65535]`, { value });
      }
    }
    this.emit("NUM", (numSources | (numSinks << 16)) >>> 0);
    this.sources = Array.from({ length: numSources }, freshSource);
    this.sinks = Array.from({ length: numSinks }, () => ({ key: 0 }));
  }

  routerTimeout(timeout: TRouterTimeout | null): void {
    if (timeout === null) {
      if (this.routerTimeoutValue !== null) this.routerTimeoutRestore();
      return;
    }
    const word = routerTimeoutWord(timeout);
    if (word === this.routerTimeoutValue) return;
    this.emit("ROUTER_TIMEOUT", word);
    this.routerTimeoutValue = word;
  }

  routerTimeoutRestore(): void {
    this.emit("ROUTER_TIMEOUT_RESTORE");
    this.routerTimeoutValue = null;
  }

  reinject(enabled: boolean): void {
    if (enabled === this.reinjecting) return;
    this.emit(enabled ? "REINJECTION_ENABLE" : "REINJECTION_DISABLE");
    this.reinjecting = enabled;
  }

  record(counters: Iterable<Counter> = []): void {
    const mask = counterMask(counters);
    if (mask === this.recordMask) return;
    this.emit("RECORD", mask);
    this.recordMask = mask;
  }

  recordInterval(seconds: number): void {
    const steps = seconds === 0 ? 0 : this.toSteps(seconds, "record interval");
    this.recordIntervalSeconds = seconds;
    this.recordIntervalStale = false;
    if (steps === this.recordIntervalSteps) return;
    this.emit("RECORD_INTERVAL", steps);
    this.recordIntervalSteps = steps;
  }

  probability(source: number, probability: number): void {
    const shadow = this.source(source);
    const word = probabilityWord(probability);
    if (word === shadow.probability) return;
    this.emit("PROBABILITY", word, source);
    shadow.probability = word;
  }

  /**
   * A zero period disables bursting. A null phase picks a random phase every
   * time it is requested.
   */
  burst(source: number, periodSeconds: number, duty: number, phase: number | null): void {
    const shadow = this.source(source);
    if (shadow.burstStale) {
      shadow.burstStale = false;
      this.emitBurst(source, periodSeconds, duty, phase);
      return;
    }
    if (periodSeconds === 0 && shadow.burstPeriodSteps === 0) {
      shadow.burstPeriodSeconds = 0;
      shadow.burstDuty = duty;
      shadow.burstPhase = phase;
      return;
    }
    this.emitBurst(source, periodSeconds, duty, phase, shadow.burstPeriodSteps);
  }

  sourceKey(source: number, key: number): void {
    const shadow = this.source(source);
    const masked = (key & KEY_MASK) >>> 0;
    if (masked === shadow.key) return;
    this.emit("SOURCE_KEY", masked, source);
    shadow.key = masked;
  }

  payload(source: number, payload: boolean): void {
    const shadow = this.source(source);
    if (payload === shadow.payload) return;
    this.emit(payload ? "PAYLOAD" : "NO_PAYLOAD", undefined, source);
    shadow.payload = payload;
  }

  numRetries(source: number, retries: number): void {
    const shadow = this.source(source);
    const value = this.count32(retries, "number of retries");
    if (value === shadow.numRetries) return;
    this.emit("NUM_RETRIES", value, source);
    shadow.numRetries = value;
  }

  numPackets(source: number, packets: number): void {
    const shadow = this.source(source);
    const value = this.count32(packets, "number of packets");
    if (value === shadow.numPackets) return;
    this.emit("NUM_PACKETS", value, source);
    shadow.numPackets = value;
  }

  consume(consume: boolean): void {
    if (consume === this.consuming) return;
    this.emit(consume ? "CONSUME" : "NO_CONSUME");
    this.consuming = consume;
  }

  sinkKey(sink: number, key: number): void {
    const shadow = this.sink(sink);
    const masked = (key & KEY_MASK) >>> 0;
    if (masked === shadow.key) return;
    this.emit("SINK_KEY", masked, sink);
    shadow.key = masked;
  }

  /**
   * Emit whichever burst parameters changed. Passing no previous period
   * (as on a timestep change) resends all three.
   */
  private emitBurst(
    source: number,
    periodSeconds: number,
    duty: number,
    phase: number | null,
    previousPeriodSteps?: number,
  ): void {
    const shadow = this.source(source);
    const periodSteps = this.toSteps(periodSeconds, "burst period");
    const dutySteps = this.toSteps(periodSeconds * duty, "burst duty");
    const phaseSteps =
      phase === null
        ? Math.floor(this.random() * periodSteps)
        : this.toSteps(periodSeconds * phase, "burst phase");

    const all = previousPeriodSteps === undefined || periodSteps !== previousPeriodSteps;
    if (all) this.emit("BURST_PERIOD", periodSteps, source);
    if (all || dutySteps !== shadow.burstDutySteps) this.emit("BURST_DUTY", dutySteps, source);
    if (all || phase === null || phaseSteps !== shadow.burstPhaseSteps) {
      this.emit("BURST_PHASE", phaseSteps, source);
    }

    shadow.burstPeriodSeconds = periodSeconds;
    shadow.burstDuty = duty;
    shadow.burstPhase = phase;
    shadow.burstPeriodSteps = periodSteps;
    shadow.burstDutySteps = dutySteps;
    shadow.burstPhaseSteps = phaseSteps;
  }

  /** Re-express stale timestep-relative state in the current timestep. */
  private flushStale(): void {
    if (this.recordIntervalStale) {
      this.recordIntervalStale = false;
      const steps = this.toSteps(this.recordIntervalSeconds, "record interval");
      this.emit("RECORD_INTERVAL", steps);
      this.recordIntervalSteps = steps;
    }
    this.sources?.forEach((source, index) => {
      if (!source.burstStale) return;
      source.burstStale = false;
      this.emitBurst(index, source.burstPeriodSeconds, source.burstDuty, source.burstPhase);
    });
  }

  private toSteps(seconds: number, what: string): number {
    if (this.timestepNs === undefined) {
      throw new CompileError(`the timestep must be set before a ${what} can be converted`);
    }
    return toWholeUnits(seconds, this.timestepNs / NS_PER_SECOND, what, "timesteps");
  }

  private count32(value: number, what: string): number {
    if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
      throw new CompileError(`${what} (${value}) must be an unsigned 32-bit integer`, { value });
    }
    return value;
  }

  private source(index: number): SourceShadow {
    const shadow = this.sources?.[index];
    if (!shadow) {
      throw new CompileError(`source ${index} does not exist (declared ${this.sources?.length ?? 0})`);
    }
    return shadow;
  }

  private sink(index: number): SinkShadow {
    const shadow = this.sinks?.[index];
    if (!shadow) {
      throw new CompileError(`sink ${index} does not exist (declared ${this.sinks?.length ?? 0})`);
    }
    return shadow;
  }

  private emit(opcode: Opcode, operand?: number, index?: number): void {
    if (this.exited) {
      throw new CompileError(`cannot append ${opcode} after EXIT`);
    }
    this.words.push((OPCODES[opcode] | ((index ?? 0) << 8)) >>> 0);
    if (operand !== undefined) this.words.push(operand >>> 0);
    this.instructions.push({ opcode, index, operand });
  }
}
