export class MeshError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MeshError";
  }
}

export class ConfigError extends MeshError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** An exception was set on an option whose scope does not allow one. */
export class ScopeError extends ConfigError {
  option: string;
  constructor(option: string, message: string) {
    super(message);
    this.option = option;
    this.name = "ScopeError";
  }
}

export class NestingError extends MeshError {
  constructor(message: string) {
    super(message);
    this.name = "NestingError";
  }
}

export class CompileError extends MeshError {
  value?: unknown;
  nearest?: number;
  constructor(message: string, details: { value?: unknown; nearest?: number } = {}) {
    super(message);
    this.value = details.value;
    this.nearest = details.nearest;
    this.name = "CompileError";
  }
}

export class ResultFormatError extends MeshError {
  entity?: string;
  constructor(message: string, entity?: string) {
    super(entity ? `${entity}: ${message}` : message);
    this.entity = entity;
    this.name = "ResultFormatError";
  }
}

// Fault bits the interpreter ORs into the first word of its result buffer.
export const FAULT_BITS = {
  STILL_RUNNING: 1 << 0,
  MALLOC: 1 << 1,
  DMA: 1 << 2,
  UNKNOWN_COMMAND: 1 << 3,
  BAD_ARGUMENTS: 1 << 4,
  DEADLINE_MISSED: 1 << 5,
  MOST_DEADLINES_MISSED: 1 << 6,
} as const;

export type Fault = keyof typeof FAULT_BITS;

const FAULT_ORDER: Fault[] = [
  "STILL_RUNNING",
  "MALLOC",
  "DMA",
  "UNKNOWN_COMMAND",
  "BAD_ARGUMENTS",
  "DEADLINE_MISSED",
  "MOST_DEADLINES_MISSED",
];

const KNOWN_FAULT_MASK = FAULT_ORDER.reduce((mask, fault) => mask | FAULT_BITS[fault], 0);

export const decodeFaults = (word: number, entity?: string): Set<Fault> => {
  const unknown = (word >>> 0) & ~KNOWN_FAULT_MASK;
  if (unknown !== 0) {
    throw new ResultFormatError(
      `fault word 0x${(word >>> 0).toString(16).padStart(8, "0")} has unrecognised bits 0x${(unknown >>> 0)
        .toString(16)
        .padStart(8, "0")}`,
      entity,
    );
  }
  return new Set(FAULT_ORDER.filter((fault) => (word & FAULT_BITS[fault]) !== 0));
};

export const sortFaults = (faults: Iterable<Fault>): Fault[] => {
  const present = new Set(faults);
  return FAULT_ORDER.filter((fault) => present.has(fault));
};

/**
 * Raised when the interpreters reported faults. The complete decoded results
 * are attached so they can still be inspected.
 */
export class RuntimeFaultError<R extends { faults: Set<Fault> } = { faults: Set<Fault> }> extends MeshError {
  results: R;
  constructor(results: R) {
    const names = sortFaults(results.faults).map((fault) => `FAULT_${fault}`);
    super(`interpreters reported ${names.length === 1 ? "a fault" : "faults"}: ${names.join(", ")}`);
    this.results = results;
    this.name = "RuntimeFaultError";
  }
}
