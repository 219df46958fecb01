import type { OptionName, OptionValues } from "@shared/mesh-options";
import type { OptionResolver } from "./resolver";

export type Chip = { x: number; y: number };

export const chipKey = (chip: Chip): string => `${chip.x},${chip.y}`;

export type LabelValue = string | number | boolean | null;

/** Anything option exceptions may be keyed on besides a phase. */
export type OptionOwner = Entity | Flow;

/** The experiment state an accessor reads through. */
export interface OptionContext {
  readonly resolver: OptionResolver;
  readonly currentPhase: Phase | null;
}

/**
 * Read/write view of one option for one owner, evaluated in whichever phase
 * is currently being defined.
 */
export class OptionAccessor<K extends OptionName> {
  constructor(
    private readonly context: OptionContext,
    readonly option: K,
    readonly owner: OptionOwner | null,
  ) {}

  get value(): OptionValues[K] {
    return this.context.resolver.get(this.option, this.context.currentPhase, this.owner);
  }

  set value(value: OptionValues[K]) {
    this.context.resolver.set(this.option, value, this.context.currentPhase, this.owner);
  }
}

export class Entity {
  readonly sourceFlows: Flow[] = [];
  readonly sinkFlows: Flow[] = [];

  constructor(
    private readonly context: OptionContext,
    readonly name: string,
    readonly index: number,
    readonly chip: Chip | null = null,
  ) {}

  option<K extends OptionName>(option: K): OptionAccessor<K> {
    return new OptionAccessor(this.context, option, this);
  }

  toString(): string {
    return this.name;
  }
}

export class Flow {
  constructor(
    private readonly context: OptionContext,
    readonly name: string,
    readonly index: number,
    readonly source: Entity,
    readonly sinks: readonly Entity[],
  ) {}

  get fanOut(): number {
    return this.sinks.length;
  }

  option<K extends OptionName>(option: K): OptionAccessor<K> {
    return new OptionAccessor(this.context, option, this);
  }

  toString(): string {
    return this.name;
  }
}

export class Phase {
  private readonly labelValues = new Map<string, LabelValue>();

  constructor(
    readonly name: string,
    readonly index: number,
  ) {}

  addLabel(name: string, value: LabelValue): this {
    this.labelValues.set(name, value);
    return this;
  }

  get labels(): ReadonlyMap<string, LabelValue> {
    return this.labelValues;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Samples recorded during one phase.
 *
 * With no interval a single sample is taken at the end of the run; an
 * interval longer than the run produces none.
 */
export const numSamples = (duration: number, recordInterval: number): number => {
  if (recordInterval <= 0) return 1;
  // Guard against 0.3 / 0.1 === 2.9999999999999996
  return Math.floor(duration / recordInterval + 1e-9);
};

/** Time between samples of one phase. */
export const samplePeriod = (duration: number, recordInterval: number): number =>
  recordInterval > 0 ? recordInterval : duration;
