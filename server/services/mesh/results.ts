import {
  compareCounters,
  isChipCounter,
  isPermanentCounter,
  isSinkCounter,
  isSourceCounter,
  type Counter,
} from "@shared/mesh-counters";
import { withRunLog } from "../observability/run-log-store";
import type { RoutingPath } from "./collaborators";
import { decodeFaults, ResultFormatError, type Fault } from "./errors";
import { chipKey, numSamples, samplePeriod, type Chip, type Entity, type Flow, type Phase } from "./model";
import { recordKey, type MeasuredObject, type RecordEntry } from "./record-list";
import type { OptionResolver } from "./resolver";
import { ResultTable, type Row } from "./table";

type Cell = number | null;

export type DecodeContext = {
  entities: readonly Entity[];
  flows: readonly Flow[];
  phases: readonly Phase[];
  resolver: OptionResolver;
  routes?: ReadonlyMap<Flow, RoutingPath>;
  ignoreDeadlineErrors?: boolean;
};

type SampleInfo = {
  phase: Phase;
  time: number;
};

type EntityMatrix = {
  faults: Set<Fault>;
  rows: Cell[][];
  columns: Map<string, number>;
  recordList: readonly RecordEntry[];
};

const DEADLINE_FAULTS: Fault[] = ["DEADLINE_MISSED", "MOST_DEADLINES_MISSED"];

const sumCells = (cells: Iterable<Cell>): Cell => {
  let total = 0;
  for (const cell of cells) {
    if (cell === null) return null;
    total += cell;
  }
  return total;
};

const readWords = (buffer: Uint8Array): number[] => {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  // A trailing partial word is what a cut-short read leaves behind
  const count = Math.floor(buffer.byteLength / 4);
  return Array.from({ length: count }, (_, i) => view.getUint32(i * 4, true));
};

/** Enumerate every sample of every phase in order. */
export const enumerateSamples = (phases: readonly Phase[], resolver: OptionResolver): SampleInfo[] => {
  const samples: SampleInfo[] = [];
  for (const phase of phases) {
    const duration = resolver.get("duration", phase);
    const interval = resolver.get("record_interval", phase);
    const period = samplePeriod(duration, interval);
    const count = numSamples(duration, interval);
    for (let i = 0; i < count; i++) {
      samples.push({ phase, time: (i + 1) * period });
    }
  }
  return samples;
};

/** Result buffer size for one entity, fault word included. */
export const resultBufferSize = (numSamplesTotal: number, recordList: readonly RecordEntry[]): number =>
  4 * (1 + numSamplesTotal * recordList.length);

const decodeMatrix = (
  entity: Entity,
  buffer: Uint8Array,
  recordList: readonly RecordEntry[],
  numSamplesTotal: number,
): EntityMatrix => {
  const words = readWords(buffer);
  if (words.length < 1) {
    throw new ResultFormatError(`result buffer of ${buffer.byteLength} bytes has no fault word`, entity.name);
  }
  const width = recordList.length;
  const counterWords = words.slice(1);
  if (counterWords.length > numSamplesTotal * width) {
    throw new ResultFormatError(
      `result buffer holds ${counterWords.length} counter words but at most ${numSamplesTotal * width} were expected`,
      entity.name,
    );
  }
  const rows: Cell[][] = Array.from({ length: numSamplesTotal }, (_, sample) =>
    Array.from({ length: width }, (_, column) => counterWords[sample * width + column] ?? null),
  );
  const columns = new Map<string, number>();
  recordList.forEach((entry, index) => columns.set(recordKey(entry.object, entry.counter), index));
  return { faults: decodeFaults(words[0] ?? 0, entity.name), rows, columns, recordList };
};

/**
 * Decoded counters for one run.
 *
 * Every view is a read over the per-entity sample matrices; nothing is
 * mutated after decoding.
 */
export class Results {
  readonly faults: Set<Fault>;
  readonly entityFaults: Map<Entity, Set<Fault>>;
  readonly recordedCounters: Counter[];
  readonly labelColumns: string[];

  private readonly samples: SampleInfo[];
  private readonly matrices: Map<Entity, EntityMatrix>;

  constructor(
    private readonly context: DecodeContext,
    matrices: Map<Entity, EntityMatrix>,
    samples: SampleInfo[],
  ) {
    this.matrices = matrices;
    this.samples = samples;

    this.entityFaults = new Map();
    const faults = new Set<Fault>();
    for (const [entity, matrix] of matrices) {
      const own = new Set(
        [...matrix.faults].filter((fault) => !(context.ignoreDeadlineErrors && DEADLINE_FAULTS.includes(fault))),
      );
      this.entityFaults.set(entity, own);
      own.forEach((fault) => faults.add(fault));
    }
    this.faults = faults;

    const counters = new Set<Counter>();
    for (const matrix of matrices.values()) {
      matrix.recordList.forEach((entry) => counters.add(entry.counter));
    }
    this.recordedCounters = [...counters].sort(compareCounters);

    const labels: string[] = [];
    for (const phase of context.phases) {
      for (const key of phase.labels.keys()) {
        if (!labels.includes(key)) labels.push(key);
      }
    }
    this.labelColumns = labels;
  }

  get numSamples(): number {
    return this.samples.length;
  }

  /** Raw counter value, null if the word never arrived, undefined if not recorded. */
  value(entity: Entity, sample: number, object: MeasuredObject, counter: Counter): Cell | undefined {
    const matrix = this.matrices.get(entity);
    const column = matrix?.columns.get(recordKey(object, counter));
    if (!matrix || column === undefined) return undefined;
    return matrix.rows[sample]?.[column] ?? null;
  }

  /** Every recorded counter summed over the whole experiment, per sample. */
  totals(): ResultTable {
    const counters = this.recordedCounters;
    const withIdeal = counters.includes("sent");
    const columns = [...this.commonColumns(), ...counters, ...(withIdeal ? ["ideal_received"] : [])];
    if (counters.length === 0) return new ResultTable(columns, []);

    const rows = this.samples.map((_, sample) => {
      const row = this.commonRow(sample);
      for (const counter of counters) {
        const cells: Cell[] = [];
        for (const matrix of this.matrices.values()) {
          matrix.recordList.forEach((entry, column) => {
            if (entry.counter === counter) cells.push(matrix.rows[sample]?.[column] ?? null);
          });
        }
        row[counter] = sumCells(cells);
      }
      if (withIdeal) {
        row.ideal_received = sumCells(this.context.flows.map((flow) => this.idealReceived(flow, sample)));
      }
      return row;
    });
    return new ResultTable(columns, rows);
  }

  /** Per-entity counters, source and sink counters summed over the entity's own flows. */
  entityTotals(): ResultTable {
    const counters = this.recordedCounters.filter((counter) => !isChipCounter(counter));
    const columns = [...this.commonColumns(), "entity", ...counters];
    if (counters.length === 0) return new ResultTable(columns, []);

    const rows: Row[] = [];
    this.samples.forEach((_, sample) => {
      for (const entity of this.context.entities) {
        const row: Row = { ...this.commonRow(sample), entity };
        for (const counter of counters) {
          row[counter] = this.entityCounter(entity, sample, counter);
        }
        rows.push(row);
      }
    });
    return new ResultTable(columns, rows);
  }

  /** Per-flow counters: the source's sends and the sum over all sinks' receives. */
  flowTotals(): ResultTable {
    const counters = this.recordedCounters.filter((counter) => isSourceCounter(counter) || isSinkCounter(counter));
    const withIdeal = counters.includes("sent");
    const columns = [
      ...this.commonColumns(),
      "flow",
      "fan_out",
      ...counters,
      ...(withIdeal ? ["ideal_received"] : []),
    ];
    if (counters.length === 0) return new ResultTable(columns, []);

    const rows: Row[] = [];
    this.samples.forEach((_, sample) => {
      for (const flow of this.context.flows) {
        const row: Row = { ...this.commonRow(sample), flow, fan_out: flow.fanOut };
        for (const counter of counters) {
          row[counter] = isSourceCounter(counter)
            ? this.flowValue(flow.source, sample, flow, counter)
            : sumCells(flow.sinks.map((sink) => this.flowValue(sink, sample, flow, counter)));
        }
        if (withIdeal) row.ideal_received = this.idealReceived(flow, sample);
        rows.push(row);
      }
    });
    return new ResultTable(columns, rows);
  }

  /** The finest view: one row per (flow, sink) pair. */
  flowCounters(): ResultTable {
    const counters = this.recordedCounters.filter((counter) => isSourceCounter(counter) || isSinkCounter(counter));
    const columns = [...this.commonColumns(), "flow", "source", "sink", "num_hops", ...counters];
    if (counters.length === 0) return new ResultTable(columns, []);

    const rows: Row[] = [];
    this.samples.forEach((_, sample) => {
      for (const flow of this.context.flows) {
        const route = this.context.routes?.get(flow);
        for (const sink of flow.sinks) {
          const row: Row = {
            ...this.commonRow(sample),
            flow,
            source: flow.source,
            sink,
            num_hops: route ? route.hopsTo(sink) : null,
          };
          for (const counter of counters) {
            row[counter] = this.flowValue(isSourceCounter(counter) ? flow.source : sink, sample, flow, counter);
          }
          rows.push(row);
        }
      }
    });
    return new ResultTable(columns, rows);
  }

  /** Router and reinjection counters per chip. */
  routerCounters(): ResultTable {
    const counters = this.recordedCounters.filter(isChipCounter);
    const columns = [...this.commonColumns(), "x", "y", ...counters];
    if (counters.length === 0) return new ResultTable(columns, []);

    const chips: Array<{ chip: Chip; entity: Entity }> = [];
    const seen = new Set<string>();
    for (const entity of this.context.entities) {
      const matrix = this.matrices.get(entity);
      for (const entry of matrix?.recordList ?? []) {
        const object = entry.object;
        if (object.kind !== "chip") continue;
        const key = chipKey(object.chip);
        if (seen.has(key)) break;
        seen.add(key);
        chips.push({ chip: object.chip, entity });
        break;
      }
    }

    const rows: Row[] = [];
    this.samples.forEach((_, sample) => {
      for (const { chip, entity } of chips) {
        const row: Row = { ...this.commonRow(sample), x: chip.x, y: chip.y };
        for (const counter of counters) {
          row[counter] = this.value(entity, sample, { kind: "chip", chip }, counter) ?? null;
        }
        rows.push(row);
      }
    });
    return new ResultTable(columns, rows);
  }

  tables(): Record<ResultTableName, ResultTable> {
    return {
      totals: this.totals(),
      entity_totals: this.entityTotals(),
      flow_totals: this.flowTotals(),
      flow_counters: this.flowCounters(),
      router_counters: this.routerCounters(),
    };
  }

  private commonColumns(): string[] {
    return [...this.labelColumns, "phase", "time"];
  }

  private commonRow(sample: number): Row {
    const info = this.samples[sample];
    const row: Row = {};
    for (const label of this.labelColumns) {
      row[label] = info?.phase.labels.get(label) ?? null;
    }
    row.phase = info?.phase ?? null;
    row.time = info?.time ?? null;
    return row;
  }

  private flowValue(entity: Entity, sample: number, flow: Flow, counter: Counter): Cell {
    return this.value(entity, sample, { kind: "flow", flow }, counter) ?? null;
  }

  private entityCounter(entity: Entity, sample: number, counter: Counter): Cell {
    if (isPermanentCounter(counter)) {
      return this.value(entity, sample, { kind: "entity", entity }, counter) ?? null;
    }
    const flows = isSourceCounter(counter) ? entity.sourceFlows : entity.sinkFlows;
    return sumCells(flows.map((flow) => this.flowValue(entity, sample, flow, counter)));
  }

  private idealReceived(flow: Flow, sample: number): Cell {
    const sent = this.flowValue(flow.source, sample, flow, "sent");
    return sent === null ? null : sent * flow.fanOut;
  }
}

export type ResultTableName = "totals" | "entity_totals" | "flow_totals" | "flow_counters" | "router_counters";

export const RESULT_TABLE_NAMES: ResultTableName[] = [
  "totals",
  "entity_totals",
  "flow_totals",
  "flow_counters",
  "router_counters",
];

/**
 * Split each entity's buffer into its fault word and sample matrix.
 *
 * Buffers may stop short (a run that was cut off); the words that never
 * arrived read as null.
 */
export function decodeResults(
  buffers: ReadonlyMap<Entity, Uint8Array>,
  recordLists: ReadonlyMap<Entity, readonly RecordEntry[]>,
  context: DecodeContext,
): Results {
  return withRunLog(
    "decode",
    `${context.entities.length} entities`,
    () => {
      const samples = enumerateSamples(context.phases, context.resolver);
      const matrices = new Map<Entity, EntityMatrix>();
      for (const entity of context.entities) {
        const buffer = buffers.get(entity);
        if (!buffer) {
          throw new ResultFormatError("no result buffer was supplied", entity.name);
        }
        matrices.set(entity, decodeMatrix(entity, buffer, recordLists.get(entity) ?? [], samples.length));
      }
      return new Results(context, matrices, samples);
    },
    (results) => `${results.numSamples} samples, faults: ${[...results.faults].join(",") || "none"}`,
  );
}
