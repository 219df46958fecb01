import {
  compareCounters,
  isChipCounter,
  isPermanentCounter,
  isSinkCounter,
  isSourceCounter,
  type Counter,
} from "@shared/mesh-counters";
import { chipKey, type Chip, type Entity, type Flow } from "./model";

export type MeasuredObject =
  | { kind: "chip"; chip: Chip }
  | { kind: "flow"; flow: Flow }
  | { kind: "entity"; entity: Entity };

export type RecordEntry = {
  object: MeasuredObject;
  counter: Counter;
};

/**
 * The first entity placed on each chip is the only one allowed to touch the
 * chip's router (timeouts, reinjection, router counters).
 */
export const selectRouterAccess = (
  entities: readonly Entity[],
  placements: ReadonlyMap<Entity, Chip>,
): Map<string, Entity> => {
  const byChip = new Map<string, Entity>();
  for (const entity of entities) {
    const chip = placements.get(entity);
    if (!chip) continue;
    const key = chipKey(chip);
    if (!byChip.has(key)) byChip.set(key, entity);
  }
  return byChip;
};

/** Counters whose RECORD bits are sent to one entity. */
export const countersForEntity = (recorded: readonly Counter[], routerAccess: boolean): Counter[] =>
  [...recorded].filter((counter) => routerAccess || !isChipCounter(counter)).sort(compareCounters);

/**
 * Columns of one entity's result buffer, in the order the interpreter writes
 * them: counters in bit order, and within a source or sink counter one column
 * per flow in source/sink index order.
 */
export const buildRecordList = (
  entity: Entity,
  recorded: readonly Counter[],
  chip: Chip | null,
  routerAccess: boolean,
): RecordEntry[] => {
  const entries: RecordEntry[] = [];
  for (const counter of countersForEntity(recorded, routerAccess)) {
    if (isChipCounter(counter)) {
      if (chip) entries.push({ object: { kind: "chip", chip }, counter });
    } else if (isPermanentCounter(counter)) {
      entries.push({ object: { kind: "entity", entity }, counter });
    } else if (isSourceCounter(counter)) {
      for (const flow of entity.sourceFlows) {
        entries.push({ object: { kind: "flow", flow }, counter });
      }
    } else if (isSinkCounter(counter)) {
      for (const flow of entity.sinkFlows) {
        entries.push({ object: { kind: "flow", flow }, counter });
      }
    }
  }
  return entries;
};

/** Identity of a (measured object, counter) column, for index lookups. */
export const recordKey = (object: MeasuredObject, counter: Counter): string => {
  switch (object.kind) {
    case "chip":
      return `chip:${chipKey(object.chip)}:${counter}`;
    case "flow":
      return `flow:${object.flow.index}:${counter}`;
    case "entity":
      return `entity:${object.entity.index}:${counter}`;
  }
};
