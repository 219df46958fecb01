import { z } from "zod";

export const CounterName = z.enum([
  "local_multicast",
  "external_multicast",
  "local_p2p",
  "external_p2p",
  "local_nearest_neighbour",
  "external_nearest_neighbour",
  "local_fixed_route",
  "external_fixed_route",
  "dropped_multicast",
  "dropped_p2p",
  "dropped_nearest_neighbour",
  "dropped_fixed_route",
  "counter12",
  "counter13",
  "counter14",
  "counter15",
  "reinjected",
  "reinject_overflow",
  "reinject_missed",
  "deadlines_missed",
  "sent",
  "blocked",
  "retried",
  "received",
]);

export type Counter = z.infer<typeof CounterName>;

export type CounterCategory = "router" | "reinjection" | "permanent" | "source" | "sink";

// Counter values double as bit positions in the RECORD mask, and their
// numeric order is the order the interpreter writes recorded values in.
export const COUNTER_BITS: Record<Counter, number> = {
  local_multicast: 0,
  external_multicast: 1,
  local_p2p: 2,
  external_p2p: 3,
  local_nearest_neighbour: 4,
  external_nearest_neighbour: 5,
  local_fixed_route: 6,
  external_fixed_route: 7,
  dropped_multicast: 8,
  dropped_p2p: 9,
  dropped_nearest_neighbour: 10,
  dropped_fixed_route: 11,
  counter12: 12,
  counter13: 13,
  counter14: 14,
  counter15: 15,
  reinjected: 16,
  reinject_overflow: 17,
  reinject_missed: 18,
  deadlines_missed: 19,
  sent: 24,
  blocked: 25,
  retried: 26,
  received: 27,
};

export const compareCounters = (a: Counter, b: Counter): number => COUNTER_BITS[a] - COUNTER_BITS[b];

export const COUNTERS: Counter[] = [...CounterName.options].sort(compareCounters);

export const counterCategory = (counter: Counter): CounterCategory => {
  const bit = COUNTER_BITS[counter];
  if (bit < 16) return "router";
  if (bit < 19) return "reinjection";
  if (counter === "deadlines_missed") return "permanent";
  if (counter === "received") return "sink";
  return "source";
};

export const isRouterCounter = (counter: Counter): boolean => counterCategory(counter) === "router";
export const isReinjectionCounter = (counter: Counter): boolean =>
  counterCategory(counter) === "reinjection";
export const isPermanentCounter = (counter: Counter): boolean =>
  counterCategory(counter) === "permanent";
export const isSourceCounter = (counter: Counter): boolean => counterCategory(counter) === "source";
export const isSinkCounter = (counter: Counter): boolean => counterCategory(counter) === "sink";

/** Router and reinjection counters are read from the chip, not the core. */
export const isChipCounter = (counter: Counter): boolean =>
  isRouterCounter(counter) || isReinjectionCounter(counter);

export const counterMask = (counters: Iterable<Counter>): number => {
  let mask = 0;
  for (const counter of counters) {
    mask |= 1 << COUNTER_BITS[counter];
  }
  return mask >>> 0;
};
