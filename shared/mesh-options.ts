import { z } from "zod";
import { COUNTERS, type Counter } from "./mesh-counters";

/**
 * Where an option may take exceptions to its global value.
 *
 * - `global`: one value for the whole experiment (e.g. which counters are
 *   recorded, since every phase must produce the same result columns).
 * - `phase`: per-phase exceptions only; these define the shared timeline.
 * - `overridable`: per-phase, per-entity/flow and per-(phase, entity/flow).
 */
export type OptionScope = "global" | "phase" | "overridable";

export const RouterTimeout = z.union([
  z.number().int().nonnegative(),
  z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
]);

export type TRouterTimeout = z.infer<typeof RouterTimeout>;

const seconds = z.number().finite().nonnegative();
const fraction = z.number().finite().min(0).max(1);
const count = z.number().int().nonnegative();

type RecordOptionValues = { [K in Counter as `record_${K}`]: boolean };

export type OptionValues = {
  seed: number | null;
  timestep: number;
  warmup: number;
  duration: number;
  cooldown: number;
  flush_time: number;
  record_interval: number;
  probability: number;
  burst_period: number;
  burst_duty: number;
  burst_phase: number | null;
  use_payload: boolean;
  num_retries: number;
  num_packets: number;
  consume_packets: boolean;
  router_timeout: TRouterTimeout | null;
  reinject_packets: boolean;
} & RecordOptionValues;

export type OptionName = keyof OptionValues;

export type OptionDefinition<V> = {
  scope: OptionScope;
  defaultValue: V;
  schema: z.ZodType<V>;
  description: string;
};

const recordOption = (counter: Counter): OptionDefinition<boolean> => ({
  scope: "global",
  defaultValue: false,
  schema: z.boolean(),
  description: `Record the ${counter} counter`,
});

export const OPTIONS: { [K in OptionName]: OptionDefinition<OptionValues[K]> } = {
  seed: {
    scope: "overridable",
    defaultValue: null,
    schema: z.number().int().min(0).max(0xffffffff).nullable(),
    description: "Random seed; null draws a fresh seed for every phase",
  },
  timestep: {
    scope: "overridable",
    defaultValue: 0.001,
    schema: z.number().finite().positive(),
    description: "Interpreter timestep in seconds",
  },
  warmup: {
    scope: "phase",
    defaultValue: 0.0,
    schema: seconds,
    description: "Unrecorded run before the recorded run (seconds)",
  },
  duration: {
    scope: "phase",
    defaultValue: 1.0,
    schema: seconds,
    description: "Recorded run length (seconds)",
  },
  cooldown: {
    scope: "phase",
    defaultValue: 0.0,
    schema: seconds,
    description: "Unrecorded run after the recorded run (seconds)",
  },
  flush_time: {
    scope: "phase",
    defaultValue: 0.01,
    schema: seconds,
    description: "Idle time after each phase to let the network drain (seconds)",
  },
  record_interval: {
    scope: "phase",
    defaultValue: 0.0,
    schema: seconds,
    description: "Sampling interval; 0 records once at the end of the run",
  },
  probability: {
    scope: "overridable",
    defaultValue: 0.0,
    schema: fraction,
    description: "Probability of injecting a packet each timestep",
  },
  burst_period: {
    scope: "overridable",
    defaultValue: 0.0,
    schema: seconds,
    description: "Burst period in seconds; 0 disables bursting",
  },
  burst_duty: {
    scope: "overridable",
    defaultValue: 0.0,
    schema: fraction,
    description: "Fraction of the burst period spent generating traffic",
  },
  burst_phase: {
    scope: "overridable",
    defaultValue: 0.0,
    schema: fraction.nullable(),
    description: "Initial burst phase as a fraction of the period; null randomises it",
  },
  use_payload: {
    scope: "overridable",
    defaultValue: false,
    schema: z.boolean(),
    description: "Send packets with a payload word",
  },
  num_retries: {
    scope: "overridable",
    defaultValue: 0,
    schema: count,
    description: "Resend attempts for a packet blocked by back-pressure",
  },
  num_packets: {
    scope: "overridable",
    defaultValue: 1,
    schema: count,
    description: "Packet injection attempts per timestep",
  },
  consume_packets: {
    scope: "overridable",
    defaultValue: true,
    schema: z.boolean(),
    description: "Sinks consume arriving packets during runs",
  },
  router_timeout: {
    scope: "phase",
    defaultValue: null,
    schema: RouterTimeout.nullable(),
    description: "Router wait time(s) in router clock cycles; null keeps the router default",
  },
  reinject_packets: {
    scope: "phase",
    defaultValue: false,
    schema: z.boolean(),
    description: "Enable reinjection of dropped packets",
  },
  record_local_multicast: recordOption("local_multicast"),
  record_external_multicast: recordOption("external_multicast"),
  record_local_p2p: recordOption("local_p2p"),
  record_external_p2p: recordOption("external_p2p"),
  record_local_nearest_neighbour: recordOption("local_nearest_neighbour"),
  record_external_nearest_neighbour: recordOption("external_nearest_neighbour"),
  record_local_fixed_route: recordOption("local_fixed_route"),
  record_external_fixed_route: recordOption("external_fixed_route"),
  record_dropped_multicast: recordOption("dropped_multicast"),
  record_dropped_p2p: recordOption("dropped_p2p"),
  record_dropped_nearest_neighbour: recordOption("dropped_nearest_neighbour"),
  record_dropped_fixed_route: recordOption("dropped_fixed_route"),
  record_counter12: recordOption("counter12"),
  record_counter13: recordOption("counter13"),
  record_counter14: recordOption("counter14"),
  record_counter15: recordOption("counter15"),
  record_reinjected: recordOption("reinjected"),
  record_reinject_overflow: recordOption("reinject_overflow"),
  record_reinject_missed: recordOption("reinject_missed"),
  record_deadlines_missed: recordOption("deadlines_missed"),
  record_sent: recordOption("sent"),
  record_blocked: recordOption("blocked"),
  record_retried: recordOption("retried"),
  record_received: recordOption("received"),
};

export const recordOptionName = (counter: Counter): `record_${Counter}` => `record_${counter}`;

const SCALAR_OPTION_NAMES = [
  "seed",
  "timestep",
  "warmup",
  "duration",
  "cooldown",
  "flush_time",
  "record_interval",
  "probability",
  "burst_period",
  "burst_duty",
  "burst_phase",
  "use_payload",
  "num_retries",
  "num_packets",
  "consume_packets",
  "router_timeout",
  "reinject_packets",
] as const satisfies readonly OptionName[];

export const OPTION_NAMES: OptionName[] = [...SCALAR_OPTION_NAMES, ...COUNTERS.map(recordOptionName)];

export const isOptionName = (name: string): name is OptionName =>
  OPTION_NAMES.some((candidate) => candidate === name);
