import { z } from "zod";

// Declarative experiment description, as read by the CLIs.

export const ChipRef = z.object({
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
});

export type TChipRef = z.infer<typeof ChipRef>;

/** Option values keyed by option name; values are checked by the option's own schema when applied. */
export const OptionMap = z.record(z.string(), z.unknown());

export type TOptionMap = z.infer<typeof OptionMap>;

export const EntityDoc = z.object({
  name: z.string().min(1).optional(),
  chip: ChipRef.optional(),
  options: OptionMap.default({}),
});

export const FlowDoc = z.object({
  name: z.string().min(1).optional(),
  source: z.string().min(1),
  sinks: z.array(z.string().min(1)).min(1),
  options: OptionMap.default({}),
});

export const LabelValueDoc = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const PhaseDoc = z.object({
  name: z.string().min(1).optional(),
  labels: z.record(z.string(), LabelValueDoc).default({}),
  options: OptionMap.default({}),
  /** Per-entity exceptions within this phase, keyed by entity name. */
  entities: z.record(z.string(), OptionMap).default({}),
  /** Per-flow exceptions within this phase, keyed by flow name. */
  flows: z.record(z.string(), OptionMap).default({}),
});

export const PlacementDoc = z.object({
  chips: z.record(z.string(), ChipRef),
  cores: z.record(z.string(), z.array(z.number().int().nonnegative()).min(1)),
  /** Hop counts per flow name, then per sink name. */
  hops: z.record(z.string(), z.record(z.string(), z.number().int().nonnegative())).default({}),
});

export const ExperimentDoc = z.object({
  options: OptionMap.default({}),
  entities: z.array(EntityDoc).default([]),
  flows: z.array(FlowDoc).default([]),
  phases: z.array(PhaseDoc).default([]),
  placement: PlacementDoc.optional(),
});

export type TExperimentDoc = z.infer<typeof ExperimentDoc>;
export type TExperimentDocInput = z.input<typeof ExperimentDoc>;
