import fs from "node:fs/promises";
import { ExperimentDoc, type TOptionMap } from "@shared/mesh-experiment";
import { HopTableRoute, type ResourceRange, type RoutingPath } from "./collaborators";
import { ConfigError } from "./errors";
import { Experiment } from "./experiment";
import type { Chip, Entity, Flow, OptionOwner, Phase } from "./model";

const applyOptions = (
  experiment: Experiment,
  options: TOptionMap,
  phase: Phase | null,
  owner: OptionOwner | null,
): void => {
  for (const [name, value] of Object.entries(options)) {
    experiment.resolver.setByName(name, value, phase, owner);
  }
};

const lookup = <T extends { name: string }>(items: readonly T[], name: string, kind: string): T => {
  const found = items.find((item) => item.name === name);
  if (!found) {
    throw new ConfigError(`unknown ${kind} ${name}`);
  }
  return found;
};

/** Build an experiment from a parsed JSON document. */
export function loadExperimentDocument(input: unknown): Experiment {
  const parsed = ExperimentDoc.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid experiment document: ${detail}`);
  }
  const doc = parsed.data;
  const experiment = new Experiment();
  applyOptions(experiment, doc.options, null, null);

  for (const item of doc.entities) {
    const entity = experiment.newEntity({ name: item.name, chip: item.chip ?? null });
    applyOptions(experiment, item.options, null, entity);
  }
  for (const item of doc.flows) {
    const source = lookup(experiment.entities, item.source, "entity");
    const sinks = item.sinks.map((name) => lookup(experiment.entities, name, "entity"));
    const flow = experiment.newFlow(source, sinks, { name: item.name });
    applyOptions(experiment, item.options, null, flow);
  }
  for (const item of doc.phases) {
    experiment.withPhase(
      (phase) => {
        applyOptions(experiment, item.options, phase, null);
        for (const [name, options] of Object.entries(item.entities)) {
          applyOptions(experiment, options, phase, lookup(experiment.entities, name, "entity"));
        }
        for (const [name, options] of Object.entries(item.flows)) {
          applyOptions(experiment, options, phase, lookup(experiment.flows, name, "flow"));
        }
      },
      { name: item.name, labels: item.labels },
    );
  }

  if (doc.placement) {
    const placements = new Map<Entity, Chip>();
    const allocations = new Map<Entity, ResourceRange>();
    for (const entity of experiment.entities) {
      const chip = doc.placement.chips[entity.name] ?? entity.chip;
      if (!chip) {
        throw new ConfigError(`placement gives no chip for ${entity.name}`);
      }
      placements.set(entity, chip);
      allocations.set(entity, doc.placement.cores[entity.name] ?? [1]);
    }
    const routes = new Map<Flow, RoutingPath>();
    for (const [flowName, hops] of Object.entries(doc.placement.hops)) {
      const flow = lookup(experiment.flows, flowName, "flow");
      const table = new Map<Entity, number>();
      for (const [sinkName, count] of Object.entries(hops)) {
        table.set(lookup(experiment.entities, sinkName, "entity"), count);
      }
      routes.set(flow, new HopTableRoute(table));
    }
    experiment.placements = placements;
    experiment.allocations = allocations;
    experiment.routes = routes;
  }
  return experiment;
}

export async function readExperimentDocument(filePath: string): Promise<Experiment> {
  const raw = await fs.readFile(filePath, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return loadExperimentDocument(json);
}
