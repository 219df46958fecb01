import type { Counter } from "@shared/mesh-counters";
import { withRunLog } from "../observability/run-log-store";
import { Commands } from "./commands";
import type { Entity, Flow, Phase } from "./model";
import type { OptionResolver } from "./resolver";

export type CompileContext = {
  resolver: OptionResolver;
  phases: readonly Phase[];
  /** Entities that own their chip's router for the experiment. */
  routerAccess: ReadonlySet<Entity>;
  random?: () => number;
};

/**
 * Build one entity's interpreter program.
 *
 * Phases are emitted in order, each one setting up only the state that
 * differs from the previous phase, then running
 * barrier → warmup → recorded run → cooldown → flush.
 */
export function compileEntity(
  context: CompileContext,
  entity: Entity,
  sourceFlows: readonly Flow[],
  sinkFlows: readonly Flow[],
  flowKeys: ReadonlyMap<Flow, number>,
  countersToRecord: readonly Counter[],
): Commands {
  return withRunLog(
    "compile",
    entity.name,
    () => buildProgram(context, entity, sourceFlows, sinkFlows, flowKeys, countersToRecord),
    (commands) => `${commands.instructions.length} instructions, ${commands.size} bytes`,
  );
}

const keyFor = (flowKeys: ReadonlyMap<Flow, number>, flow: Flow): number => flowKeys.get(flow) ?? 0;

function buildProgram(
  context: CompileContext,
  entity: Entity,
  sourceFlows: readonly Flow[],
  sinkFlows: readonly Flow[],
  flowKeys: ReadonlyMap<Flow, number>,
  countersToRecord: readonly Counter[],
): Commands {
  const { resolver } = context;
  const routerAccess = context.routerAccess.has(entity);
  const commands = new Commands({ random: context.random });

  commands.num(sourceFlows.length, sinkFlows.length);
  commands.record(countersToRecord);

  for (const phase of context.phases) {
    if (routerAccess) {
      commands.routerTimeout(resolver.get("router_timeout", phase));
      commands.reinject(resolver.get("reinject_packets", phase));
    }

    commands.seed(resolver.get("seed", phase, entity));
    commands.timestep(resolver.get("timestep", phase, entity));
    commands.recordInterval(resolver.get("record_interval", phase));

    sourceFlows.forEach((flow, index) => {
      commands.probability(index, resolver.get("probability", phase, flow));
      commands.burst(
        index,
        resolver.get("burst_period", phase, flow),
        resolver.get("burst_duty", phase, flow),
        resolver.get("burst_phase", phase, flow),
      );
      commands.payload(index, resolver.get("use_payload", phase, flow));
      commands.numRetries(index, resolver.get("num_retries", phase, flow));
      commands.numPackets(index, resolver.get("num_packets", phase, flow));
      commands.sourceKey(index, keyFor(flowKeys, flow));
    });
    sinkFlows.forEach((flow, index) => {
      commands.sinkKey(index, keyFor(flowKeys, flow));
    });

    commands.barrier();
    commands.consume(resolver.get("consume_packets", phase, entity));

    const warmup = resolver.get("warmup", phase);
    const cooldown = resolver.get("cooldown", phase);
    const flushTime = resolver.get("flush_time", phase);
    if (warmup > 0) commands.run(warmup, false);
    commands.run(resolver.get("duration", phase));
    if (cooldown > 0) commands.run(cooldown, false);

    // Sinks must drain whatever is still in flight
    commands.consume(true);
    if (flushTime > 0) commands.sleep(flushTime);
  }

  if (routerAccess) {
    commands.routerTimeout(null);
    commands.reinject(false);
  }
  commands.exit();
  return commands;
}
