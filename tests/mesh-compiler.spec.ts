import { describe, expect, it } from "vitest";
import type { Commands } from "../server/services/mesh/commands";
import { ConfigError } from "../server/services/mesh/errors";
import { Experiment } from "../server/services/mesh/experiment";
import { numSamples } from "../server/services/mesh/model";
import { buildRecordList, selectRouterAccess } from "../server/services/mesh/record-list";

const pair = (chipB = { x: 0, y: 0 }) => {
  const experiment = new Experiment();
  const a = experiment.newEntity({ name: "a" });
  const b = experiment.newEntity({ name: "b" });
  const flow = experiment.newFlow(a, b);
  experiment.placements = new Map([
    [a, { x: 0, y: 0 }],
    [b, chipB],
  ]);
  experiment.option("seed").value = 1;
  return { experiment, a, b, flow };
};

const opcodes = (experiment: Experiment, name: string): string[] => {
  const entity = experiment.entities.find((candidate) => candidate.name === name);
  const program = entity ? experiment.compile().get(entity) : undefined;
  return program ? program.instructions.map((instruction) => instruction.opcode) : [];
};

describe("numSamples", () => {
  it("takes one sample without an interval and floors otherwise", () => {
    expect(numSamples(0, 0)).toBe(1);
    expect(numSamples(1.0, 2.0)).toBe(0);
    expect(numSamples(1.0, 0.1)).toBe(10);
    expect(numSamples(0.3, 0.1)).toBe(3);
  });
});

describe("record lists", () => {
  it("gives router access to the first entity on each chip", () => {
    const { experiment, a, b } = pair();
    const access = selectRouterAccess(experiment.entities, experiment.placements ?? new Map());
    expect([...access.values()]).toEqual([a]);
    expect(experiment.routerAccessEntities().has(b)).toBe(false);
  });

  it("lays out columns in counter order, one per flow", () => {
    const { a, b, flow } = pair();
    const list = buildRecordList(a, ["received", "sent", "local_multicast", "deadlines_missed"], { x: 0, y: 0 }, true);
    expect(list).toEqual([
      { object: { kind: "chip", chip: { x: 0, y: 0 } }, counter: "local_multicast" },
      { object: { kind: "entity", entity: a }, counter: "deadlines_missed" },
      { object: { kind: "flow", flow }, counter: "sent" },
    ]);
    const sinkList = buildRecordList(b, ["received", "local_multicast"], { x: 0, y: 0 }, false);
    expect(sinkList).toEqual([{ object: { kind: "flow", flow }, counter: "received" }]);
  });
});

describe("compileEntity", () => {
  it("emits only what differs from the interpreter's state", () => {
    const { experiment, flow } = pair();
    flow.option("probability").value = 0.5;
    expect(opcodes(experiment, "a")).toEqual([
      "NUM",
      "SEED",
      "TIMESTEP",
      "PROBABILITY",
      "BARRIER",
      "RUN",
      "SLEEP",
      "EXIT",
    ]);
    expect(opcodes(experiment, "b")).toEqual(["NUM", "SEED", "TIMESTEP", "BARRIER", "RUN", "SLEEP", "EXIT"]);
  });

  it("changes the probability between phases and nothing else", () => {
    const { experiment, a, flow } = pair();
    experiment.withPhase(() => {
      flow.option("probability").value = 0.5;
    });
    // The second phase falls back to the global probability of 0
    experiment.withPhase(() => undefined);

    const program = experiment.compile().get(a);
    const probabilities = program?.instructions
      .filter((instruction) => instruction.opcode === "PROBABILITY")
      .map((instruction) => instruction.operand);
    expect(probabilities).toEqual([0x80000000, 0x00000000]);
    expect(program?.count("SEED")).toBe(1);
    expect(program?.count("TIMESTEP")).toBe(1);
    expect(program?.count("BARRIER")).toBe(2);
    expect(program?.count("RUN")).toBe(2);
  });

  it("converts each phase's timing with that phase's timestep", () => {
    const { experiment, a, flow } = pair();
    experiment.withPhase(() => {
      experiment.option("timestep").value = 0.001;
      experiment.option("record_interval").value = 0.001;
      flow.option("burst_period").value = 0.001;
    });
    experiment.withPhase(() => {
      experiment.option("timestep").value = 0.0004;
      experiment.option("record_interval").value = 0.002;
      flow.option("burst_period").value = 0.002;
    });

    const program = experiment.compile().get(a);
    const operands = (opcode: string) =>
      program?.instructions
        .filter((instruction) => instruction.opcode === opcode)
        .map((instruction) => instruction.operand);
    expect(operands("TIMESTEP")).toEqual([1000000, 400000]);
    expect(operands("RECORD_INTERVAL")).toEqual([1, 5]);
    expect(operands("BURST_PERIOD")).toEqual([1, 5]);
    expect(operands("BURST_DUTY")).toEqual([0, 0]);
    expect(operands("BURST_PHASE")).toEqual([0, 0]);
  });

  it("wraps the recorded run in warmup and cooldown", () => {
    const { experiment } = pair();
    experiment.option("warmup").value = 0.5;
    experiment.option("cooldown").value = 0.25;
    experiment.option("consume_packets").value = false;
    experiment.option("flush_time").value = 0;
    expect(opcodes(experiment, "b")).toEqual([
      "NUM",
      "SEED",
      "TIMESTEP",
      "BARRIER",
      "NO_CONSUME",
      "RUN_NO_RECORD",
      "RUN",
      "RUN_NO_RECORD",
      "CONSUME",
      "EXIT",
    ]);
  });

  it("lets only the router-access entity touch the router", () => {
    const { experiment, a, b } = pair();
    experiment.option("router_timeout").value = 16;
    experiment.option("reinject_packets").value = true;
    const programs = experiment.compile();
    const ops = (programs.get(a)?.instructions ?? []).map((instruction) => instruction.opcode);
    expect(ops.slice(0, 4)).toEqual(["NUM", "ROUTER_TIMEOUT", "REINJECTION_ENABLE", "SEED"]);
    expect(ops.slice(-3)).toEqual(["ROUTER_TIMEOUT_RESTORE", "REINJECTION_DISABLE", "EXIT"]);
    expect(programs.get(b)?.count("ROUTER_TIMEOUT")).toBe(0);
    expect(programs.get(b)?.count("REINJECTION_ENABLE")).toBe(0);
  });

  it("records the counters each entity can measure", () => {
    const { experiment, a, b } = pair();
    experiment.option("record_sent").value = true;
    experiment.option("record_received").value = true;
    experiment.option("record_local_multicast").value = true;
    const programs = experiment.compile();
    const mask = (program: Commands | undefined) =>
      program?.instructions.find((instruction) => instruction.opcode === "RECORD")?.operand;
    expect(mask(programs.get(a))).toBe(0x01000001);
    expect(mask(programs.get(b))).toBe(0x08000000);
  });

  it("gives every flow its own key", () => {
    const experiment = new Experiment();
    const a = experiment.newEntity();
    const b = experiment.newEntity();
    experiment.newFlow(a, b);
    const second = experiment.newFlow(b, a);
    expect([...experiment.flowKeys().values()]).toEqual([0x000, 0x100]);

    experiment.placements = new Map([
      [a, { x: 0, y: 0 }],
      [b, { x: 1, y: 0 }],
    ]);
    const program = experiment.compile().get(b);
    const key = program?.instructions.find((instruction) => instruction.opcode === "SOURCE_KEY");
    expect(key).toEqual({ opcode: "SOURCE_KEY", index: 0, operand: 0x100 });
    expect(second.name).toBe("flow1");
  });

  it("refuses to compile an unplaced experiment", () => {
    const experiment = new Experiment();
    experiment.newEntity();
    expect(() => experiment.compile()).toThrow(ConfigError);
  });

  it("forgets placements when entities are added", () => {
    const { experiment } = pair();
    experiment.newEntity();
    expect(experiment.placements).toBeNull();
  });
});
