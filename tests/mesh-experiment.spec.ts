import { describe, expect, it } from "vitest";
import type {
  LoadImage,
  PlacementProvider,
  PlacementRequest,
  RemoteBuffer,
  RoutingPath,
  Transport,
} from "../server/services/mesh/collaborators";
import { HopTableRoute } from "../server/services/mesh/collaborators";
import { ConfigError, NestingError, RuntimeFaultError } from "../server/services/mesh/errors";
import { Experiment } from "../server/services/mesh/experiment";
import type { Chip, Entity, Flow } from "../server/services/mesh/model";

const words = (...values: number[]): Uint8Array => {
  const bytes = new Uint8Array(values.length * 4);
  const view = new DataView(bytes.buffer);
  values.forEach((value, i) => view.setUint32(i * 4, value >>> 0, true));
  return bytes;
};

/** Records every call; hands back queued result buffers in allocation order. */
class FakeTransport implements Transport {
  readonly events: string[] = [];
  readonly memory = new Map<number, Uint8Array>();
  readonly timeouts: number[] = [];
  loaded: ReadonlyMap<Entity, LoadImage> | null = null;
  private nextAddress = 0x1000;

  constructor(
    private readonly results: Uint8Array[],
    private readonly failWrite?: Error,
  ) {}

  async allocate(size: number, chip: Chip): Promise<RemoteBuffer> {
    const address = this.nextAddress;
    this.nextAddress += 0x1000;
    this.events.push(`allocate:${size}`);
    return { chip, address, size };
  }

  async write(buffer: RemoteBuffer, data: Uint8Array): Promise<void> {
    if (this.failWrite) throw this.failWrite;
    this.memory.set(buffer.address, data);
  }

  async load(images: ReadonlyMap<Entity, LoadImage>): Promise<void> {
    this.loaded = images;
    this.events.push(`load:${images.size}`);
  }

  async waitForState(_entities: readonly Entity[], state: string, timeoutMs: number): Promise<void> {
    this.timeouts.push(timeoutMs);
    this.events.push(`wait:${state}`);
  }

  async sendSignal(signal: string): Promise<void> {
    this.events.push(`signal:${signal}`);
  }

  async read(buffer: RemoteBuffer, size: number): Promise<Uint8Array> {
    this.events.push(`read:${size}`);
    const index = (buffer.address - 0x1000) / 0x1000;
    return this.results[index] ?? new Uint8Array(0);
  }
}

class FakePlacer implements PlacementProvider {
  requests: PlacementRequest[] = [];

  async place(request: PlacementRequest) {
    this.requests.push(request);
    const entities = [...request.demands.keys()];
    return {
      placements: new Map(
        entities.map((entity, i): [Entity, Chip] => [entity, request.constraints.get(entity) ?? { x: i, y: 0 }]),
      ),
      allocations: new Map(entities.map((entity): [Entity, number[]] => [entity, [1]])),
      routes: new Map(
        request.flows.map((flow): [Flow, RoutingPath] => [
          flow,
          new HopTableRoute(new Map(flow.sinks.map((sink): [Entity, number] => [sink, 1]))),
        ]),
      ),
    };
  }
}

describe("Experiment phases", () => {
  it("refuses to nest phases or close one that is not open", () => {
    const experiment = new Experiment();
    expect(() => experiment.endPhase()).toThrow(NestingError);
    const scope = experiment.newPhase({ name: "first" });
    expect(() => experiment.beginPhase()).toThrow(NestingError);
    scope.end();
    expect(experiment.currentPhase).toBeNull();
    expect(() => scope.end()).toThrow(NestingError);
    expect(experiment.phases.map((phase) => phase.name)).toEqual(["first"]);
  });

  it("closes a phase even when its definition throws", () => {
    const experiment = new Experiment();
    expect(() =>
      experiment.withPhase(() => {
        throw new Error("bad definition");
      }),
    ).toThrow("bad definition");
    expect(experiment.currentPhase).toBeNull();
  });

  it("names things by creation order", () => {
    const experiment = new Experiment();
    const a = experiment.newEntity();
    const b = experiment.newEntity();
    const flow = experiment.newFlow(a, [b]);
    const phase = experiment.withPhase((current) => current);
    expect([a.name, b.name, flow.name, phase.name]).toEqual(["core0", "core1", "flow0", "phase0"]);
    expect(a.sourceFlows).toEqual([flow]);
    expect(b.sinkFlows).toEqual([flow]);
  });

  it("rejects a sink listed twice", () => {
    const experiment = new Experiment();
    const a = experiment.newEntity();
    const b = experiment.newEntity({ name: "b" });
    expect(() => experiment.newFlow(a, [b, b])).toThrow("b is listed more than once as a sink");
    expect(experiment.flows).toEqual([]);
    expect(b.sinkFlows).toEqual([]);
  });

  it("rejects a flow name that is already taken", () => {
    const experiment = new Experiment();
    const a = experiment.newEntity();
    const b = experiment.newEntity();
    experiment.newFlow(a, b, { name: "stream" });
    expect(() => experiment.newFlow(b, a, { name: "stream" })).toThrow(ConfigError);
    expect(() => experiment.newFlow(b, a, { name: "stream" })).toThrow("a flow named stream already exists");
    expect(experiment.flows.map((flow) => flow.name)).toEqual(["stream"]);
    expect(a.sourceFlows.length).toBe(1);
  });

  it("rejects flows between entities of another experiment", () => {
    const experiment = new Experiment();
    const other = new Experiment();
    const a = experiment.newEntity();
    const stranger = other.newEntity({ name: "stranger" });
    expect(() => experiment.newFlow(a, stranger)).toThrow("stranger does not belong to this experiment");
  });
});

describe("Experiment.run", () => {
  const setup = () => {
    const experiment = new Experiment();
    const entity = experiment.newEntity({ name: "solo", chip: { x: 3, y: 4 } });
    experiment.withPhase(() => undefined);
    experiment.withPhase(() => undefined);
    return { experiment, entity };
  };

  it("steps through every phase and decodes the results", async () => {
    const { experiment, entity } = setup();
    const placer = new FakePlacer();
    const transport = new FakeTransport([words(0)]);

    const results = await experiment.run({ transport, placer, phaseTimeoutMs: 500 });

    expect(results.faults.size).toBe(0);
    expect(placer.requests[0]?.constraints.get(entity)).toEqual({ x: 3, y: 4 });
    expect(experiment.placements?.get(entity)).toEqual({ x: 3, y: 4 });
    const program = experiment.compile().get(entity);
    expect(transport.events).toEqual([
      `allocate:${program?.size}`,
      "load:1",
      "wait:sync0",
      "signal:sync0",
      "wait:sync1",
      "signal:sync1",
      "wait:exit",
      "read:4",
    ]);
    expect(transport.timeouts).toEqual([500, 500, 500]);
    expect(transport.loaded?.get(entity)?.cores).toEqual([1]);
  });

  it("writes the packed program to the allocated buffer", async () => {
    const { experiment, entity } = setup();
    experiment.placements = new Map([[entity, { x: 0, y: 0 }]]);
    experiment.allocations = new Map([[entity, [2, 3]]]);
    const transport = new FakeTransport([words(0)]);

    await experiment.run({ transport, random: () => 0 });

    const written = transport.memory.get(0x1000);
    const expected = experiment.compile(() => 0).get(entity)?.pack();
    expect(written ? [...written] : []).toEqual(expected ? [...expected] : null);
  });

  it("rejects with the decoded results when an interpreter faulted", async () => {
    const { experiment } = setup();
    const transport = new FakeTransport([words(0x4)]);

    let caught: unknown;
    try {
      await experiment.run({ transport, placer: new FakePlacer() });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RuntimeFaultError);
    if (caught instanceof RuntimeFaultError) {
      expect(caught.message).toBe("interpreters reported a fault: FAULT_DMA");
      expect([...caught.results.faults]).toEqual(["DMA"]);
    }
  });

  it("passes transport failures through unchanged", async () => {
    const { experiment } = setup();
    const failure = new Error("link down");
    const transport = new FakeTransport([], failure);
    await expect(experiment.run({ transport, placer: new FakePlacer() })).rejects.toBe(failure);
  });

  it("needs a placer when nothing has been placed", async () => {
    const { experiment } = setup();
    await expect(experiment.run({ transport: new FakeTransport([]) })).rejects.toBeInstanceOf(ConfigError);
  });
});
