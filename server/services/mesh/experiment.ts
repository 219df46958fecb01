import { COUNTERS, type Counter } from "@shared/mesh-counters";
import { recordOptionName, type OptionName } from "@shared/mesh-options";
import { resolveMeshConfig } from "../../config/env";
import { withRunLogAsync } from "../observability/run-log-store";
import type { Commands } from "./commands";
import type {
  LoadImage,
  PlacementProvider,
  RemoteBuffer,
  ResourceDemand,
  ResourceRange,
  RoutingPath,
  Transport,
} from "./collaborators";
import { compileEntity } from "./compiler";
import { ConfigError, NestingError, RuntimeFaultError } from "./errors";
import { Entity, Flow, OptionAccessor, Phase, type Chip, type OptionContext } from "./model";
import { buildRecordList, selectRouterAccess, type RecordEntry } from "./record-list";
import { OptionResolver } from "./resolver";
import { decodeResults, enumerateSamples, resultBufferSize, type Results } from "./results";

export type EntityOptions = { name?: string; chip?: Chip | null };
export type FlowOptions = { name?: string };
export type PhaseOptions = { name?: string; labels?: Record<string, string | number | boolean | null> };

export type RunOptions = {
  transport: Transport;
  placer?: PlacementProvider;
  ignoreDeadlineErrors?: boolean;
  phaseTimeoutMs?: number;
  random?: () => number;
};

/** Handle for a phase opened with `newPhase`; closing it ends the phase. */
export class PhaseScope {
  constructor(
    private readonly experiment: Experiment,
    readonly phase: Phase,
  ) {}

  end(): void {
    if (this.experiment.currentPhase !== this.phase) {
      throw new NestingError(`${this.phase.name} is not the phase being defined`);
    }
    this.experiment.endPhase();
  }
}

/**
 * A network-load experiment: entities, flows between them, and the phases the
 * run is split into, with every option resolved through one resolver.
 */
export class Experiment implements OptionContext {
  readonly resolver = new OptionResolver();

  private readonly entityList: Entity[] = [];
  private readonly flowList: Flow[] = [];
  private readonly phaseList: Phase[] = [];
  private openPhase: Phase | null = null;
  private implicitPhase: Phase | null = null;

  private placementMap: Map<Entity, Chip> | null = null;
  private allocationMap: Map<Entity, ResourceRange> | null = null;
  private routeMap: Map<Flow, RoutingPath> | null = null;

  get currentPhase(): Phase | null {
    return this.openPhase;
  }

  get entities(): readonly Entity[] {
    return this.entityList;
  }

  get flows(): readonly Flow[] {
    return this.flowList;
  }

  get phases(): readonly Phase[] {
    return this.phaseList;
  }

  // Assigning placements discards allocations and routes derived from older ones
  get placements(): Map<Entity, Chip> | null {
    return this.placementMap;
  }

  set placements(value: Map<Entity, Chip> | null) {
    this.placementMap = value;
    this.allocationMap = null;
    this.routeMap = null;
  }

  get allocations(): Map<Entity, ResourceRange> | null {
    return this.allocationMap;
  }

  set allocations(value: Map<Entity, ResourceRange> | null) {
    this.allocationMap = value;
  }

  get routes(): Map<Flow, RoutingPath> | null {
    return this.routeMap;
  }

  set routes(value: Map<Flow, RoutingPath> | null) {
    this.routeMap = value;
  }

  newEntity(options: EntityOptions = {}): Entity {
    const index = this.entityList.length;
    const name = options.name ?? `core${index}`;
    if (this.entityList.some((entity) => entity.name === name)) {
      throw new ConfigError(`an entity named ${name} already exists`);
    }
    const entity = new Entity(this, name, index, options.chip ?? null);
    this.entityList.push(entity);
    this.placements = null;
    return entity;
  }

  newFlow(source: Entity, sinks: Entity | readonly Entity[], options: FlowOptions = {}): Flow {
    const sinkList = sinks instanceof Entity ? [sinks] : [...sinks];
    for (const member of [source, ...sinkList]) {
      if (!this.entityList.includes(member)) {
        throw new ConfigError(`${member.name} does not belong to this experiment`);
      }
    }
    if (sinkList.length === 0) {
      throw new ConfigError("a flow needs at least one sink");
    }
    const repeated = sinkList.find((sink, i) => sinkList.indexOf(sink) !== i);
    if (repeated) {
      throw new ConfigError(`${repeated.name} is listed more than once as a sink`);
    }
    const index = this.flowList.length;
    const name = options.name ?? `flow${index}`;
    if (this.flowList.some((flow) => flow.name === name)) {
      throw new ConfigError(`a flow named ${name} already exists`);
    }
    const flow = new Flow(this, name, index, source, sinkList);
    source.sourceFlows.push(flow);
    for (const sink of sinkList) {
      sink.sinkFlows.push(flow);
    }
    this.flowList.push(flow);
    this.routes = null;
    return flow;
  }

  beginPhase(options: PhaseOptions = {}): Phase {
    if (this.openPhase) {
      throw new NestingError(`cannot begin a phase while ${this.openPhase.name} is still open`);
    }
    const index = this.phaseList.length;
    const phase = new Phase(options.name ?? `phase${index}`, index);
    for (const [key, value] of Object.entries(options.labels ?? {})) {
      phase.addLabel(key, value);
    }
    this.phaseList.push(phase);
    this.openPhase = phase;
    return phase;
  }

  endPhase(): void {
    if (!this.openPhase) {
      throw new NestingError("no phase is open");
    }
    this.openPhase = null;
  }

  newPhase(options: PhaseOptions = {}): PhaseScope {
    return new PhaseScope(this, this.beginPhase(options));
  }

  /** Define a phase inside `fn`; the phase is closed even if `fn` throws. */
  withPhase<T>(fn: (phase: Phase) => T, options: PhaseOptions = {}): T {
    const phase = this.beginPhase(options);
    try {
      return fn(phase);
    } finally {
      this.endPhase();
    }
  }

  option<K extends OptionName>(option: K): OptionAccessor<K> {
    return new OptionAccessor(this, option, null);
  }

  /** Phases the run is made of; one unnamed phase when none were declared. */
  effectivePhases(): readonly Phase[] {
    if (this.phaseList.length > 0) return this.phaseList;
    this.implicitPhase ??= new Phase("phase0", 0);
    return [this.implicitPhase];
  }

  recordedCounters(): Counter[] {
    return COUNTERS.filter((counter) => this.resolver.get(recordOptionName(counter)));
  }

  /** Routing key of every flow; the low byte is left for the source/sink index. */
  flowKeys(): Map<Flow, number> {
    return new Map(this.flowList.map((flow): [Flow, number] => [flow, (flow.index << 8) >>> 0]));
  }

  routerAccessEntities(): Set<Entity> {
    return new Set(selectRouterAccess(this.entityList, this.requirePlacements()).values());
  }

  recordLists(): Map<Entity, RecordEntry[]> {
    const placements = this.requirePlacements();
    const routerAccess = this.routerAccessEntities();
    const recorded = this.recordedCounters();
    return new Map(
      this.entityList.map((entity): [Entity, RecordEntry[]] => [
        entity,
        buildRecordList(entity, recorded, placements.get(entity) ?? null, routerAccess.has(entity)),
      ]),
    );
  }

  compile(random?: () => number): Map<Entity, Commands> {
    const routerAccess = this.routerAccessEntities();
    const recordLists = this.recordLists();
    const flowKeys = this.flowKeys();
    const context = { resolver: this.resolver, phases: this.effectivePhases(), routerAccess, random };
    return new Map(
      this.entityList.map((entity): [Entity, Commands] => {
        const counters = (recordLists.get(entity) ?? []).map((entry) => entry.counter);
        return [
          entity,
          compileEntity(context, entity, entity.sourceFlows, entity.sinkFlows, flowKeys, [...new Set(counters)]),
        ];
      }),
    );
  }

  /** Result buffer size in bytes for each entity. */
  resultSizes(): Map<Entity, number> {
    const samples = enumerateSamples(this.effectivePhases(), this.resolver).length;
    const recordLists = this.recordLists();
    return new Map(
      this.entityList.map((entity): [Entity, number] => [entity, resultBufferSize(samples, recordLists.get(entity) ?? [])]),
    );
  }

  decode(buffers: ReadonlyMap<Entity, Uint8Array>, options: { ignoreDeadlineErrors?: boolean } = {}): Results {
    return decodeResults(buffers, this.recordLists(), {
      entities: this.entityList,
      flows: this.flowList,
      phases: this.effectivePhases(),
      resolver: this.resolver,
      routes: this.routeMap ?? undefined,
      ignoreDeadlineErrors: options.ignoreDeadlineErrors,
    });
  }

  /**
   * Place (when needed), compile, load, step through every phase and decode
   * what the interpreters recorded. Faults reject with a `RuntimeFaultError`
   * carrying the decoded results; transport failures reject unchanged.
   */
  async run(options: RunOptions): Promise<Results> {
    if (this.openPhase) {
      throw new NestingError(`${this.openPhase.name} is still open`);
    }
    const config = resolveMeshConfig();
    const { transport } = options;
    const timeoutMs = options.phaseTimeoutMs ?? config.phaseTimeoutMs;
    const ignoreDeadlineErrors = options.ignoreDeadlineErrors ?? config.ignoreDeadlineErrors;

    await this.place(options.placer);
    const placements = this.requirePlacements();

    const programs = this.compile(options.random);
    const resultSizes = this.resultSizes();
    const buffers = await withRunLogAsync(
      "load",
      `${this.entityList.length} entities`,
      () => this.load(transport, placements, programs, resultSizes),
      (loaded) => `${loaded.size} programs loaded`,
    );

    const entities = this.entityList;
    const phases = this.effectivePhases();
    await transport.waitForState(entities, "sync0", timeoutMs);
    for (const [index, phase] of phases.entries()) {
      const last = index === phases.length - 1;
      await withRunLogAsync("phase", phase.name, async () => {
        await transport.sendSignal(`sync${index % 2}`);
        await transport.waitForState(entities, last ? "exit" : `sync${(index + 1) % 2}`, timeoutMs);
      });
    }

    const raw = await withRunLogAsync(
      "read",
      `${entities.length} entities`,
      async () => {
        const out = new Map<Entity, Uint8Array>();
        for (const entity of entities) {
          const buffer = buffers.get(entity);
          if (buffer) out.set(entity, await transport.read(buffer, resultSizes.get(entity) ?? 4));
        }
        return out;
      },
      (out) => `${[...out.values()].reduce((total, bytes) => total + bytes.byteLength, 0)} bytes`,
    );

    const results = this.decode(raw, { ignoreDeadlineErrors });
    if (results.faults.size > 0) {
      throw new RuntimeFaultError(results);
    }
    return results;
  }

  private async place(placer: PlacementProvider | undefined): Promise<void> {
    if (this.placementMap && this.allocationMap) return;
    if (!placer) {
      throw new ConfigError("the experiment has not been placed and no placer was given");
    }
    const demands = new Map(this.entityList.map((entity): [Entity, ResourceDemand] => [entity, { cores: 1 }]));
    const constraints = new Map<Entity, Chip>();
    for (const entity of this.entityList) {
      if (entity.chip) constraints.set(entity, entity.chip);
    }
    const solution = await withRunLogAsync(
      "place",
      `${this.entityList.length} entities, ${this.flowList.length} flows`,
      () => placer.place({ demands, flows: this.flowList, constraints }),
      (placed) => `${placed.placements.size} placed, ${placed.routes.size} routed`,
    );
    this.placements = solution.placements;
    this.allocations = solution.allocations;
    this.routes = solution.routes;
  }

  private async load(
    transport: Transport,
    placements: ReadonlyMap<Entity, Chip>,
    programs: ReadonlyMap<Entity, Commands>,
    resultSizes: ReadonlyMap<Entity, number>,
  ): Promise<Map<Entity, RemoteBuffer>> {
    const buffers = new Map<Entity, RemoteBuffer>();
    const images = new Map<Entity, LoadImage>();
    for (const entity of this.entityList) {
      const chip = placements.get(entity);
      const program = programs.get(entity);
      const cores = this.allocationMap?.get(entity);
      if (!chip || !program || !cores) {
        throw new ConfigError(`${entity.name} has no placement or allocation`);
      }
      // Results are written over the program once it has been read in
      const buffer = await transport.allocate(Math.max(program.size, resultSizes.get(entity) ?? 4), chip);
      await transport.write(buffer, program.pack());
      buffers.set(entity, buffer);
      images.set(entity, { chip, cores, buffer });
    }
    await transport.load(images);
    return buffers;
  }

  private requirePlacements(): Map<Entity, Chip> {
    if (!this.placementMap) {
      throw new ConfigError("the experiment must be placed before it is compiled");
    }
    return this.placementMap;
  }
}
