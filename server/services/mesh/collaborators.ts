import type { Chip, Entity, Flow } from "./model";

// Placement, allocation and routing happen elsewhere; only their results are
// consumed here.

/** Processor ids allocated to an entity; need not be contiguous. */
export type ResourceRange = readonly number[];

export interface RoutingPath {
  /** Router hops from the flow's source to `sink`, or null if it is not reached. */
  hopsTo(sink: Entity): number | null;
}

export type ResourceDemand = { cores: number };

export type PlacementRequest = {
  demands: ReadonlyMap<Entity, ResourceDemand>;
  flows: readonly Flow[];
  /** Fixed locations requested when entities were declared. */
  constraints: ReadonlyMap<Entity, Chip>;
};

export type PlacementSolution = {
  placements: Map<Entity, Chip>;
  allocations: Map<Entity, ResourceRange>;
  routes: Map<Flow, RoutingPath>;
};

export interface PlacementProvider {
  place(request: PlacementRequest): Promise<PlacementSolution>;
}

/** Opaque handle to a block of remote memory. */
export type RemoteBuffer = {
  chip: Chip;
  address: number;
  size: number;
};

export type LoadImage = {
  chip: Chip;
  cores: ResourceRange;
  buffer: RemoteBuffer;
};

/**
 * Moves programs and results to and from the machine. Every call may reject
 * with a transport-specific error, which is passed to the caller untouched.
 */
export interface Transport {
  allocate(size: number, chip: Chip): Promise<RemoteBuffer>;
  write(buffer: RemoteBuffer, data: Uint8Array): Promise<void>;
  load(images: ReadonlyMap<Entity, LoadImage>): Promise<void>;
  waitForState(entities: readonly Entity[], state: string, timeoutMs: number): Promise<void>;
  sendSignal(signal: string): Promise<void>;
  read(buffer: RemoteBuffer, size: number): Promise<Uint8Array>;
}

/** Hop counts from a per-flow table, e.g. one produced by a routing tool. */
export class HopTableRoute implements RoutingPath {
  constructor(private readonly hops: ReadonlyMap<Entity, number>) {}

  hopsTo(sink: Entity): number | null {
    return this.hops.get(sink) ?? null;
  }
}
