import { isOptionName, OPTIONS, type OptionName, type OptionValues } from "@shared/mesh-options";
import { ConfigError, ScopeError } from "./errors";
import { Flow, type OptionOwner, type Phase } from "./model";

class OptionTiers<V> {
  readonly byPhase = new Map<Phase, V>();
  readonly byOwner = new Map<OptionOwner, V>();
  readonly byPair = new Map<Phase, Map<OptionOwner, V>>();

  constructor(public global: V) {}

  pair(phase: Phase, owner: OptionOwner): { found: boolean; value?: V } {
    const perOwner = this.byPair.get(phase);
    if (!perOwner || !perOwner.has(owner)) return { found: false };
    return { found: true, value: perOwner.get(owner) };
  }
}

const pick = <K, V>(map: Map<K, V>, key: K, fallback: V): V => {
  if (!map.has(key)) return fallback;
  const value = map.get(key);
  return value === undefined ? fallback : value;
};

const pickPair = <V>(tiers: OptionTiers<V>, phase: Phase | null, owner: OptionOwner, fallback: V): V => {
  if (!phase) return fallback;
  const hit = tiers.pair(phase, owner);
  return hit.found && hit.value !== undefined ? hit.value : fallback;
};

type TierTable = { [K in OptionName]?: OptionTiers<OptionValues[K]> };

/**
 * Hierarchical option store.
 *
 * Overridable options resolve, from least to most specific:
 * global, phase, owner, (phase, owner). For a flow, its source entity's
 * values slot in beneath the flow's own: global, phase, source,
 * (phase, source), flow, (phase, flow).
 */
export class OptionResolver {
  private readonly tiers: TierTable = {};

  get<K extends OptionName>(
    option: K,
    phase: Phase | null = null,
    owner: OptionOwner | null = null,
  ): OptionValues[K] {
    const definition = OPTIONS[option];
    if (!definition) {
      throw new ConfigError(`unknown option ${String(option)}`);
    }
    const tiers = this.tiers[option];
    if (!tiers) return definition.defaultValue;

    let value = tiers.global;
    if (phase) value = pick(tiers.byPhase, phase, value);
    if (!owner) return value;

    if (owner instanceof Flow) {
      value = pick(tiers.byOwner, owner.source, value);
      value = pickPair(tiers, phase, owner.source, value);
    }
    value = pick(tiers.byOwner, owner, value);
    return pickPair(tiers, phase, owner, value);
  }

  set<K extends OptionName>(
    option: K,
    value: OptionValues[K],
    phase: Phase | null = null,
    owner: OptionOwner | null = null,
  ): void {
    this.assign(option, value, phase, owner);
  }

  /** Set an option named at run time, e.g. from a parsed document. */
  setByName(name: string, value: unknown, phase: Phase | null = null, owner: OptionOwner | null = null): void {
    if (!isOptionName(name)) {
      throw new ConfigError(`unknown option ${name}`);
    }
    this.assign(name, value, phase, owner);
  }

  private assign<K extends OptionName>(
    option: K,
    value: unknown,
    phase: Phase | null,
    owner: OptionOwner | null,
  ): void {
    const definition = OPTIONS[option];
    if (!definition) {
      throw new ConfigError(`unknown option ${String(option)}`);
    }
    if (definition.scope === "global" && (phase || owner)) {
      throw new ScopeError(
        option,
        `${option} applies to the whole experiment and cannot be set for a particular ${phase ? "phase" : "entity or flow"}`,
      );
    }
    if (definition.scope === "phase" && owner) {
      throw new ScopeError(option, `${option} can only vary between phases, not for ${owner.name}`);
    }

    const parsed = definition.schema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(`invalid value for ${option}: ${issue ? issue.message : "rejected"} (got ${JSON.stringify(value)})`);
    }

    const tiers = this.tiersFor(option);
    if (phase && owner) {
      const perOwner = tiers.byPair.get(phase) ?? new Map<OptionOwner, OptionValues[K]>();
      perOwner.set(owner, parsed.data);
      tiers.byPair.set(phase, perOwner);
    } else if (phase) {
      tiers.byPhase.set(phase, parsed.data);
    } else if (owner) {
      tiers.byOwner.set(owner, parsed.data);
    } else {
      tiers.global = parsed.data;
    }
  }

  private tiersFor<K extends OptionName>(option: K): OptionTiers<OptionValues[K]> {
    const existing = this.tiers[option];
    if (existing) return existing;
    const created = new OptionTiers<OptionValues[K]>(OPTIONS[option].defaultValue);
    this.tiers[option] = created;
    return created;
  }
}
