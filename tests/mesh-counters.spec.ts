import { describe, expect, it } from "vitest";
import {
  COUNTERS,
  counterCategory,
  counterMask,
  isChipCounter,
  isPermanentCounter,
  isSinkCounter,
  isSourceCounter,
} from "@shared/mesh-counters";
import { OPTION_NAMES, OPTIONS, isOptionName, recordOptionName } from "@shared/mesh-options";

describe("counter registry", () => {
  it("orders counters by their record bit", () => {
    expect(COUNTERS).toHaveLength(24);
    expect(COUNTERS[0]).toBe("local_multicast");
    expect(COUNTERS.slice(-4)).toEqual(["sent", "blocked", "retried", "received"]);
  });

  it("assigns every counter exactly one category", () => {
    expect(counterCategory("dropped_p2p")).toBe("router");
    expect(counterCategory("reinject_missed")).toBe("reinjection");
    expect(counterCategory("deadlines_missed")).toBe("permanent");
    expect(counterCategory("retried")).toBe("source");
    expect(counterCategory("received")).toBe("sink");

    for (const counter of COUNTERS) {
      const hits = [isChipCounter, isPermanentCounter, isSourceCounter, isSinkCounter].filter((test) =>
        test(counter),
      );
      expect(hits).toHaveLength(1);
    }
  });

  it("builds record masks from bit positions", () => {
    expect(counterMask([])).toBe(0);
    expect(counterMask(["sent", "received"])).toBe(0x09000000);
    expect(counterMask(["local_multicast", "reinjected"])).toBe(0x00010001);
  });
});

describe("option registry", () => {
  it("has a global record option per counter", () => {
    for (const counter of COUNTERS) {
      const definition = OPTIONS[recordOptionName(counter)];
      expect(definition.scope).toBe("global");
      expect(definition.defaultValue).toBe(false);
    }
    expect(OPTION_NAMES).toHaveLength(17 + 24);
  });

  it("recognises option names", () => {
    expect(isOptionName("burst_phase")).toBe(true);
    expect(isOptionName("record_received")).toBe(true);
    expect(isOptionName("record_nothing")).toBe(false);
  });

  it("validates values with the option schema", () => {
    expect(OPTIONS.probability.schema.safeParse(0.25).success).toBe(true);
    expect(OPTIONS.probability.schema.safeParse(1.5).success).toBe(false);
    expect(OPTIONS.router_timeout.schema.safeParse([480, 16]).success).toBe(true);
    expect(OPTIONS.router_timeout.schema.safeParse(null).success).toBe(true);
    expect(OPTIONS.num_packets.schema.safeParse(1.5).success).toBe(false);
  });
});
