import { describe, expect, it } from "vitest";
import { createBuildingProfile } from "./building-profile.js";
import { nearestCore, placeCores, planCoreStrategy } from "./core-strategy.js";

function strategyFor(length: number, width: number, floorCount: number, floorHeight = 3.5) {
  return planCoreStrategy(createBuildingProfile({ length, width, floorCount, floorHeight }));
}

describe("planCoreStrategy", () => {
  it("uses a single core for a tall compact building", () => {
    const strategy = strategyFor(50, 40, 12);
    expect(strategy.kind).toBe("single_core");
    expect(strategy.cores).toEqual([{ xCenter: 25, yCenter: 20, coreId: "core_1" }]);
  });

  it("uses several cores for a short wide building", () => {
    const strategy = strategyFor(120, 30, 3);
    expect(strategy.kind).toBe("multi_core");
    expect(strategy.coreCount).toBe(3);
    expect(strategy.cores).toEqual([
      { xCenter: 30, yCenter: 9, coreId: "core_1" },
      { xCenter: 90, yCenter: 9, coreId: "core_2" },
      { xCenter: 60, yCenter: 21, coreId: "core_3" },
    ]);
  });

  it("uses two cores for a mid-rise building of moderate aspect", () => {
    const strategy = strategyFor(40, 20, 5);
    expect(strategy.kind).toBe("dual_core");
    expect(strategy.cores.map((c) => [c.xCenter, c.yCenter])).toEqual([
      [12, 10],
      [28, 10],
    ]);
  });

  it("uses a single core for compact buildings above six floors even when short", () => {
    expect(strategyFor(20, 20, 7, 2).kind).toBe("single_core");
  });

  it("caps multi-core counts at four", () => {
    const strategy = strategyFor(200, 40, 2);
    expect(strategy.kind).toBe("multi_core");
    expect(strategy.coreCount).toBe(4);
  });

  it("keeps at least two cores for a small multi-core building", () => {
    expect(strategyFor(20, 20, 3).coreCount).toBe(2);
  });

  it("never returns more than one core once height passes 30 m", () => {
    for (let floors = 9; floors <= 20; floors++) {
      expect(strategyFor(120, 30, floors).coreCount).toBe(1);
    }
  });
});

describe("placeCores", () => {
  it("places cores along the longer axis when width exceeds length", () => {
    expect(placeCores(20, 100, 2)).toEqual([
      { xCenter: 10, yCenter: 30, coreId: "core_1" },
      { xCenter: 10, yCenter: 70, coreId: "core_2" },
    ]);
  });

  it("uses quadrant centers for four cores", () => {
    expect(placeCores(100, 40, 4).map((c) => [c.xCenter, c.yCenter])).toEqual([
      [25, 10],
      [75, 10],
      [25, 30],
      [75, 30],
    ]);
  });
});

describe("nearestCore", () => {
  const cores = placeCores(20, 20, 2);

  it("returns the closest core", () => {
    expect(nearestCore(cores, 18, 2).coreId).toBe("core_2");
  });

  it("keeps the first core on a tie", () => {
    expect(nearestCore(cores, 10, 10).coreId).toBe("core_1");
  });

  it("throws on an empty list", () => {
    expect(() => nearestCore([], 0, 0)).toThrow(RangeError);
  });
});
