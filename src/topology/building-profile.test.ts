import { describe, expect, it } from "vitest";
import { createBuildingProfile, floorTag, floorZ } from "./building-profile.js";
import { InvalidParameterError } from "./errors.js";

describe("createBuildingProfile", () => {
  it("derives areas, height and floor levels", () => {
    const profile = createBuildingProfile({ length: 30, width: 20, floorHeight: 4, floorCount: 3 });
    expect(profile.floorArea).toBe(600);
    expect(profile.totalFloorArea).toBe(1800);
    expect(profile.height).toBe(12);
    expect(profile.basementDepth).toBe(4);
    expect(profile.floors).toEqual([
      { index: 0, z: -4, isBasement: true },
      { index: 1, z: 0, isBasement: false },
      { index: 2, z: 4, isBasement: false },
      { index: 3, z: 8, isBasement: false },
    ]);
  });

  it("defaults the electrical core to the footprint center", () => {
    const profile = createBuildingProfile({ length: 30, width: 20, floorHeight: 4, floorCount: 1 });
    expect(profile.electricalCore).toEqual({ center: { x: 15, y: 10 }, size: { width: 3, depth: 3 } });
  });

  it("keeps an explicit construction year", () => {
    const profile = createBuildingProfile({
      length: 10,
      width: 10,
      floorHeight: 3,
      floorCount: 1,
      constructionYear: 2010,
    });
    expect(profile.constructionYear).toBe(2010);
  });

  it("returns a frozen profile", () => {
    const profile = createBuildingProfile({ length: 10, width: 10, floorHeight: 3, floorCount: 1 });
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.floors)).toBe(true);
  });

  it("collects every invalid field", () => {
    try {
      createBuildingProfile({ length: -1, width: 10, floorHeight: 3, floorCount: 1.5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidParameterError);
      if (!(err instanceof InvalidParameterError)) return;
      expect(err.code).toBe("INVALID_PARAMETER");
      expect(err.issues).toEqual(["length: length must be greater than 0", "floorCount: floorCount must be an integer"]);
    }
  });

  it("rejects a core outside the footprint", () => {
    expect(() =>
      createBuildingProfile({
        length: 10,
        width: 10,
        floorHeight: 3,
        floorCount: 1,
        electricalCore: { center: { x: 12, y: 5 }, size: { width: 2, depth: 2 } },
      }),
    ).toThrow("electricalCore.center: electrical core center must lie inside the building footprint");
  });

  it("rejects a non-object input", () => {
    expect(() => createBuildingProfile("tall")).toThrow(InvalidParameterError);
  });
});

describe("floor helpers", () => {
  const profile = createBuildingProfile({ length: 10, width: 10, floorHeight: 3.5, floorCount: 2, basementDepth: 5 });

  it("looks up floor Z levels", () => {
    expect(floorZ(profile, 0)).toBe(-5);
    expect(floorZ(profile, 2)).toBe(3.5);
    expect(floorZ(profile, 9)).toBe(0);
  });

  it("tags floors", () => {
    expect(floorTag(0)).toBe("B");
    expect(floorTag(3)).toBe("L03");
    expect(floorTag(12)).toBe("L12");
  });
});
