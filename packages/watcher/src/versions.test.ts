import { describe, it, expect } from "vitest";
import {
  classifyBump,
  compareVersions,
  isNumericVersion,
  isUpgrade,
} from "./versions.js";

describe("isNumericVersion", () => {
  it.each(["35", "0.21.0", "1.14.0", "v2.3", "2024.06.01"])(
    "treats %s as numeric",
    (version) => {
      expect(isNumericVersion(version)).toBe(true);
    },
  );

  it.each(["a1b2c3d", "1.0.0-beta.1", "1..2", "", "1.x"])(
    "treats %s as non-numeric",
    (version) => {
      expect(isNumericVersion(version)).toBe(false);
    },
  );
});

describe("compareVersions", () => {
  it("orders plain integers by value, not text", () => {
    expect(compareVersions("9", "10")).toBeLessThan(0);
  });

  it("compares dotted versions component-wise", () => {
    expect(compareVersions("0.21.0", "0.3.9")).toBeGreaterThan(0);
    expect(compareVersions("1.14.0", "1.14.1")).toBeLessThan(0);
  });

  it("pads missing components with zero", () => {
    expect(compareVersions("1.0", "1.0.0")).toBe(0);
  });

  it("ignores a leading v", () => {
    expect(compareVersions("v1.2", "1.2")).toBe(0);
  });

  it("returns undefined for non-numeric versions", () => {
    expect(compareVersions("abc123", "1.0")).toBeUndefined();
  });

  it("orders date-stamp integers beyond double precision", () => {
    expect(compareVersions("20240101000000000001", "20240101000000000002")).toBe(-1);
    expect(compareVersions("2024.20240101000000000002", "2024.20240101000000000001")).toBe(1);
  });
});

describe("isUpgrade", () => {
  it("flags a higher numeric version", () => {
    expect(isUpgrade("35", "36")).toBe(true);
  });

  it("never flags equal versions", () => {
    expect(isUpgrade("21", "21")).toBe(false);
    expect(isUpgrade("deadbeef", "deadbeef")).toBe(false);
  });

  it("flags a higher date-stamp integer beyond double precision", () => {
    expect(isUpgrade("20240101000000000001", "20240101000000000002")).toBe(true);
    expect(isUpgrade("20240101000000000002", "20240101000000000001")).toBe(false);
  });

  it("does not flag numerically equal spellings", () => {
    expect(isUpgrade("1.0", "1.0.0")).toBe(false);
  });

  it("does not flag a lower numeric version", () => {
    expect(isUpgrade("0.21.0", "0.20.5")).toBe(false);
  });

  it("treats any difference between non-numeric versions as a change", () => {
    expect(isUpgrade("a1b2c3d", "0f9e8d7")).toBe(true);
  });

  it("treats a switch between numeric and non-numeric as a change", () => {
    expect(isUpgrade("1.0.0", "1.0.0-beta.2")).toBe(true);
  });
});

describe("classifyBump", () => {
  it("returns major for a major bump", () => {
    expect(classifyBump("1.14.0", "2.0.0")).toBe("major");
  });

  it("returns minor for a minor bump", () => {
    expect(classifyBump("0.7.0", "0.8.0")).toBe("minor");
  });

  it("returns patch for a patch bump", () => {
    expect(classifyBump("0.21.0", "0.21.1")).toBe("patch");
  });

  it("returns undefined for non-semver versions", () => {
    expect(classifyBump("35", "36")).toBeUndefined();
  });

  it("returns undefined for equal versions", () => {
    expect(classifyBump("1.0.0", "1.0.0")).toBeUndefined();
  });
});
