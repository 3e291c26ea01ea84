import { describe, expect, it } from "vitest";
import { computeActionBarPlacement, isActionBarVisible } from "./actionBarPlacement";

const SCREEN = { width: 800, height: 600 };
const BAR = { width: 160, height: 56 };

describe("computeActionBarPlacement", () => {
  it("centres the bar below the selection", () => {
    expect(computeActionBarPlacement({ x: 100, y: 100, width: 400, height: 300 }, BAR, SCREEN)).toEqual({
      left: 220,
      top: 412,
      mode: "outside"
    });
  });

  it("moves above when there is no room below", () => {
    expect(computeActionBarPlacement({ x: 100, y: 400, width: 400, height: 180 }, BAR, SCREEN)).toEqual({
      left: 220,
      top: 332,
      mode: "outside"
    });
  });

  it("goes inside the bottom edge when neither side has room", () => {
    expect(computeActionBarPlacement({ x: 0, y: 0, width: 800, height: 600 }, BAR, SCREEN)).toEqual({
      left: 320,
      top: 532,
      mode: "inside"
    });
  });

  it("keeps the bar off both side edges", () => {
    expect(computeActionBarPlacement({ x: 0, y: 100, width: 40, height: 40 }, BAR, SCREEN).left).toBe(10);
    expect(computeActionBarPlacement({ x: 760, y: 100, width: 40, height: 40 }, BAR, SCREEN).left).toBe(
      630
    );
  });
});

describe("isActionBarVisible", () => {
  it("needs a region of at least the minimum size", () => {
    expect(isActionBarVisible(null)).toBe(false);
    expect(isActionBarVisible({ x: 0, y: 0, width: 20, height: 20 })).toBe(true);
    expect(isActionBarVisible({ x: 0, y: 0, width: 19, height: 40 })).toBe(false);
  });
});
