import { describe, expect, it } from "vitest";
import type { DragMode, Rect, ResizeHandle, SelectionState } from "./RegionCaptureOverlayTypes";
import {
  applyResize,
  createSelection,
  cursorForPosition,
  endDrag,
  getCornerHandles,
  getCropRegion,
  hasValidSelection,
  hitTest,
  selectAll,
  selectPredefinedRegion,
  startDrag,
  updateDrag,
  updateHoveredRegion
} from "./selection";

const SCREEN = { width: 1920, height: 1080 };

const withRect = (rect: Rect, predefined: Rect[] = []): SelectionState => ({
  ...createSelection(SCREEN, predefined),
  rect
});

const drag = (state: SelectionState, from: { x: number; y: number }, to: { x: number; y: number }) =>
  endDrag(updateDrag(startDrag(state, from), to));

describe("drawing a new selection", () => {
  it("creates the rect from press to release", () => {
    const state = drag(createSelection(SCREEN), { x: 100, y: 100 }, { x: 500, y: 400 });
    expect(getCropRegion(state)).toEqual({ x: 100, y: 100, width: 400, height: 300 });
    expect(hasValidSelection(state)).toBe(true);
    expect(state.dragMode).toEqual({ mode: "none" });
  });

  it("materializes an empty rect at the press point", () => {
    const state = startDrag(createSelection(SCREEN), { x: 40, y: 60 });
    expect(state.dragMode).toEqual({ mode: "creating" });
    expect(state.rect).toEqual({ x: 40, y: 60, width: 0, height: 0 });
  });

  it("keeps drawing towards the top-left until release", () => {
    const moving = updateDrag(startDrag(createSelection(SCREEN), { x: 300, y: 300 }), {
      x: 200,
      y: 250
    });
    expect(moving.rect).toEqual({ x: 300, y: 300, width: -100, height: -50 });
    expect(getCropRegion(moving)).toEqual({ x: 200, y: 250, width: 100, height: 50 });
    expect(endDrag(moving).rect).toEqual({ x: 200, y: 250, width: 100, height: 50 });
  });

  it("reports an undersized rect as invalid while still returning its crop", () => {
    const state = updateDrag(startDrag(createSelection(SCREEN), { x: 100, y: 100 }), {
      x: 110,
      y: 110
    });
    expect(hasValidSelection(state)).toBe(false);
    expect(getCropRegion(state)).toEqual({ x: 100, y: 100, width: 10, height: 10 });
  });

  it("grows an undersized rect to the minimum on release", () => {
    const state = drag(createSelection(SCREEN), { x: 100, y: 100 }, { x: 110, y: 105 });
    expect(state.rect).toEqual({ x: 100, y: 100, width: 20, height: 20 });
    expect(hasValidSelection(state)).toBe(true);
  });
});

describe("resizing", () => {
  const rect = { x: 100, y: 100, width: 400, height: 300 };

  it("drags the top-left handle", () => {
    const state = drag(withRect(rect), { x: 100, y: 100 }, { x: 150, y: 150 });
    expect(state.rect).toEqual({ x: 150, y: 150, width: 350, height: 250 });
  });

  it("restores the width after moving the right edge out and back", () => {
    const wider = drag(withRect(rect), { x: 500, y: 250 }, { x: 600, y: 250 });
    expect(wider.rect).toEqual({ x: 100, y: 100, width: 500, height: 300 });
    const restored = drag(wider, { x: 600, y: 250 }, { x: 500, y: 250 });
    expect(restored.rect).toEqual(rect);
  });

  it("flips when an edge is dragged past the opposite one", () => {
    const state = updateDrag(startDrag(withRect(rect), { x: 500, y: 250 }), { x: 50, y: 250 });
    expect(state.rect).toEqual({ x: 50, y: 100, width: 50, height: 300 });
  });

  it("measures every move from the press point", () => {
    const start = startDrag(withRect(rect), { x: 500, y: 250 });
    const state = updateDrag(updateDrag(start, { x: 700, y: 250 }), { x: 520, y: 250 });
    expect(state.rect).toEqual({ x: 100, y: 100, width: 420, height: 300 });
  });

  it.each<[ResizeHandle, Rect]>([
    ["nw", { x: 110, y: 120, width: 390, height: 280 }],
    ["n", { x: 100, y: 120, width: 400, height: 280 }],
    ["ne", { x: 100, y: 120, width: 410, height: 280 }],
    ["e", { x: 100, y: 100, width: 410, height: 300 }],
    ["se", { x: 100, y: 100, width: 410, height: 320 }],
    ["s", { x: 100, y: 100, width: 400, height: 320 }],
    ["sw", { x: 110, y: 100, width: 390, height: 320 }],
    ["w", { x: 110, y: 100, width: 390, height: 300 }]
  ])("moves only the sides the %s handle owns", (handle, expected) => {
    expect(applyResize(rect, handle, 10, 20, SCREEN)).toEqual(expected);
  });

  it("keeps at least the minimum size", () => {
    expect(applyResize(rect, "nw", 395, 295, SCREEN)).toEqual({
      x: 495,
      y: 395,
      width: 20,
      height: 20
    });
  });
});

describe("moving", () => {
  const rect = { x: 100, y: 100, width: 400, height: 300 };

  it("leaves the rect unchanged when released without moving", () => {
    const state = endDrag(startDrag(withRect(rect), { x: 300, y: 250 }));
    expect(state.rect).toEqual(rect);
  });

  it("normalizes a reversed rect on a zero-movement press", () => {
    const state = endDrag(
      startDrag(withRect({ x: 500, y: 400, width: -400, height: -300 }), { x: 300, y: 250 })
    );
    expect(state.rect).toEqual(rect);
  });

  it("clamps the rect to the screen", () => {
    const state = updateDrag(startDrag(withRect(rect), { x: 300, y: 250 }), { x: 2000, y: 250 });
    expect(state.rect).toEqual({ x: 1520, y: 100, width: 400, height: 300 });
  });
});

describe("hitTest", () => {
  const state = withRect({ x: 100, y: 100, width: 400, height: 300 });

  it("prefers corners over edges", () => {
    expect(hitTest(state, { x: 100, y: 100 })).toEqual({ mode: "resizing", handle: "nw" });
    expect(hitTest(state, { x: 107, y: 100 })).toEqual({ mode: "resizing", handle: "nw" });
    expect(hitTest(state, { x: 500, y: 400 })).toEqual({ mode: "resizing", handle: "se" });
  });

  it("finds edges between the corners", () => {
    expect(hitTest(state, { x: 108, y: 100 })).toEqual({ mode: "resizing", handle: "n" });
    expect(hitTest(state, { x: 300, y: 92 })).toEqual({ mode: "resizing", handle: "n" });
    expect(hitTest(state, { x: 300, y: 400 })).toEqual({ mode: "resizing", handle: "s" });
    expect(hitTest(state, { x: 100, y: 250 })).toEqual({ mode: "resizing", handle: "w" });
    expect(hitTest(state, { x: 500, y: 250 })).toEqual({ mode: "resizing", handle: "e" });
  });

  it("prefers edges over the interior", () => {
    expect(hitTest(state, { x: 300, y: 104 })).toEqual({ mode: "resizing", handle: "n" });
  });

  it("resolves exactly one mode across every handle and edge boundary", () => {
    const offsets = [-10, -9, -8.5, -8, -7.5, -7, -6, -1, 0, 1, 6, 7, 7.5, 8, 8.5, 9, 10];
    const anchors = [
      { x: 100, y: 100 },
      { x: 500, y: 100 },
      { x: 500, y: 400 },
      { x: 100, y: 400 },
      { x: 107, y: 100 },
      { x: 300, y: 100 },
      { x: 493, y: 400 },
      { x: 100, y: 250 },
      { x: 500, y: 393 }
    ];
    const corners: [ResizeHandle, number, number][] = [
      ["nw", 100, 100],
      ["ne", 500, 100],
      ["se", 500, 400],
      ["sw", 100, 400]
    ];
    const edges: [ResizeHandle, (x: number, y: number) => boolean][] = [
      ["n", (x, y) => x > 107 && x < 493 && Math.abs(y - 100) <= 8],
      ["s", (x, y) => x > 107 && x < 493 && Math.abs(y - 400) <= 8],
      ["w", (x, y) => y > 107 && y < 393 && Math.abs(x - 100) <= 8],
      ["e", (x, y) => y > 107 && y < 393 && Math.abs(x - 500) <= 8]
    ];
    const expectedAt = (x: number, y: number): DragMode => {
      const corner = corners.find(([, cx, cy]) => Math.abs(x - cx) <= 7 && Math.abs(y - cy) <= 7);
      if (corner) {
        return { mode: "resizing", handle: corner[0] };
      }
      const edge = edges.find(([, owns]) => owns(x, y));
      if (edge) {
        return { mode: "resizing", handle: edge[0] };
      }
      if (x >= 100 && x <= 500 && y >= 100 && y <= 400) {
        return { mode: "moving" };
      }
      return { mode: "creating" };
    };

    for (const anchor of anchors) {
      for (const dx of offsets) {
        for (const dy of offsets) {
          const point = { x: anchor.x + dx, y: anchor.y + dy };
          expect(hitTest(state, point)).toEqual(expectedAt(point.x, point.y));
        }
      }
    }
  });

  it("falls back to moving inside and creating outside", () => {
    expect(hitTest(state, { x: 300, y: 250 })).toEqual({ mode: "moving" });
    expect(hitTest(state, { x: 300, y: 91 })).toEqual({ mode: "creating" });
    expect(hitTest(createSelection(SCREEN), { x: 300, y: 250 })).toEqual({ mode: "creating" });
  });
});

describe("cursorForPosition", () => {
  const state = withRect({ x: 100, y: 100, width: 400, height: 300 });

  it("names the handle under the pointer", () => {
    expect(cursorForPosition(state, { x: 100, y: 100 })).toBe("nw-resize");
    expect(cursorForPosition(state, { x: 300, y: 100 })).toBe("n-resize");
    expect(cursorForPosition(state, { x: 300, y: 250 })).toBe("grab");
    expect(cursorForPosition(state, { x: 50, y: 50 })).toBe("crosshair");
  });

  it("shows grabbing for the whole of a move", () => {
    const moving = startDrag(state, { x: 300, y: 250 });
    expect(cursorForPosition(moving, { x: 0, y: 0 })).toBe("grabbing");
  });
});

describe("getCornerHandles", () => {
  it("centres a square on each corner", () => {
    const handles = getCornerHandles(withRect({ x: 100, y: 100, width: 400, height: 300 }));
    expect(handles).toEqual([
      { handle: "nw", rect: { x: 93, y: 93, width: 14, height: 14 } },
      { handle: "ne", rect: { x: 493, y: 93, width: 14, height: 14 } },
      { handle: "se", rect: { x: 493, y: 393, width: 14, height: 14 } },
      { handle: "sw", rect: { x: 93, y: 393, width: 14, height: 14 } }
    ]);
  });

  it("returns null without a rect", () => {
    expect(getCornerHandles(createSelection(SCREEN))).toBeNull();
  });
});

describe("predefined regions", () => {
  const regions = [
    { x: 10, y: 10, width: 100, height: 100 },
    { x: 200, y: 200, width: 10.4, height: 15.6 }
  ];

  it("selects a region as its rounded crop", () => {
    const first = selectPredefinedRegion(createSelection(SCREEN, regions), 0);
    expect(first.selected).toBe(true);
    expect(getCropRegion(first.state)).toEqual({ x: 10, y: 10, width: 100, height: 100 });
    expect(hasValidSelection(first.state)).toBe(true);

    const second = selectPredefinedRegion(createSelection(SCREEN, regions), 1);
    expect(getCropRegion(second.state)).toEqual({ x: 200, y: 200, width: 10, height: 16 });
    expect(hasValidSelection(second.state)).toBe(false);
  });

  it("takes an out-of-bounds region as it is", () => {
    const state = createSelection({ width: 100, height: 100 }, [
      { x: 90, y: 90, width: 50, height: 50 }
    ]);
    expect(selectPredefinedRegion(state, 0).state.rect).toEqual({
      x: 90,
      y: 90,
      width: 50,
      height: 50
    });
  });

  it("ignores unknown indices", () => {
    const state = createSelection(SCREEN, regions);
    expect(selectPredefinedRegion(state, 5)).toEqual({ state, selected: false });
    expect(selectPredefinedRegion(state, 0.5).selected).toBe(false);
  });

  it("tracks the hovered region until a rect exists", () => {
    const state = createSelection(SCREEN, regions);
    const hovered = updateHoveredRegion(state, { x: 50, y: 50 });
    expect(hovered.hoveredRegion).toBe(0);
    expect(updateHoveredRegion(hovered, { x: 60, y: 60 })).toBe(hovered);
    expect(updateHoveredRegion(hovered, { x: 500, y: 500 }).hoveredRegion).toBeNull();

    const withSelection = { ...hovered, rect: { x: 0, y: 0, width: 50, height: 50 } };
    expect(updateHoveredRegion(withSelection, { x: 50, y: 50 }).hoveredRegion).toBeNull();
  });

  it("clears the hover when a drag starts", () => {
    const hovered = updateHoveredRegion(createSelection(SCREEN, regions), { x: 50, y: 50 });
    expect(startDrag(hovered, { x: 50, y: 50 }).hoveredRegion).toBeNull();
  });
});

describe("selectAll", () => {
  it("covers the whole screen", () => {
    const state = selectAll(createSelection(SCREEN));
    expect(getCropRegion(state)).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });
  });
});
