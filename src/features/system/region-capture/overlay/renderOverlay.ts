import type {
  DrawCommand,
  Point,
  Rect,
  ResizeHandle,
  SelectionState,
  Size
} from "./RegionCaptureOverlayTypes";
import {
  DEFAULT_RENDER_CONFIG,
  type OverlayRenderConfig
} from "./RegionCaptureOverlayConstants";
import { buildMagnifierCommands } from "./magnifier";
import { isPointWithinRect, normalizeRect, rectBottom, rectRight } from "./rect";
import { getCornerHandles, hitTest } from "./selection";

export type OverlayFrame = {
  image: Size;
  selection: SelectionState;
  cursor: Point | null;
  pointerInside: boolean;
  config?: OverlayRenderConfig;
};

export function resolveRenderConfig(
  overrides: Partial<OverlayRenderConfig> = {}
): OverlayRenderConfig {
  const config = { ...DEFAULT_RENDER_CONFIG, ...overrides };
  if (!Number.isInteger(config.magnifierGridSize) || config.magnifierGridSize % 2 === 0) {
    throw new Error(`Magnifier grid size must be an odd integer, got ${config.magnifierGridSize}.`);
  }
  if (!Number.isInteger(config.magnifierScale) || config.magnifierScale <= 0) {
    throw new Error(`Magnifier scale must be a positive integer, got ${config.magnifierScale}.`);
  }
  return config;
}

/**
 * Produces the full frame for the capture overlay. Reads the selection and
 * cursor only; the same inputs always give the same commands.
 */
export function buildOverlayDrawList({
  image,
  selection,
  cursor,
  pointerInside,
  config = DEFAULT_RENDER_CONFIG
}: OverlayFrame): DrawCommand[] {
  const canvas = selection.bounds;
  const commands: DrawCommand[] = [
    { kind: "image", target: { x: 0, y: 0, width: canvas.width, height: canvas.height } }
  ];

  if (!selection.rect) {
    commands.push({
      kind: "fill-rect",
      rect: { x: 0, y: 0, width: canvas.width, height: canvas.height },
      color: config.dimColor
    });
    commands.push(...buildPredefinedRegionCommands(selection, config));
    if (pointerInside && cursor) {
      commands.push(...buildFeedbackCommands(cursor, image, canvas, config));
    }
    return commands;
  }

  const rect = normalizeRect(selection.rect);
  commands.push(...buildDimStrips(rect, canvas, config));
  commands.push(...buildBorder(rect, config));
  commands.push(...buildHandleCommands(selection, config));

  const focus = resolveFeedbackPoint(selection, rect, cursor, pointerInside);
  if (focus) {
    commands.push(...buildFeedbackCommands(focus, image, canvas, config));
  }

  return commands;
}

/**
 * Where the crosshair and magnifier point, or null when they stay hidden.
 * Nothing is shown while the pointer is outside the overlay. While resizing,
 * each axis the handle moves snaps to the rect edge nearest the cursor, so a
 * drag past the opposite edge still tracks the pixel being placed.
 */
export function resolveFeedbackPoint(
  selection: SelectionState,
  rect: Rect,
  cursor: Point | null,
  pointerInside: boolean
): Point | null {
  if (!cursor || !pointerInside) {
    return null;
  }
  const { dragMode } = selection;
  switch (dragMode.mode) {
    case "creating":
      return cursor;
    case "moving":
      return null;
    case "resizing":
      return resizeFeedbackPoint(dragMode.handle, rect, cursor);
    default:
      if (isPointWithinRect(cursor, rect)) {
        return null;
      }
      return hitTest(selection, cursor).mode === "creating" ? cursor : null;
  }
}

function resizeFeedbackPoint(handle: ResizeHandle, rect: Rect, cursor: Point): Point {
  const movesX = handle.includes("w") || handle.includes("e");
  const movesY = handle.includes("n") || handle.includes("s");
  return {
    x: movesX ? nearestEdge(cursor.x, rect.x, rectRight(rect)) : cursor.x,
    y: movesY ? nearestEdge(cursor.y, rect.y, rectBottom(rect)) : cursor.y
  };
}

function nearestEdge(value: number, start: number, end: number): number {
  return Math.abs(value - start) <= Math.abs(value - end) ? start : end;
}

function buildPredefinedRegionCommands(
  selection: SelectionState,
  config: OverlayRenderConfig
): DrawCommand[] {
  const commands: DrawCommand[] = [];
  selection.predefinedRegions.forEach((region, index) => {
    const rect = normalizeRect(region);
    if (index === selection.hoveredRegion) {
      commands.push({ kind: "fill-rect", rect, color: config.regionHoverFill });
      commands.push({ kind: "stroke-rect", rect, color: config.regionHoverOutline, lineWidth: 2 });
      return;
    }
    commands.push({ kind: "stroke-rect", rect, color: config.regionOutline, lineWidth: 1 });
  });
  return commands;
}

export function buildDimStrips(rect: Rect, canvas: Size, config: OverlayRenderConfig): DrawCommand[] {
  const commands: DrawCommand[] = [];
  const right = rectRight(rect);
  const bottom = rectBottom(rect);

  if (rect.y > 0) {
    commands.push({
      kind: "fill-rect",
      rect: { x: 0, y: 0, width: canvas.width, height: rect.y },
      color: config.dimColor
    });
  }
  if (bottom < canvas.height) {
    commands.push({
      kind: "fill-rect",
      rect: { x: 0, y: bottom, width: canvas.width, height: canvas.height - bottom },
      color: config.dimColor
    });
  }
  if (rect.x > 0) {
    commands.push({
      kind: "fill-rect",
      rect: { x: 0, y: rect.y, width: rect.x, height: rect.height },
      color: config.dimColor
    });
  }
  if (right < canvas.width) {
    commands.push({
      kind: "fill-rect",
      rect: { x: right, y: rect.y, width: canvas.width - right, height: rect.height },
      color: config.dimColor
    });
  }
  return commands;
}

function buildBorder(rect: Rect, config: OverlayRenderConfig): DrawCommand[] {
  const border = config.borderWidth;
  const color = config.borderColor;
  return [
    {
      kind: "fill-rect",
      rect: { x: rect.x - border, y: rect.y - border, width: rect.width + border * 2, height: border },
      color
    },
    {
      kind: "fill-rect",
      rect: { x: rect.x - border, y: rect.y + rect.height, width: rect.width + border * 2, height: border },
      color
    },
    {
      kind: "fill-rect",
      rect: { x: rect.x - border, y: rect.y, width: border, height: rect.height },
      color
    },
    {
      kind: "fill-rect",
      rect: { x: rect.x + rect.width, y: rect.y, width: border, height: rect.height },
      color
    }
  ];
}

function buildHandleCommands(selection: SelectionState, config: OverlayRenderConfig): DrawCommand[] {
  const handles = getCornerHandles(selection) ?? [];
  return handles.flatMap(({ rect }): DrawCommand[] => [
    {
      kind: "rounded-rect",
      rect: { x: rect.x - 1, y: rect.y - 1, width: rect.width + 2, height: rect.height + 2 },
      radius: 4,
      color: config.handleRing
    },
    { kind: "rounded-rect", rect, radius: 3, color: config.handleFill }
  ]);
}

function buildFeedbackCommands(
  point: Point,
  image: Size,
  canvas: Size,
  config: OverlayRenderConfig
): DrawCommand[] {
  return [
    {
      kind: "line",
      start: { x: 0, y: point.y },
      end: { x: canvas.width, y: point.y },
      color: config.crosshairColor,
      lineWidth: 1
    },
    {
      kind: "line",
      start: { x: point.x, y: 0 },
      end: { x: point.x, y: canvas.height },
      color: config.crosshairColor,
      lineWidth: 1
    },
    ...buildMagnifierCommands(point, image, canvas, config)
  ];
}
