import type { Point, Rect, Size } from "./RegionCaptureOverlayTypes";
import { MIN_SELECTION_SIZE } from "./RegionCaptureOverlayConstants";

export function createRect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

/**
 * Flips negative dimensions so the rect grows right and down from its origin.
 * A selection being drawn towards the top-left keeps negative sizes until
 * something reads it.
 */
export function normalizeRect(rect: Rect): Rect {
  const [x, width] = rect.width < 0 ? [rect.x + rect.width, -rect.width] : [rect.x, rect.width];
  const [y, height] =
    rect.height < 0 ? [rect.y + rect.height, -rect.height] : [rect.y, rect.height];
  return { x, y, width, height };
}

export function isPointWithinRect(point: Point, rect: Rect) {
  const normalized = normalizeRect(rect);
  return (
    point.x >= normalized.x &&
    point.x <= normalized.x + normalized.width &&
    point.y >= normalized.y &&
    point.y <= normalized.y + normalized.height
  );
}

export function rectRight(rect: Rect) {
  return rect.x + rect.width;
}

export function rectBottom(rect: Rect) {
  return rect.y + rect.height;
}

export function translateRect(rect: Rect, dx: number, dy: number): Rect {
  return { x: rect.x + dx, y: rect.y + dy, width: rect.width, height: rect.height };
}

/**
 * Keeps a rect on screen and at least MIN_SELECTION_SIZE on each side. When
 * the screen is smaller than the minimum the size falls back to the screen.
 */
export function constrainRect(rect: Rect, bounds: Size): Rect {
  const next = normalizeRect(rect);

  next.width = Math.max(next.width, MIN_SELECTION_SIZE);
  next.height = Math.max(next.height, MIN_SELECTION_SIZE);

  next.x = Math.max(next.x, 0);
  next.y = Math.max(next.y, 0);

  if (next.x + next.width > bounds.width) {
    next.x = bounds.width - next.width;
  }
  if (next.y + next.height > bounds.height) {
    next.y = bounds.height - next.height;
  }

  next.x = Math.max(next.x, 0);
  next.y = Math.max(next.y, 0);
  next.width = Math.min(next.width, bounds.width);
  next.height = Math.min(next.height, bounds.height);

  return next;
}

/**
 * Parses `"x1,y1 x2,y2"`, two opposite corners. Anything else, including a
 * zero or negative extent, yields null.
 */
export function parseRect(text: string): Rect | null {
  const corners = text.trim().split(/\s+/);
  if (corners.length !== 2) {
    return null;
  }
  const start = parsePair(corners[0]);
  const end = parsePair(corners[1]);
  if (!start || !end) {
    return null;
  }
  const width = end.x - start.x;
  const height = end.y - start.y;
  if (width <= 0 || height <= 0) {
    return null;
  }
  return { x: start.x, y: start.y, width, height };
}

function parsePair(text: string): Point | null {
  const parts = text.split(",");
  if (parts.length !== 2) {
    return null;
  }
  const x = toFiniteNumber(parts[0]);
  const y = toFiniteNumber(parts[1]);
  if (x === null || y === null) {
    return null;
  }
  return { x, y };
}

function toFiniteNumber(text: string): number | null {
  if (text.trim().length === 0) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
