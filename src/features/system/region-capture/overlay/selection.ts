import type {
  CornerHandle,
  CropRegion,
  CursorIdentity,
  DragMode,
  EdgeHandle,
  Point,
  Rect,
  ResizeHandle,
  SelectionState,
  Size
} from "./RegionCaptureOverlayTypes";
import {
  EDGE_GRAB_WIDTH,
  HANDLE_SIZE,
  MIN_SELECTION_SIZE
} from "./RegionCaptureOverlayConstants";
import {
  constrainRect,
  createRect,
  isPointWithinRect,
  normalizeRect,
  rectBottom,
  rectRight,
  translateRect
} from "./rect";

const IDLE: DragMode = { mode: "none" };

export function createSelection(
  bounds: Size,
  predefinedRegions: readonly Rect[] = []
): SelectionState {
  return {
    rect: null,
    bounds: { width: bounds.width, height: bounds.height },
    dragMode: IDLE,
    dragStart: { x: 0, y: 0 },
    dragStartRect: null,
    predefinedRegions,
    hoveredRegion: null
  };
}

export type CornerHandleBox = {
  handle: CornerHandle;
  rect: Rect;
};

export function getCornerHandles(state: SelectionState): CornerHandleBox[] | null {
  if (!state.rect) {
    return null;
  }
  const rect = normalizeRect(state.rect);
  const half = HANDLE_SIZE / 2;
  const right = rectRight(rect);
  const bottom = rectBottom(rect);
  return [
    { handle: "nw", rect: createRect(rect.x - half, rect.y - half, HANDLE_SIZE, HANDLE_SIZE) },
    { handle: "ne", rect: createRect(right - half, rect.y - half, HANDLE_SIZE, HANDLE_SIZE) },
    { handle: "se", rect: createRect(right - half, bottom - half, HANDLE_SIZE, HANDLE_SIZE) },
    { handle: "sw", rect: createRect(rect.x - half, bottom - half, HANDLE_SIZE, HANDLE_SIZE) }
  ];
}

function hitTestCorner(state: SelectionState, point: Point): CornerHandle | null {
  const handles = getCornerHandles(state);
  if (!handles) {
    return null;
  }
  return handles.find((box) => isPointWithinRect(point, box.rect))?.handle ?? null;
}

function hitTestEdge(state: SelectionState, point: Point): EdgeHandle | null {
  if (!state.rect) {
    return null;
  }
  const rect = normalizeRect(state.rect);
  const half = HANDLE_SIZE / 2;
  const right = rectRight(rect);
  const bottom = rectBottom(rect);

  // Corners own everything up to their half extent along a side.
  const alongHorizontal = point.x > rect.x + half && point.x < right - half;
  const alongVertical = point.y > rect.y + half && point.y < bottom - half;

  if (alongHorizontal && Math.abs(point.y - rect.y) <= EDGE_GRAB_WIDTH) {
    return "n";
  }
  if (alongHorizontal && Math.abs(point.y - bottom) <= EDGE_GRAB_WIDTH) {
    return "s";
  }
  if (alongVertical && Math.abs(point.x - rect.x) <= EDGE_GRAB_WIDTH) {
    return "w";
  }
  if (alongVertical && Math.abs(point.x - right) <= EDGE_GRAB_WIDTH) {
    return "e";
  }
  return null;
}

export function hitTest(state: SelectionState, point: Point): DragMode {
  const corner = hitTestCorner(state, point);
  if (corner) {
    return { mode: "resizing", handle: corner };
  }
  const edge = hitTestEdge(state, point);
  if (edge) {
    return { mode: "resizing", handle: edge };
  }
  if (state.rect && isPointWithinRect(point, state.rect)) {
    return { mode: "moving" };
  }
  return { mode: "creating" };
}

export function cursorForPosition(state: SelectionState, point: Point): CursorIdentity {
  if (state.dragMode.mode === "moving") {
    return "grabbing";
  }
  const hit = hitTest(state, point);
  switch (hit.mode) {
    case "resizing":
      return `${hit.handle}-resize`;
    case "moving":
      return "grab";
    default:
      return "crosshair";
  }
}

export function startDrag(state: SelectionState, point: Point): SelectionState {
  const dragMode = hitTest(state, point);
  return {
    ...state,
    dragMode,
    dragStart: { x: point.x, y: point.y },
    dragStartRect: state.rect,
    rect: dragMode.mode === "creating" ? createRect(point.x, point.y, 0, 0) : state.rect,
    hoveredRegion: null
  };
}

/**
 * Every update measures from the press point and the rect captured at press
 * time, so a long drag never accumulates rounding from earlier moves.
 */
export function updateDrag(state: SelectionState, point: Point): SelectionState {
  const { dragMode, dragStart, dragStartRect, bounds } = state;
  const dx = point.x - dragStart.x;
  const dy = point.y - dragStart.y;

  switch (dragMode.mode) {
    case "creating":
      return { ...state, rect: createRect(dragStart.x, dragStart.y, dx, dy) };
    case "moving":
      if (!dragStartRect) {
        return state;
      }
      return { ...state, rect: constrainRect(translateRect(dragStartRect, dx, dy), bounds) };
    case "resizing":
      if (!dragStartRect) {
        return state;
      }
      return { ...state, rect: applyResize(dragStartRect, dragMode.handle, dx, dy, bounds) };
    default:
      return state;
  }
}

export function applyResize(
  start: Rect,
  handle: ResizeHandle,
  dx: number,
  dy: number,
  bounds: Size
): Rect {
  let { x, y, width, height } = start;

  switch (handle) {
    case "nw":
      x = start.x + dx;
      y = start.y + dy;
      width = start.width - dx;
      height = start.height - dy;
      break;
    case "n":
      y = start.y + dy;
      height = start.height - dy;
      break;
    case "ne":
      y = start.y + dy;
      width = start.width + dx;
      height = start.height - dy;
      break;
    case "e":
      width = start.width + dx;
      break;
    case "se":
      width = start.width + dx;
      height = start.height + dy;
      break;
    case "s":
      height = start.height + dy;
      break;
    case "sw":
      x = start.x + dx;
      width = start.width - dx;
      height = start.height + dy;
      break;
    case "w":
      x = start.x + dx;
      width = start.width - dx;
      break;
  }

  return constrainRect(normalizeRect({ x, y, width, height }), bounds);
}

export function endDrag(state: SelectionState): SelectionState {
  return {
    ...state,
    rect: state.rect ? constrainRect(state.rect, state.bounds) : null,
    dragMode: IDLE,
    dragStartRect: null
  };
}

export function findPredefinedRegionAt(state: SelectionState, point: Point): number | null {
  const index = state.predefinedRegions.findIndex((region) => isPointWithinRect(point, region));
  return index >= 0 ? index : null;
}

export function updateHoveredRegion(state: SelectionState, point: Point): SelectionState {
  const hoveredRegion = state.rect ? null : findPredefinedRegionAt(state, point);
  if (hoveredRegion === state.hoveredRegion) {
    return state;
  }
  return { ...state, hoveredRegion };
}

/**
 * Predefined regions come from the caller already in canvas space and are
 * taken as they are, without the constrain pass a drag gets.
 */
export function selectPredefinedRegion(
  state: SelectionState,
  index: number
): { state: SelectionState; selected: boolean } {
  const region = state.predefinedRegions[index];
  if (!Number.isInteger(index) || !region) {
    return { state, selected: false };
  }
  return {
    state: { ...state, rect: { ...region }, hoveredRegion: null },
    selected: true
  };
}

export function selectAll(state: SelectionState): SelectionState {
  return {
    ...state,
    rect: createRect(0, 0, state.bounds.width, state.bounds.height),
    hoveredRegion: null
  };
}

export function getCropRegion(state: SelectionState): CropRegion | null {
  if (!state.rect) {
    return null;
  }
  const rect = normalizeRect(state.rect);
  return {
    x: Math.round(rect.x),
    y: Math.round(rect.y),
    width: Math.round(rect.width),
    height: Math.round(rect.height)
  };
}

export function hasValidSelection(state: SelectionState) {
  if (!state.rect) {
    return false;
  }
  const rect = normalizeRect(state.rect);
  return rect.width >= MIN_SELECTION_SIZE && rect.height >= MIN_SELECTION_SIZE;
}
