import type {
  CropRegion,
  CursorIdentity,
  Point,
  SelectionState
} from "./RegionCaptureOverlayTypes";
import type { CursorCache } from "./cursorCache";
import {
  cursorForPosition,
  endDrag,
  findPredefinedRegionAt,
  getCropRegion,
  hasValidSelection,
  selectAll,
  selectPredefinedRegion,
  startDrag,
  updateDrag,
  updateHoveredRegion
} from "./selection";

export type InteractionControllerOptions<T> = {
  selection: SelectionState;
  cursors: CursorCache<T>;
  applyCursor: (cursor: T) => void;
  requestRedraw: () => void;
  onSelectionChange?: (region: CropRegion | null) => void;
};

export type InteractionController = {
  getSelection: () => SelectionState;
  getPointer: () => Point | null;
  isPointerInside: () => boolean;
  isDragging: () => boolean;
  pointerDown: (point: Point) => void;
  pointerMove: (point: Point) => void;
  pointerUp: (point: Point) => void;
  pointerEnter: (point: Point) => void;
  pointerLeave: () => void;
  selectAll: () => void;
  getCropRegion: () => CropRegion | null;
  hasValidSelection: () => boolean;
};

/**
 * Turns raw pointer and keyboard input into selection transitions. The
 * controller is the only writer of the selection; renderers read it through
 * `getSelection` between events.
 */
export function createInteractionController<T>({
  selection: initialSelection,
  cursors,
  applyCursor,
  requestRedraw,
  onSelectionChange
}: InteractionControllerOptions<T>): InteractionController {
  let selection = initialSelection;
  let dragging = false;
  let pointerInside = false;
  let pointer: Point | null = null;
  let appliedCursor: CursorIdentity | null = null;

  const setCursor = (identity: CursorIdentity) => {
    if (identity === appliedCursor) {
      return;
    }
    appliedCursor = identity;
    applyCursor(cursors.get(identity));
  };

  const refreshCursor = (point: Point) => {
    if (!selection.rect && selection.hoveredRegion !== null) {
      setCursor("pointer");
      return;
    }
    setCursor(cursorForPosition(selection, point));
  };

  const commit = (next: SelectionState) => {
    selection = next;
    requestRedraw();
    onSelectionChange?.(getCropRegion(selection));
  };

  const pointerDown = (point: Point) => {
    pointer = point;
    if (!selection.rect) {
      const index = findPredefinedRegionAt(selection, point);
      if (index !== null) {
        const result = selectPredefinedRegion(selection, index);
        if (result.selected) {
          commit(result.state);
          refreshCursor(point);
          return;
        }
      }
    }
    dragging = true;
    commit(startDrag(selection, point));
    refreshCursor(point);
  };

  const pointerMove = (point: Point) => {
    pointer = point;
    if (dragging) {
      commit(updateDrag(selection, point));
      return;
    }
    selection = updateHoveredRegion(selection, point);
    refreshCursor(point);
    requestRedraw();
  };

  const pointerUp = (point: Point) => {
    pointer = point;
    if (dragging) {
      dragging = false;
      commit(endDrag(selection));
    }
    refreshCursor(point);
  };

  const pointerEnter = (point: Point) => {
    pointerInside = true;
    pointer = point;
    if (!dragging) {
      selection = updateHoveredRegion(selection, point);
    }
    refreshCursor(point);
    requestRedraw();
  };

  const pointerLeave = () => {
    pointerInside = false;
    requestRedraw();
  };

  return {
    getSelection: () => selection,
    getPointer: () => pointer,
    isPointerInside: () => pointerInside,
    isDragging: () => dragging,
    pointerDown,
    pointerMove,
    pointerUp,
    pointerEnter,
    pointerLeave,
    selectAll: () => {
      commit(selectAll(selection));
      if (pointer) {
        refreshCursor(pointer);
      }
    },
    getCropRegion: () => getCropRegion(selection),
    hasValidSelection: () => hasValidSelection(selection)
  };
}
