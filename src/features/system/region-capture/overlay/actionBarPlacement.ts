import type { CropRegion, Size } from "./RegionCaptureOverlayTypes";
import {
  ACTION_BAR_EDGE_PADDING,
  ACTION_BAR_MARGIN,
  MIN_SELECTION_SIZE
} from "./RegionCaptureOverlayConstants";

export type ActionBarPlacement = {
  left: number;
  top: number;
  mode: "outside" | "inside";
};

export type PlacementAnchor = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export function isActionBarVisible(region: CropRegion | null): region is CropRegion {
  return Boolean(
    region && region.width >= MIN_SELECTION_SIZE && region.height >= MIN_SELECTION_SIZE
  );
}

/**
 * Centres the bar under the anchor. It goes above when there is no room
 * below, and inside the anchor's bottom edge when there is no room above
 * either.
 */
export function computeActionBarPlacement(
  region: PlacementAnchor,
  bar: Size,
  screen: Size
): ActionBarPlacement {
  const centerX = region.x + region.width / 2;
  let left = centerX - bar.width / 2;
  let top = region.y + region.height + ACTION_BAR_MARGIN;
  let mode: ActionBarPlacement["mode"] = "outside";

  if (top + bar.height > screen.height - ACTION_BAR_EDGE_PADDING) {
    top = region.y - bar.height - ACTION_BAR_MARGIN;
    if (top < ACTION_BAR_EDGE_PADDING) {
      top = region.y + region.height - bar.height - ACTION_BAR_MARGIN;
      mode = "inside";
    }
  }

  if (left < ACTION_BAR_EDGE_PADDING) {
    left = ACTION_BAR_EDGE_PADDING;
  }
  if (left + bar.width > screen.width - ACTION_BAR_EDGE_PADDING) {
    left = screen.width - bar.width - ACTION_BAR_EDGE_PADDING;
  }

  return { left, top, mode };
}
