import type { CursorIdentity, ResizeHandle } from "./RegionCaptureOverlayTypes";

export const HANDLE_SIZE = 14;
export const EDGE_GRAB_WIDTH = 8;
export const MIN_SELECTION_SIZE = 20;

export const RESIZE_HANDLES: ResizeHandle[] = ["nw", "n", "ne", "e", "se", "s", "sw", "w"];

export const CURSOR_IDENTITIES: CursorIdentity[] = [
  ...RESIZE_HANDLES.map((handle): CursorIdentity => `${handle}-resize`),
  "grab",
  "grabbing",
  "crosshair",
  "pointer"
];

export type OverlayRenderConfig = {
  dimColor: string;
  borderColor: string;
  borderWidth: number;
  handleFill: string;
  handleRing: string;
  regionOutline: string;
  regionHoverFill: string;
  regionHoverOutline: string;
  crosshairColor: string;
  magnifierGridSize: number;
  magnifierScale: number;
  magnifierMargin: number;
  magnifierBackground: string;
  magnifierBorder: string;
  magnifierGridColor: string;
  magnifierCrosshairColor: string;
  magnifierCenterColor: string;
};

export const DEFAULT_RENDER_CONFIG: OverlayRenderConfig = {
  dimColor: "rgba(0,0,0,0.5)",
  borderColor: "rgba(255,255,255,1)",
  borderWidth: 2,
  handleFill: "rgba(255,255,255,1)",
  handleRing: "rgba(77,77,77,1)",
  regionOutline: "rgba(80,160,255,0.55)",
  regionHoverFill: "rgba(80,160,255,0.18)",
  regionHoverOutline: "rgba(80,160,255,0.95)",
  crosshairColor: "rgba(255,255,255,0.45)",
  magnifierGridSize: 15,
  magnifierScale: 8,
  magnifierMargin: 20,
  magnifierBackground: "rgba(18,27,43,0.92)",
  magnifierBorder: "rgba(255,255,255,0.9)",
  magnifierGridColor: "rgba(255,255,255,0.12)",
  magnifierCrosshairColor: "rgba(80,160,255,0.45)",
  magnifierCenterColor: "rgba(255,77,79,1)"
};

export const ACTION_BAR_MARGIN = 12;
export const ACTION_BAR_EDGE_PADDING = 10;
