export type Point = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type Rect = Point & Size;

export type CornerHandle = "nw" | "ne" | "se" | "sw";

export type EdgeHandle = "n" | "e" | "s" | "w";

export type ResizeHandle = CornerHandle | EdgeHandle;

export type DragMode =
  | { mode: "none" }
  | { mode: "creating" }
  | { mode: "moving" }
  | { mode: "resizing"; handle: ResizeHandle };

export type SelectionState = {
  rect: Rect | null;
  bounds: Size;
  dragMode: DragMode;
  dragStart: Point;
  dragStartRect: Rect | null;
  predefinedRegions: readonly Rect[];
  hoveredRegion: number | null;
};

export type CropRegion = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type CursorIdentity =
  | `${ResizeHandle}-resize`
  | "grab"
  | "grabbing"
  | "crosshair"
  | "pointer";

export type ImageCommand = {
  kind: "image";
  target: Rect;
};

export type FillRectCommand = {
  kind: "fill-rect";
  rect: Rect;
  color: string;
};

export type StrokeRectCommand = {
  kind: "stroke-rect";
  rect: Rect;
  color: string;
  lineWidth: number;
};

export type RoundedRectCommand = {
  kind: "rounded-rect";
  rect: Rect;
  radius: number;
  color: string;
};

export type LineCommand = {
  kind: "line";
  start: Point;
  end: Point;
  color: string;
  lineWidth: number;
};

export type ImageRegionCommand = {
  kind: "image-region";
  source: Rect;
  target: Rect;
};

export type DrawCommand =
  | ImageCommand
  | FillRectCommand
  | StrokeRectCommand
  | RoundedRectCommand
  | LineCommand
  | ImageRegionCommand;
