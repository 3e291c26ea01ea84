import type { DrawCommand, Point, Rect, Size } from "./RegionCaptureOverlayTypes";
import type { OverlayRenderConfig } from "./RegionCaptureOverlayConstants";
import { clampNumber } from "./RegionCaptureOverlayUtils";

export type MagnifierLayout = {
  /** Where the magnifier sits on the canvas. */
  box: Rect;
  /** The image pixel under the target, drawn in the centre cell. */
  centerPixel: Point;
  /** Part of the sampling window that lies inside the image, if any. */
  source: Rect | null;
  /** Where `source` is drawn inside `box`. */
  target: Rect | null;
};

export function computeMagnifierLayout(
  point: Point,
  image: Size,
  canvas: Size,
  config: Pick<OverlayRenderConfig, "magnifierGridSize" | "magnifierScale" | "magnifierMargin">
): MagnifierLayout {
  const { magnifierGridSize: grid, magnifierScale: scale, magnifierMargin: margin } = config;
  const size = grid * scale;
  const half = (grid - 1) / 2;

  const centerPixel = { x: Math.floor(point.x), y: Math.floor(point.y) };
  const windowLeft = centerPixel.x - half;
  const windowTop = centerPixel.y - half;

  const validLeft = Math.max(0, windowLeft);
  const validTop = Math.max(0, windowTop);
  const validRight = Math.min(image.width, windowLeft + grid);
  const validBottom = Math.min(image.height, windowTop + grid);
  const columns = validRight - validLeft;
  const rows = validBottom - validTop;

  let left = point.x + margin;
  let top = point.y + margin;
  if (left + size > canvas.width) {
    left = point.x - margin - size;
  }
  if (top + size > canvas.height) {
    top = point.y - margin - size;
  }
  left = clampNumber(left, 0, canvas.width - size);
  top = clampNumber(top, 0, canvas.height - size);

  const box = { x: left, y: top, width: size, height: size };

  if (columns <= 0 || rows <= 0) {
    return { box, centerPixel, source: null, target: null };
  }

  // The clipped window keeps its offset inside the grid so the centre cell
  // stays under the cursor near image edges.
  return {
    box,
    centerPixel,
    source: { x: validLeft, y: validTop, width: columns, height: rows },
    target: {
      x: left + (validLeft - windowLeft) * scale,
      y: top + (validTop - windowTop) * scale,
      width: columns * scale,
      height: rows * scale
    }
  };
}

export function buildMagnifierCommands(
  point: Point,
  image: Size,
  canvas: Size,
  config: OverlayRenderConfig
): DrawCommand[] {
  const layout = computeMagnifierLayout(point, image, canvas, config);
  const { box } = layout;
  const grid = config.magnifierGridSize;
  const scale = config.magnifierScale;
  const half = (grid - 1) / 2;
  const commands: DrawCommand[] = [
    { kind: "fill-rect", rect: box, color: config.magnifierBackground }
  ];

  if (layout.source && layout.target) {
    commands.push({ kind: "image-region", source: layout.source, target: layout.target });
  }

  for (let index = 1; index < grid; index += 1) {
    const offset = index * scale;
    commands.push({
      kind: "line",
      start: { x: box.x + offset, y: box.y },
      end: { x: box.x + offset, y: box.y + box.height },
      color: config.magnifierGridColor,
      lineWidth: 1
    });
    commands.push({
      kind: "line",
      start: { x: box.x, y: box.y + offset },
      end: { x: box.x + box.width, y: box.y + offset },
      color: config.magnifierGridColor,
      lineWidth: 1
    });
  }

  const middle = (half + 0.5) * scale;
  commands.push(
    {
      kind: "line",
      start: { x: box.x + middle, y: box.y },
      end: { x: box.x + middle, y: box.y + box.height },
      color: config.magnifierCrosshairColor,
      lineWidth: 1
    },
    {
      kind: "line",
      start: { x: box.x, y: box.y + middle },
      end: { x: box.x + box.width, y: box.y + middle },
      color: config.magnifierCrosshairColor,
      lineWidth: 1
    },
    {
      kind: "stroke-rect",
      rect: { x: box.x + half * scale, y: box.y + half * scale, width: scale, height: scale },
      color: config.magnifierCenterColor,
      lineWidth: 2
    },
    { kind: "stroke-rect", rect: box, color: config.magnifierBorder, lineWidth: 2 }
  );

  return commands;
}
