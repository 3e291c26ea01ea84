import type { Point, Rect, Size } from "./RegionCaptureOverlayTypes";
import type { OverlayLaunch } from "../regionCaptureTypes";
import { parseRegionLines } from "./predefinedRegions";

export function readLaunchFromQuery(search: string = window.location.search): OverlayLaunch | null {
  const params = new URLSearchParams(search);
  if (params.get("window") !== "overlay") {
    return null;
  }
  return normalizeLaunch({
    src: params.get("src"),
    width: params.get("width"),
    height: params.get("height"),
    regions: params.get("regions")
  });
}

export function normalizeLaunch(input: unknown): OverlayLaunch | null {
  if (!input || typeof input !== "object") {
    return null;
  }
  const candidate = input as Record<string, unknown>;

  const imageSrc = candidate.imageSrc ?? candidate.src;
  const width = toNumber(candidate.width);
  const height = toNumber(candidate.height);

  if (
    typeof imageSrc !== "string" ||
    imageSrc.trim().length === 0 ||
    width === null ||
    height === null ||
    width <= 0 ||
    height <= 0
  ) {
    return null;
  }

  const regionsText = typeof candidate.regions === "string" ? candidate.regions : "";

  return {
    imageSrc,
    width,
    height,
    // Query strings cannot carry raw newlines comfortably, so ";" works too.
    predefinedRegions: parseRegionLines(regionsText.replace(/;/g, "\n"))
  };
}

export type CaptureGeometry = {
  canvas: Size;
  predefinedRegions: Rect[];
};

/**
 * The canvas is addressed in the screenshot's own pixels, so the selection,
 * the magnifier and the crop all share one space. Launch dimensions stand in
 * until the image reports a size; predefined regions arrive in launch
 * coordinates and are scaled onto the image.
 */
export function resolveCaptureGeometry(
  launch: OverlayLaunch,
  image: { naturalWidth: number; naturalHeight: number }
): CaptureGeometry {
  const canvas: Size = {
    width: image.naturalWidth > 0 ? image.naturalWidth : launch.width,
    height: image.naturalHeight > 0 ? image.naturalHeight : launch.height
  };
  const scaleX = canvas.width / launch.width;
  const scaleY = canvas.height / launch.height;
  if (scaleX === 1 && scaleY === 1) {
    return { canvas, predefinedRegions: launch.predefinedRegions };
  }
  return {
    canvas,
    predefinedRegions: launch.predefinedRegions.map((region) => ({
      x: region.x * scaleX,
      y: region.y * scaleY,
      width: region.width * scaleX,
      height: region.height * scaleY
    }))
  };
}

export function toNumber(value: unknown): number | null {
  if (value == null) {
    return null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function clampNumber(value: number, min: number, max: number): number {
  if (max <= min) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export type ElementBox = {
  left: number;
  top: number;
  width: number;
  height: number;
};

/**
 * Maps a client position into canvas space. The canvas is laid out at CSS
 * size but addressed in image pixels, so the point is scaled per axis.
 */
export function toCanvasPoint(
  client: Point,
  box: ElementBox,
  canvas: Size
): Point {
  const scaleX = box.width > 0 ? canvas.width / box.width : 1;
  const scaleY = box.height > 0 ? canvas.height / box.height : 1;
  return {
    x: (client.x - box.left) * scaleX,
    y: (client.y - box.top) * scaleY
  };
}

export function toClientRect(
  rect: { x: number; y: number; width: number; height: number },
  box: ElementBox,
  canvas: Size
) {
  const scaleX = canvas.width > 0 ? box.width / canvas.width : 1;
  const scaleY = canvas.height > 0 ? box.height / canvas.height : 1;
  return {
    x: rect.x * scaleX,
    y: rect.y * scaleY,
    width: rect.width * scaleX,
    height: rect.height * scaleY
  };
}
