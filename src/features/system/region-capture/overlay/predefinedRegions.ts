import type { Rect } from "./RegionCaptureOverlayTypes";
import { parseRect } from "./rect";

/** One `x1,y1 x2,y2` region per line; lines that do not parse are dropped. */
export function parseRegionLines(text: string): Rect[] {
  const regions: Rect[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.trim().length === 0) {
      continue;
    }
    const rect = parseRect(line);
    if (rect) {
      regions.push(rect);
    }
  }
  return regions;
}
