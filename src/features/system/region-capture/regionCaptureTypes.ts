import type { CropRegion, Rect } from "./overlay/RegionCaptureOverlayTypes";

export type OverlayLaunch = {
  imageSrc: string;
  width: number;
  height: number;
  predefinedRegions: Rect[];
};

/**
 * Everything that leaves the overlay goes through the host: encoding the crop,
 * putting it on the clipboard or disk, and closing the capture window.
 */
export type RegionCaptureHost = {
  copy: (region: CropRegion) => Promise<void>;
  save: (region: CropRegion) => Promise<string>;
  close: () => void;
};
