import type { CropRegion } from "./RegionCaptureOverlayTypes";
import type { RegionCaptureHost } from "../regionCaptureTypes";
import { screenshotFileName } from "../screenshotFileName";

const getRegionContext = (region: CropRegion) => {
  const canvas = document.createElement("canvas");
  canvas.width = region.width;
  canvas.height = region.height;
  const ctx = canvas.getContext("2d");
  if (!ctx) {
    throw new Error("Could not create a canvas context.");
  }
  ctx.imageSmoothingEnabled = false;
  return { canvas, ctx };
};

const canvasToPngBlob = (canvas: HTMLCanvasElement) =>
  new Promise<Blob>((resolve, reject) => {
    canvas.toBlob((blob) => {
      if (!blob) {
        reject(new Error("Failed to encode the selection as PNG."));
        return;
      }
      resolve(blob);
    }, "image/png");
  });

export const cropToPngBlob = async (image: CanvasImageSource, region: CropRegion) => {
  if (region.width < 1 || region.height < 1) {
    throw new Error("The selection is empty.");
  }
  const { canvas, ctx } = getRegionContext(region);
  ctx.drawImage(
    image,
    region.x,
    region.y,
    region.width,
    region.height,
    0,
    0,
    region.width,
    region.height
  );
  return canvasToPngBlob(canvas);
};

const downloadBlob = (blob: Blob, filename: string) => {
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = filename;
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
};

export function createBrowserCaptureHost(
  image: CanvasImageSource,
  now: () => Date = () => new Date()
): RegionCaptureHost {
  return {
    copy: async (region) => {
      if (typeof ClipboardItem === "undefined" || !navigator.clipboard?.write) {
        throw new Error("Image clipboard access is not available here.");
      }
      const blob = await cropToPngBlob(image, region);
      await navigator.clipboard.write([new ClipboardItem({ [blob.type]: blob })]);
    },
    save: async (region) => {
      const blob = await cropToPngBlob(image, region);
      const filename = screenshotFileName(now());
      downloadBlob(blob, filename);
      return filename;
    },
    close: () => {
      window.close();
    }
  };
}
