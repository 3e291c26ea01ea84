import {
  useCallback,
  useEffect,
  useLayoutEffect,
  useMemo,
  useRef,
  useState,
  type PointerEvent as ReactPointerEvent
} from "react";
import type { OverlayLaunch, RegionCaptureHost } from "../regionCaptureTypes";
import type { OverlayRenderConfig } from "./RegionCaptureOverlayConstants";
import type { CropRegion, Point, Size } from "./RegionCaptureOverlayTypes";
import {
  readLaunchFromQuery,
  resolveCaptureGeometry,
  toCanvasPoint,
  toClientRect,
  type ElementBox
} from "./RegionCaptureOverlayUtils";
import { RegionCaptureActionBar } from "./RegionCaptureActionBar";
import { computeActionBarPlacement, isActionBarVisible } from "./actionBarPlacement";
import { createBrowserCaptureHost } from "./browserCaptureHost";
import { createCssCursorCache } from "./cursorCache";
import { createInteractionController, type InteractionController } from "./interactionController";
import { resolveShortcut } from "./keyboardShortcuts";
import { paintDrawList } from "./paintDrawList";
import { buildOverlayDrawList, resolveRenderConfig } from "./renderOverlay";
import { createSelection } from "./selection";
import { OVERLAY_CANVAS, OVERLAY_HINT, OVERLAY_NOTICE, OVERLAY_ROOT } from "../../../../ui/styles";

const FALLBACK_BAR_SIZE: Size = { width: 160, height: 56 };

type ExportAction = "copy" | "save";

type RegionCaptureOverlayProps = {
  launch?: OverlayLaunch | null;
  host?: RegionCaptureHost;
  renderConfig?: Partial<OverlayRenderConfig>;
  onSelectionChange?: (region: CropRegion | null) => void;
};

export function RegionCaptureOverlay({
  launch: launchProp,
  host: hostProp,
  renderConfig,
  onSelectionChange
}: RegionCaptureOverlayProps) {
  const [launch] = useState<OverlayLaunch | null>(() =>
    launchProp === undefined ? readLaunchFromQuery() : launchProp
  );
  const [image, setImage] = useState<HTMLImageElement | null>(null);
  const [error, setError] = useState<string | null>(() =>
    launch ? null : "Missing capture details. Close this window and try again."
  );
  const [region, setRegion] = useState<CropRegion | null>(null);
  const [busy, setBusy] = useState(false);
  const [overlayBox, setOverlayBox] = useState<ElementBox | null>(null);
  const [barSize, setBarSize] = useState<Size>(FALLBACK_BAR_SIZE);

  const rootRef = useRef<HTMLDivElement | null>(null);
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const barRef = useRef<HTMLDivElement | null>(null);
  const controllerRef = useRef<InteractionController | null>(null);
  const redrawRef = useRef<(() => void) | null>(null);
  const busyRef = useRef(false);
  const onSelectionChangeRef = useRef(onSelectionChange);
  onSelectionChangeRef.current = onSelectionChange;

  const config = useMemo(() => resolveRenderConfig(renderConfig), [renderConfig]);
  const configRef = useRef(config);
  configRef.current = config;

  const geometry = useMemo(
    () => (launch && image ? resolveCaptureGeometry(launch, image) : null),
    [launch, image]
  );

  const host = useMemo<RegionCaptureHost | null>(
    () => hostProp ?? (image ? createBrowserCaptureHost(image) : null),
    [hostProp, image]
  );

  useEffect(() => {
    if (!launch) {
      return;
    }
    let disposed = false;
    const next = new Image();
    next.onload = () => {
      if (!disposed) {
        setImage(next);
      }
    };
    next.onerror = () => {
      if (disposed) {
        return;
      }
      console.error(`Failed to load screenshot from ${launch.imageSrc}`);
      setError("Failed to load the screenshot.");
    };
    next.src = launch.imageSrc;
    return () => {
      disposed = true;
      next.onload = null;
      next.onerror = null;
    };
  }, [launch]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!geometry || !image || !canvas) {
      return;
    }
    canvas.width = geometry.canvas.width;
    canvas.height = geometry.canvas.height;

    let frame: number | null = null;
    const paint = () => {
      frame = null;
      const controller = controllerRef.current;
      const ctx = canvas.getContext("2d");
      if (!controller || !ctx) {
        return;
      }
      const selection = controller.getSelection();
      const commands = buildOverlayDrawList({
        image: geometry.canvas,
        selection,
        cursor: controller.getPointer(),
        pointerInside: controller.isPointerInside(),
        config: configRef.current
      });
      paintDrawList(ctx, commands, image, selection.bounds);
    };
    const requestRedraw = () => {
      if (frame !== null) {
        return;
      }
      frame = window.requestAnimationFrame(paint);
    };

    controllerRef.current = createInteractionController({
      selection: createSelection(geometry.canvas, geometry.predefinedRegions),
      cursors: createCssCursorCache(),
      applyCursor: (cursor) => {
        canvas.style.cursor = cursor;
      },
      requestRedraw,
      onSelectionChange: (next) => {
        setRegion(next);
        onSelectionChangeRef.current?.(next);
      }
    });
    redrawRef.current = requestRedraw;
    requestRedraw();

    return () => {
      if (frame !== null) {
        window.cancelAnimationFrame(frame);
      }
      controllerRef.current = null;
      redrawRef.current = null;
    };
  }, [geometry, image]);

  useEffect(() => {
    redrawRef.current?.();
  }, [config]);

  useLayoutEffect(() => {
    const element = rootRef.current;
    if (!element) {
      return;
    }
    const update = () => {
      const bounds = element.getBoundingClientRect();
      setOverlayBox({
        left: bounds.left,
        top: bounds.top,
        width: bounds.width,
        height: bounds.height
      });
    };

    update();
    const observer = typeof ResizeObserver === "undefined" ? null : new ResizeObserver(update);
    observer?.observe(element);
    window.addEventListener("resize", update);
    return () => {
      observer?.disconnect();
      window.removeEventListener("resize", update);
    };
  }, []);

  const showActionBar = isActionBarVisible(region);

  useLayoutEffect(() => {
    const bar = barRef.current;
    if (!showActionBar || !bar || bar.offsetWidth === 0 || bar.offsetHeight === 0) {
      return;
    }
    setBarSize((previous) =>
      previous.width === bar.offsetWidth && previous.height === bar.offsetHeight
        ? previous
        : { width: bar.offsetWidth, height: bar.offsetHeight }
    );
  }, [showActionBar]);

  const placement = useMemo(() => {
    if (!geometry || !overlayBox || !isActionBarVisible(region)) {
      return null;
    }
    const anchor = toClientRect(region, overlayBox, geometry.canvas);
    return computeActionBarPlacement(anchor, barSize, overlayBox);
  }, [geometry, overlayBox, region, barSize]);

  const handleCancel = useCallback(() => {
    if (host) {
      host.close();
      return;
    }
    window.close();
  }, [host]);

  const runAction = useCallback(
    async (action: ExportAction) => {
      if (busyRef.current || !host) {
        return;
      }
      const target = controllerRef.current?.getCropRegion() ?? null;
      if (!target) {
        setError("Select a region first.");
        return;
      }

      busyRef.current = true;
      setBusy(true);
      setError(null);
      try {
        if (action === "copy") {
          await host.copy(target);
        } else {
          await host.save(target);
        }
        host.close();
      } catch (issue) {
        console.error(issue);
        const fallback =
          action === "copy" ? "Failed to copy the selection." : "Failed to save the selection.";
        setError(issue instanceof Error ? issue.message : fallback);
      } finally {
        busyRef.current = false;
        setBusy(false);
      }
    },
    [host]
  );

  useEffect(() => {
    const handleKeyDown = (event: KeyboardEvent) => {
      const shortcut = resolveShortcut(event);
      if (!shortcut) {
        return;
      }
      event.preventDefault();
      switch (shortcut) {
        case "cancel":
          handleCancel();
          break;
        case "select-all":
          controllerRef.current?.selectAll();
          break;
        case "copy":
        case "save":
          void runAction(shortcut);
          break;
        default:
          break;
      }
    };

    window.addEventListener("keydown", handleKeyDown);
    return () => {
      window.removeEventListener("keydown", handleKeyDown);
    };
  }, [handleCancel, runAction]);

  const readPoint = (event: ReactPointerEvent<HTMLCanvasElement>): Point => {
    const canvas = event.currentTarget;
    const bounds = canvas.getBoundingClientRect();
    return toCanvasPoint(
      { x: event.clientX, y: event.clientY },
      { left: bounds.left, top: bounds.top, width: bounds.width, height: bounds.height },
      { width: canvas.width, height: canvas.height }
    );
  };

  const handlePointerDown = (event: ReactPointerEvent<HTMLCanvasElement>) => {
    const controller = controllerRef.current;
    if (!controller || event.button !== 0) {
      return;
    }
    setError(null);
    if (typeof event.currentTarget.setPointerCapture === "function") {
      event.currentTarget.setPointerCapture(event.pointerId);
    }
    controller.pointerDown(readPoint(event));
  };

  const handlePointerMove = (event: ReactPointerEvent<HTMLCanvasElement>) => {
    controllerRef.current?.pointerMove(readPoint(event));
  };

  const handlePointerUp = (event: ReactPointerEvent<HTMLCanvasElement>) => {
    const canvas = event.currentTarget;
    if (typeof canvas.hasPointerCapture === "function" && canvas.hasPointerCapture(event.pointerId)) {
      canvas.releasePointerCapture(event.pointerId);
    }
    controllerRef.current?.pointerUp(readPoint(event));
  };

  return (
    <div ref={rootRef} className={OVERLAY_ROOT}>
      <canvas
        ref={canvasRef}
        className={OVERLAY_CANVAS}
        data-testid="region-capture-canvas"
        onPointerDown={handlePointerDown}
        onPointerMove={handlePointerMove}
        onPointerUp={handlePointerUp}
        onPointerCancel={handlePointerUp}
        onPointerEnter={(event) => controllerRef.current?.pointerEnter(readPoint(event))}
        onPointerLeave={() => controllerRef.current?.pointerLeave()}
      />

      {launch && image && !region && (
        <div className={OVERLAY_HINT}>
          <p>Drag to select a region, or click a highlighted area.</p>
          <p className="mt-1 text-[11px] text-white/75">Enter copies, Ctrl+S saves, Esc cancels.</p>
        </div>
      )}

      {showActionBar && (
        <RegionCaptureActionBar
          ref={barRef}
          placement={placement}
          busy={busy}
          onCopy={() => void runAction("copy")}
          onSave={() => void runAction("save")}
          onCancel={handleCancel}
        />
      )}

      {error && (
        <div role="alert" className={OVERLAY_NOTICE}>
          {error}
        </div>
      )}
    </div>
  );
}
