import clsx from "clsx";
import { forwardRef } from "react";
import { motion } from "framer-motion";
import { Copy, Download, X } from "lucide-react";
import type { ActionBarPlacement } from "./actionBarPlacement";
import {
  ACTION_BAR_CONTAINER,
  ACTION_BUTTON_BASE,
  ACTION_BUTTON_DANGER,
  ACTION_BUTTON_PRIMARY
} from "../../../../ui/styles";

type RegionCaptureActionBarProps = {
  placement: ActionBarPlacement | null;
  busy: boolean;
  onCopy: () => void;
  onSave: () => void;
  onCancel: () => void;
};

export const RegionCaptureActionBar = forwardRef<HTMLDivElement, RegionCaptureActionBarProps>(
  function RegionCaptureActionBar({ placement, busy, onCopy, onSave, onCancel }, ref) {
    return (
      <motion.div
        ref={ref}
        role="toolbar"
        aria-label="Selection actions"
        aria-busy={busy}
        className={clsx(
          ACTION_BAR_CONTAINER,
          placement?.mode === "inside" ? "bg-[rgba(30,30,30,0.94)]" : "bg-[rgba(30,30,30,0.9)]"
        )}
        style={{
          left: `${placement?.left ?? 0}px`,
          top: `${placement?.top ?? 0}px`,
          visibility: placement ? "visible" : "hidden"
        }}
        initial={{ opacity: 0, y: 6 }}
        animate={{ opacity: 1, y: 0 }}
        transition={{ duration: 0.16, ease: "easeOut" }}
        onPointerDown={(event) => event.stopPropagation()}
      >
        <motion.button
          type="button"
          className={clsx(ACTION_BUTTON_BASE, ACTION_BUTTON_PRIMARY)}
          whileTap={{ scale: 0.94 }}
          onClick={onCopy}
          disabled={busy}
          title="Copy to clipboard"
          aria-label="Copy to clipboard"
        >
          <Copy className="h-4 w-4" />
        </motion.button>
        <motion.button
          type="button"
          className={ACTION_BUTTON_BASE}
          whileTap={{ scale: 0.94 }}
          onClick={onSave}
          disabled={busy}
          title="Save to file"
          aria-label="Save to file"
        >
          <Download className="h-4 w-4" />
        </motion.button>
        <motion.button
          type="button"
          className={clsx(ACTION_BUTTON_BASE, ACTION_BUTTON_DANGER)}
          whileTap={{ scale: 0.94 }}
          onClick={onCancel}
          title="Cancel"
          aria-label="Cancel"
        >
          <X className="h-4 w-4" />
        </motion.button>
      </motion.div>
    );
  }
);
