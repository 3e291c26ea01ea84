export const OVERLAY_ROOT = "relative h-screen w-screen select-none touch-none overflow-hidden bg-black";
export const OVERLAY_CANVAS = "block h-full w-full";
export const OVERLAY_NOTICE =
  "pointer-events-none absolute bottom-8 left-1/2 -translate-x-1/2 rounded-xl bg-[rgba(240,60,60,0.18)] px-3 py-2 text-sm text-[#ffd7d7] backdrop-blur";
export const OVERLAY_HINT =
  "pointer-events-none absolute left-1/2 top-10 -translate-x-1/2 rounded-2xl bg-[rgba(18,27,43,0.78)] px-4 py-2 text-center text-xs font-medium text-white shadow-lg backdrop-blur";
export const ACTION_BAR_CONTAINER =
  "absolute z-30 flex items-center gap-3 rounded-full border border-white/10 px-[10px] py-2 shadow-[0_4px_12px_rgba(0,0,0,0.4)]";
export const ACTION_BUTTON_BASE =
  "inline-flex h-10 w-10 items-center justify-center rounded-full bg-white/10 text-white transition-colors duration-200 hover:bg-white/15 active:bg-white/20 disabled:cursor-not-allowed disabled:opacity-50";
export const ACTION_BUTTON_PRIMARY = "bg-[#3584e4] hover:bg-[#4a9cf4] active:bg-[#2974d4]";
export const ACTION_BUTTON_DANGER = "bg-[#e33b3b] hover:bg-[#f44b4b] active:bg-[#d32b2b]";
