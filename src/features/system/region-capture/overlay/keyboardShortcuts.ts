export type OverlayShortcut = "cancel" | "select-all" | "copy" | "save";

export type ShortcutEvent = {
  key: string;
  ctrlKey: boolean;
  metaKey: boolean;
};

export function resolveShortcut(event: ShortcutEvent): OverlayShortcut | null {
  if (event.key === "Escape") {
    return "cancel";
  }
  if (event.key === "Enter") {
    return "copy";
  }
  if (!event.ctrlKey && !event.metaKey) {
    return null;
  }
  switch (event.key.toLowerCase()) {
    case "a":
      return "select-all";
    case "c":
      return "copy";
    case "s":
      return "save";
    default:
      return null;
  }
}
