import { format } from "date-fns";

export function screenshotFileName(now: Date) {
  return `screenshot-${format(now, "yyyy-MM-dd-HH-mm-ss")}.png`;
}
