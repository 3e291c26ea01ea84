import type { DrawCommand, Rect } from "./RegionCaptureOverlayTypes";

export type PaintContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "beginPath"
  | "closePath"
  | "moveTo"
  | "lineTo"
  | "arcTo"
  | "fill"
  | "stroke"
  | "fillRect"
  | "strokeRect"
  | "clearRect"
  | "drawImage"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "imageSmoothingEnabled"
>;

export function paintDrawList(
  ctx: PaintContext,
  commands: DrawCommand[],
  source: CanvasImageSource,
  size: { width: number; height: number }
) {
  ctx.clearRect(0, 0, size.width, size.height);
  for (const command of commands) {
    paintCommand(ctx, command, source);
  }
}

function paintCommand(ctx: PaintContext, command: DrawCommand, source: CanvasImageSource) {
  switch (command.kind) {
    case "image": {
      const { x, y, width, height } = command.target;
      ctx.drawImage(source, x, y, width, height);
      break;
    }
    case "fill-rect":
      ctx.save();
      ctx.fillStyle = command.color;
      ctx.fillRect(command.rect.x, command.rect.y, command.rect.width, command.rect.height);
      ctx.restore();
      break;
    case "stroke-rect":
      ctx.save();
      ctx.strokeStyle = command.color;
      ctx.lineWidth = command.lineWidth;
      ctx.strokeRect(command.rect.x, command.rect.y, command.rect.width, command.rect.height);
      ctx.restore();
      break;
    case "rounded-rect":
      ctx.save();
      ctx.fillStyle = command.color;
      traceRoundedRect(ctx, command.rect, command.radius);
      ctx.fill();
      ctx.restore();
      break;
    case "line":
      ctx.save();
      ctx.strokeStyle = command.color;
      ctx.lineWidth = command.lineWidth;
      ctx.beginPath();
      ctx.moveTo(command.start.x, command.start.y);
      ctx.lineTo(command.end.x, command.end.y);
      ctx.stroke();
      ctx.restore();
      break;
    case "image-region": {
      const { source: from, target: to } = command;
      ctx.save();
      ctx.imageSmoothingEnabled = false;
      ctx.drawImage(source, from.x, from.y, from.width, from.height, to.x, to.y, to.width, to.height);
      ctx.restore();
      break;
    }
    default:
      break;
  }
}

function traceRoundedRect(ctx: PaintContext, rect: Rect, radius: number) {
  const r = Math.min(radius, rect.width / 2, rect.height / 2);
  const right = rect.x + rect.width;
  const bottom = rect.y + rect.height;
  ctx.beginPath();
  ctx.moveTo(rect.x + r, rect.y);
  ctx.arcTo(right, rect.y, right, bottom, r);
  ctx.arcTo(right, bottom, rect.x, bottom, r);
  ctx.arcTo(rect.x, bottom, rect.x, rect.y, r);
  ctx.arcTo(rect.x, rect.y, right, rect.y, r);
  ctx.closePath();
}
