import type { LinearGradientFill, RibbonSurface, StrokeStyle } from "#core/ribbons/surface";
import { colorWithOpacity, isHexColor } from "#core/ribbons/theme";

export type RibbonCanvasContext = Pick<
  CanvasRenderingContext2D,
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "bezierCurveTo"
  | "closePath"
  | "fill"
  | "stroke"
  | "createLinearGradient"
  | "save"
  | "restore"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "lineCap"
  | "globalAlpha"
>;

/**
 * Adapts a 2D canvas context. Hex palette colors get per-stop rgba opacity;
 * any other CSS color is used as given and faded with `globalAlpha` at the
 * strongest stop's opacity.
 */
export const createCanvasSurface = (ctx: RibbonCanvasContext): RibbonSurface => ({
  beginPath: () => ctx.beginPath(),
  moveTo: (x, y) => ctx.moveTo(x, y),
  lineTo: (x, y) => ctx.lineTo(x, y),
  curveTo: (cp1x, cp1y, cp2x, cp2y, x, y) => ctx.bezierCurveTo(cp1x, cp1y, cp2x, cp2y, x, y),
  closePath: () => ctx.closePath(),
  fillWithGradient: (fill: LinearGradientFill) => {
    const gradient = ctx.createLinearGradient(fill.x0, fill.y0, fill.x1, fill.y1);
    if (fill.stops.every((stop) => isHexColor(stop.color))) {
      for (const stop of fill.stops) {
        gradient.addColorStop(stop.offset, colorWithOpacity(stop.color, stop.opacity));
      }
      ctx.fillStyle = gradient;
      ctx.fill();
      return;
    }

    for (const stop of fill.stops) {
      gradient.addColorStop(stop.offset, stop.color);
    }
    ctx.save();
    ctx.globalAlpha = Math.max(0, ...fill.stops.map((stop) => stop.opacity));
    ctx.fillStyle = gradient;
    ctx.fill();
    ctx.restore();
  },
  strokeWithStyle: (style: StrokeStyle) => {
    ctx.save();
    ctx.globalAlpha = style.opacity;
    ctx.strokeStyle = style.color;
    ctx.lineWidth = style.width;
    ctx.lineCap = style.lineCap;
    ctx.stroke();
    ctx.restore();
  },
});
