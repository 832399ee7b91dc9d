import { memo, useEffect, useRef, type CSSProperties } from "react";
import { drawRibbons } from "#core/ribbons/renderer";
import type { DiffPairWithConnection, RibbonPalette, VisibleRange } from "#core/ribbons/types";
import { createCanvasSurface } from "./canvasSurface";

interface ConnectionRibbonsProps {
  pairs: readonly DiffPairWithConnection[];
  lineHeight: number;
  viewWidth: number;
  isFluidMode: boolean;
  palette: RibbonPalette;
  /** Canvas covers only the viewport; rows above it are scrolled off by translating. */
  scrollTop: number;
  viewportHeight: number;
  visibleRange?: VisibleRange;
}

const canvasStyle: CSSProperties = {
  position: "absolute",
  top: 0,
  left: 0,
  pointerEvents: "none",
};

export const ConnectionRibbons = memo(({
  pairs,
  lineHeight,
  viewWidth,
  isFluidMode,
  palette,
  scrollTop,
  viewportHeight,
  visibleRange,
}: ConnectionRibbonsProps) => {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = canvas.getContext("2d");
    if (!ctx) return;

    const ratio = window.devicePixelRatio || 1;
    canvas.width = Math.max(1, Math.round(viewWidth * ratio));
    canvas.height = Math.max(1, Math.round(viewportHeight * ratio));
    ctx.setTransform(ratio, 0, 0, ratio, 0, 0);
    ctx.clearRect(0, 0, viewWidth, viewportHeight);
    ctx.translate(0, -scrollTop);

    drawRibbons(createCanvasSurface(ctx), pairs, {
      lineHeight,
      viewWidth,
      isFluidMode,
      palette,
      visibleRange,
    });
  }, [pairs, lineHeight, viewWidth, isFluidMode, palette, scrollTop, viewportHeight, visibleRange]);

  return (
    <canvas
      ref={canvasRef}
      className="connectionRibbons"
      aria-hidden
      style={{ ...canvasStyle, width: viewWidth, height: viewportHeight }}
    />
  );
});
