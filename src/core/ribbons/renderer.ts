import { pairSides, selectRibbonColor } from "./color.js";
import { ribbonBorderPaths, ribbonEdgeTicks, ribbonFillPath, ribbonSpan } from "./geometry.js";
import { tracePath, type RibbonSurface, type StrokeStyle } from "./surface.js";
import type { DiffPairWithConnection, Ribbon, RibbonLayout, RibbonPlan } from "./types.js";

const FILL_EDGE_OPACITY = 0.1;
const FILL_CENTER_OPACITY = 0.2;
const BORDER_OPACITY = 0.6;
const BORDER_WIDTH = 1.5;
const TICK_OPACITY = 0.3;
const TICK_WIDTH = 0.5;

const clampRange = (layout: RibbonLayout, count: number): { start: number; end: number } => {
  if (!layout.visibleRange) return { start: 0, end: count };
  const start = Math.max(0, Math.min(layout.visibleRange.start, count));
  const end = Math.max(start, Math.min(layout.visibleRange.end, count));
  return { start, end };
};

/**
 * Walks the pairs once, top to bottom. Every pair consumes one row whether
 * or not a ribbon is produced for it, so rows stay aligned with the panels.
 */
export const planRibbons = (pairs: readonly DiffPairWithConnection[], layout: RibbonLayout): RibbonPlan => {
  const { lineHeight, viewWidth, isFluidMode, palette } = layout;
  const { leftEnd, rightStart } = ribbonSpan(viewWidth);
  const range = clampRange(layout, pairs.length);
  const ribbons: Ribbon[] = [];
  let yOffset = 0;

  pairs.forEach((pair, index) => {
    const topY = yOffset;
    yOffset += lineHeight;
    if (pair.connectionType === "none") return;
    if (index < range.start || index >= range.end) return;

    const color = selectRibbonColor(pairSides(pair), palette);
    if (color === null) return;

    ribbons.push({
      index,
      pairId: pair.id,
      topY,
      bottomY: topY + lineHeight,
      leftEnd,
      rightStart,
      color,
      mode: isFluidMode ? "fluid" : "blocks",
    });
  });

  return { ribbons, contentHeight: yOffset };
};

export const paintRibbon = (surface: RibbonSurface, ribbon: Ribbon): void => {
  const { color } = ribbon;
  const midY = (ribbon.topY + ribbon.bottomY) / 2;

  tracePath(surface, ribbonFillPath(ribbon));
  surface.fillWithGradient({
    x0: ribbon.leftEnd,
    y0: midY,
    x1: ribbon.rightStart,
    y1: midY,
    stops: [
      { offset: 0, color, opacity: FILL_EDGE_OPACITY },
      { offset: 0.5, color, opacity: FILL_CENTER_OPACITY },
      { offset: 1, color, opacity: FILL_EDGE_OPACITY },
    ],
  });

  const borders = ribbonBorderPaths(ribbon);
  const borderStyle: StrokeStyle = { color, opacity: BORDER_OPACITY, width: BORDER_WIDTH, lineCap: "round" };
  tracePath(surface, borders.top);
  surface.strokeWithStyle(borderStyle);
  tracePath(surface, borders.bottom);
  surface.strokeWithStyle(borderStyle);

  const ticks = ribbonEdgeTicks(ribbon);
  const tickStyle: StrokeStyle = { color, opacity: TICK_OPACITY, width: TICK_WIDTH, lineCap: "butt" };
  tracePath(surface, ticks.left);
  surface.strokeWithStyle(tickStyle);
  tracePath(surface, ticks.right);
  surface.strokeWithStyle(tickStyle);
};

/**
 * Paints the ribbon overlay for `pairs`. `lineHeight` and `viewWidth` are
 * expected to be positive; they are not checked.
 */
export const drawRibbons = (
  surface: RibbonSurface,
  pairs: readonly DiffPairWithConnection[],
  layout: RibbonLayout,
): void => {
  const { ribbons } = planRibbons(pairs, layout);
  for (const ribbon of ribbons) {
    paintRibbon(surface, ribbon);
  }
};
