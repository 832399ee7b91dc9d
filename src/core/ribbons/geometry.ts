import type { PathCommand } from "./surface.js";
import type { Ribbon } from "./types.js";

export const RIBBON_GAP = 60;
const CONTROL_OFFSET_RATIO = 0.5;

export interface Point {
  x: number;
  y: number;
}

export const ribbonSpan = (viewWidth: number): { centerX: number; leftEnd: number; rightStart: number } => {
  const centerX = viewWidth / 2;
  return {
    centerX,
    leftEnd: centerX - RIBBON_GAP / 2,
    rightStart: centerX + RIBBON_GAP / 2,
  };
};

/** Corners in path order: top-left, top-right, bottom-right, bottom-left. */
export const ribbonAnchors = (ribbon: Ribbon): [Point, Point, Point, Point] => [
  { x: ribbon.leftEnd, y: ribbon.topY },
  { x: ribbon.rightStart, y: ribbon.topY },
  { x: ribbon.rightStart, y: ribbon.bottomY },
  { x: ribbon.leftEnd, y: ribbon.bottomY },
];

const edgeTo = (ribbon: Ribbon, from: Point, to: Point): PathCommand => {
  if (ribbon.mode === "blocks") {
    return { op: "line", x: to.x, y: to.y };
  }
  const cpX = RIBBON_GAP * CONTROL_OFFSET_RATIO;
  // Control points keep the endpoint's y, pulled cpX toward the opposite end.
  const direction = to.x >= from.x ? 1 : -1;
  return {
    op: "curve",
    cp1x: from.x + direction * cpX,
    cp1y: from.y,
    cp2x: to.x - direction * cpX,
    cp2y: to.y,
    x: to.x,
    y: to.y,
  };
};

export const ribbonFillPath = (ribbon: Ribbon): PathCommand[] => {
  const [topLeft, topRight, bottomRight, bottomLeft] = ribbonAnchors(ribbon);
  return [
    { op: "move", x: topLeft.x, y: topLeft.y },
    edgeTo(ribbon, topLeft, topRight),
    { op: "line", x: bottomRight.x, y: bottomRight.y },
    edgeTo(ribbon, bottomRight, bottomLeft),
    { op: "close" },
  ];
};

export const ribbonBorderPaths = (ribbon: Ribbon): { top: PathCommand[]; bottom: PathCommand[] } => {
  const [topLeft, topRight, bottomRight, bottomLeft] = ribbonAnchors(ribbon);
  return {
    top: [{ op: "move", x: topLeft.x, y: topLeft.y }, edgeTo(ribbon, topLeft, topRight)],
    bottom: [{ op: "move", x: bottomLeft.x, y: bottomLeft.y }, edgeTo(ribbon, bottomLeft, bottomRight)],
  };
};

export const ribbonEdgeTicks = (ribbon: Ribbon): { left: PathCommand[]; right: PathCommand[] } => ({
  left: [
    { op: "move", x: ribbon.leftEnd, y: ribbon.topY },
    { op: "line", x: ribbon.leftEnd, y: ribbon.bottomY },
  ],
  right: [
    { op: "move", x: ribbon.rightStart, y: ribbon.topY },
    { op: "line", x: ribbon.rightStart, y: ribbon.bottomY },
  ],
});
