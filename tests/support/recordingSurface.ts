import type { LinearGradientFill, RibbonSurface, StrokeStyle } from "../../src/core/ribbons/surface.js";

export type RecordedOp =
  | { op: "beginPath" }
  | { op: "moveTo"; x: number; y: number }
  | { op: "lineTo"; x: number; y: number }
  | { op: "curveTo"; cp1x: number; cp1y: number; cp2x: number; cp2y: number; x: number; y: number }
  | { op: "closePath" }
  | { op: "fill"; fill: LinearGradientFill }
  | { op: "stroke"; style: StrokeStyle };

export class RecordingSurface implements RibbonSurface {
  readonly ops: RecordedOp[] = [];

  beginPath(): void {
    this.ops.push({ op: "beginPath" });
  }

  moveTo(x: number, y: number): void {
    this.ops.push({ op: "moveTo", x, y });
  }

  lineTo(x: number, y: number): void {
    this.ops.push({ op: "lineTo", x, y });
  }

  curveTo(cp1x: number, cp1y: number, cp2x: number, cp2y: number, x: number, y: number): void {
    this.ops.push({ op: "curveTo", cp1x, cp1y, cp2x, cp2y, x, y });
  }

  closePath(): void {
    this.ops.push({ op: "closePath" });
  }

  fillWithGradient(fill: LinearGradientFill): void {
    this.ops.push({ op: "fill", fill });
  }

  strokeWithStyle(style: StrokeStyle): void {
    this.ops.push({ op: "stroke", style });
  }

  get fills(): LinearGradientFill[] {
    return this.ops.flatMap((entry) => (entry.op === "fill" ? [entry.fill] : []));
  }

  get strokes(): StrokeStyle[] {
    return this.ops.flatMap((entry) => (entry.op === "stroke" ? [entry.style] : []));
  }
}
