import { describe, expect, it } from "vitest";
import { drawRibbons, planRibbons } from "../src/core/ribbons/renderer.js";
import type { ConnectionType, DiffLineRecord, DiffPairWithConnection, RibbonLayout } from "../src/core/ribbons/types.js";
import { RecordingSurface } from "./support/recordingSurface.js";

const palette = { addition: "#00aa00", deletion: "#aa0000", change: "#0000aa" };

const line = (content: string, kind: DiffLineRecord["kind"] = "context"): DiffLineRecord => ({
  kind,
  content,
  oldLineNumber: kind === "addition" ? null : 1,
  newLineNumber: kind === "deletion" ? null : 1,
});

const pair = (
  id: number,
  connectionType: ConnectionType,
  sides: { left?: string; right?: string } = {},
): DiffPairWithConnection => ({
  id,
  connectionType,
  left: sides.left === undefined ? undefined : line(sides.left, "deletion"),
  right: sides.right === undefined ? undefined : line(sides.right, "addition"),
});

const layout = (overrides: Partial<RibbonLayout> = {}): RibbonLayout => ({
  lineHeight: 22,
  viewWidth: 800,
  isFluidMode: true,
  palette,
  ...overrides,
});

describe("planRibbons", () => {
  it("advances the cursor one row per pair whether or not a ribbon is drawn", () => {
    const pairs = [
      pair(1, "none"),
      pair(2, "change", { left: "a", right: "b" }),
      pair(3, "addition"),
      pair(4, "deletion", { left: "c" }),
      pair(5, "none", { left: "d", right: "d" }),
    ];

    const plan = planRibbons(pairs, layout({ lineHeight: 18 }));

    expect(plan.contentHeight).toBe(90);
    expect(plan.ribbons.map((ribbon) => [ribbon.pairId, ribbon.topY, ribbon.bottomY])).toEqual([
      [2, 18, 36],
      [4, 54, 72],
    ]);
  });

  it("maps side presence to palette colors", () => {
    const pairs = [
      pair(1, "change", { left: "a", right: "b" }),
      pair(2, "deletion", { left: "a" }),
      pair(3, "addition", { right: "b" }),
    ];

    const colors = planRibbons(pairs, layout()).ribbons.map((ribbon) => ribbon.color);

    expect(colors).toEqual(["#0000aa", "#aa0000", "#00aa00"]);
  });

  it("colors by presence even when the connection type disagrees", () => {
    const pairs = [pair(1, "addition", { left: "a", right: "b" }), pair(2, "change", { left: "a" })];

    const colors = planRibbons(pairs, layout()).ribbons.map((ribbon) => ribbon.color);

    expect(colors).toEqual(["#0000aa", "#aa0000"]);
  });

  it("keeps the span symmetric around the center for any width and row", () => {
    for (const viewWidth of [200, 801, 1440]) {
      const pairs = [pair(1, "deletion", { left: "a" }), pair(2, "addition", { right: "b" })];
      for (const ribbon of planRibbons(pairs, layout({ viewWidth })).ribbons) {
        expect(ribbon.rightStart - ribbon.leftEnd).toBe(60);
        expect((ribbon.leftEnd + ribbon.rightStart) / 2).toBe(viewWidth / 2);
      }
    }
  });

  it("only plans ribbons inside the visible range without moving rows", () => {
    const pairs = Array.from({ length: 6 }, (_, idx) => pair(idx + 1, "change", { left: "a", right: "b" }));

    const plan = planRibbons(pairs, layout({ lineHeight: 10, visibleRange: { start: 2, end: 4 } }));

    expect(plan.ribbons.map((ribbon) => [ribbon.index, ribbon.topY])).toEqual([
      [2, 20],
      [3, 30],
    ]);
    expect(plan.contentHeight).toBe(60);
  });

  it("clamps a visible range that runs past the pairs", () => {
    const pairs = [pair(1, "addition", { right: "x" }), pair(2, "addition", { right: "y" })];

    const plan = planRibbons(pairs, layout({ visibleRange: { start: -5, end: 50 } }));

    expect(plan.ribbons.map((ribbon) => ribbon.index)).toEqual([0, 1]);
  });
});

describe("drawRibbons", () => {
  it("paints one fluid change ribbon with fill, borders and edge ticks", () => {
    const surface = new RecordingSurface();
    const pairs: DiffPairWithConnection[] = [
      { id: 1, left: line("old", "deletion"), right: line("new", "addition"), connectionType: "change" },
    ];

    drawRibbons(surface, pairs, layout());

    const color = "#0000aa";
    const border = { color, opacity: 0.6, width: 1.5, lineCap: "round" };
    const tick = { color, opacity: 0.3, width: 0.5, lineCap: "butt" };
    expect(surface.ops).toEqual([
      { op: "beginPath" },
      { op: "moveTo", x: 370, y: 0 },
      { op: "curveTo", cp1x: 400, cp1y: 0, cp2x: 400, cp2y: 0, x: 430, y: 0 },
      { op: "lineTo", x: 430, y: 22 },
      { op: "curveTo", cp1x: 400, cp1y: 22, cp2x: 400, cp2y: 22, x: 370, y: 22 },
      { op: "closePath" },
      {
        op: "fill",
        fill: {
          x0: 370,
          y0: 11,
          x1: 430,
          y1: 11,
          stops: [
            { offset: 0, color, opacity: 0.1 },
            { offset: 0.5, color, opacity: 0.2 },
            { offset: 1, color, opacity: 0.1 },
          ],
        },
      },
      { op: "beginPath" },
      { op: "moveTo", x: 370, y: 0 },
      { op: "curveTo", cp1x: 400, cp1y: 0, cp2x: 400, cp2y: 0, x: 430, y: 0 },
      { op: "stroke", style: border },
      { op: "beginPath" },
      { op: "moveTo", x: 370, y: 22 },
      { op: "curveTo", cp1x: 400, cp1y: 22, cp2x: 400, cp2y: 22, x: 430, y: 22 },
      { op: "stroke", style: border },
      { op: "beginPath" },
      { op: "moveTo", x: 370, y: 0 },
      { op: "lineTo", x: 370, y: 22 },
      { op: "stroke", style: tick },
      { op: "beginPath" },
      { op: "moveTo", x: 430, y: 0 },
      { op: "lineTo", x: 430, y: 22 },
      { op: "stroke", style: tick },
    ]);
  });

  it("draws straight edges in blocks mode", () => {
    const surface = new RecordingSurface();

    drawRibbons(surface, [pair(1, "addition", { right: "x" })], layout({ isFluidMode: false }));

    expect(surface.ops.slice(0, 6)).toEqual([
      { op: "beginPath" },
      { op: "moveTo", x: 370, y: 0 },
      { op: "lineTo", x: 430, y: 0 },
      { op: "lineTo", x: 430, y: 22 },
      { op: "lineTo", x: 370, y: 22 },
      { op: "closePath" },
    ]);
    expect(surface.ops.some((entry) => entry.op === "curveTo")).toBe(false);
    expect(surface.strokes).toHaveLength(4);
  });

  it("paints nothing for none pairs or pairs without sides", () => {
    const surface = new RecordingSurface();

    drawRibbons(surface, [pair(1, "none", { left: "a", right: "b" }), pair(2, "change"), pair(3, "deletion")], layout());

    expect(surface.ops).toEqual([]);
  });

  it("places a ribbon after three skipped rows three rows down", () => {
    const skipped = [pair(1, "none"), pair(2, "none"), pair(3, "none")];
    const empty = new RecordingSurface();
    drawRibbons(empty, skipped, layout());
    expect(empty.ops).toEqual([]);
    expect(planRibbons(skipped, layout()).contentHeight).toBe(66);

    const surface = new RecordingSurface();
    drawRibbons(surface, [...skipped, pair(4, "deletion", { left: "gone" })], layout());

    expect(surface.ops[1]).toEqual({ op: "moveTo", x: 370, y: 66 });
    expect(surface.fills).toHaveLength(1);
    expect(surface.fills[0]?.stops[0]?.color).toBe("#aa0000");
  });
});
