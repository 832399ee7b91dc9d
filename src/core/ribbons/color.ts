import type { DiffPairWithConnection, PairSides, RibbonPalette } from "./types.js";

export const pairSides = (pair: DiffPairWithConnection): PairSides => {
  const { left, right } = pair;
  if (left && right) return { kind: "both", left, right };
  if (left) return { kind: "leftOnly", left };
  if (right) return { kind: "rightOnly", right };
  return { kind: "neither" };
};

/** `null` only for `neither`; callers skip those pairs before painting. */
export const selectRibbonColor = (sides: PairSides, palette: RibbonPalette): string | null => {
  switch (sides.kind) {
    case "both":
      return palette.change;
    case "leftOnly":
      return palette.deletion;
    case "rightOnly":
      return palette.addition;
    case "neither":
      return null;
  }
};
