import type { CSSProperties } from "react";
import type { DiffLineRecord } from "#core/ribbons/types";

export const lineStyle = (line: DiffLineRecord | undefined): CSSProperties => {
  switch (line?.kind) {
    case "addition":
      return { background: "rgba(34, 197, 94, 0.25)" };
    case "deletion":
      return { background: "rgba(239, 68, 68, 0.4)" };
    case "context":
      return { background: "transparent" };
    default:
      return { background: "rgba(15, 23, 42, 0.1)" };
  }
};

export const lineNumberFor = (line: DiffLineRecord | undefined, side: "old" | "new"): number | null => {
  if (!line) return null;
  return side === "old" ? line.oldLineNumber : line.newLineNumber;
};
