export type ConnectionType = "none" | "addition" | "deletion" | "change";

export type DiffLineKind = "context" | "addition" | "deletion";

export interface DiffLineRecord {
  kind: DiffLineKind;
  content: string;
  oldLineNumber: number | null;
  newLineNumber: number | null;
}

export interface DiffPairWithConnection {
  id: number;
  left?: DiffLineRecord;
  right?: DiffLineRecord;
  hunkHeader?: string;
  connectionType: ConnectionType;
}

export type PairSides =
  | { kind: "both"; left: DiffLineRecord; right: DiffLineRecord }
  | { kind: "leftOnly"; left: DiffLineRecord }
  | { kind: "rightOnly"; right: DiffLineRecord }
  | { kind: "neither" };

export interface RibbonPalette {
  addition: string;
  deletion: string;
  change: string;
}

export type RibbonMode = "fluid" | "blocks";

/** Half-open index range of pairs that should be painted. */
export interface VisibleRange {
  start: number;
  end: number;
}

export interface RibbonLayout {
  lineHeight: number;
  viewWidth: number;
  isFluidMode: boolean;
  palette: RibbonPalette;
  visibleRange?: VisibleRange;
}

export interface Ribbon {
  index: number;
  pairId: number;
  topY: number;
  bottomY: number;
  leftEnd: number;
  rightStart: number;
  color: string;
  mode: RibbonMode;
}

export interface RibbonPlan {
  ribbons: Ribbon[];
  /** Final cursor position; always `pairs.length * lineHeight`. */
  contentHeight: number;
}
